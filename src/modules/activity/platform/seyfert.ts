/**
 * Seyfert adapters for the activity engine's platform ports: the report publish target,
 * the channel directory and the message history reader.
 */
import type { Embed, UsingClient } from "seyfert";
import type { ChannelId, GuildId, MessageId } from "@/db/types";
import { isUnknownMessageError, toError } from "@/utils/discordErrors";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { millisToSnowflake, snowflakeToMillis, snowflakeToUnixSeconds } from "@/utils/snowflake";
import { publishUnavailable, type ActivityError } from "../errors";
import type {
  EditOutcome,
  EntityDirectory,
  HistoricalMessage,
  MessageHistory,
  PublishTarget,
  TrackedEntity,
  UnixSeconds,
} from "../types";

const PAGE_SIZE = 100;

export class SeyfertPublishTarget implements PublishTarget<Embed> {
  constructor(private readonly client: UsingClient) {}

  async send(
    destinationId: ChannelId,
    payload: Embed,
  ): Promise<Result<MessageId, ActivityError>> {
    try {
      const message = await this.client.messages.write(destinationId, {
        embeds: [payload],
      });
      return OkResult(message.id);
    } catch (error) {
      return ErrResult(
        publishUnavailable(`Could not send report to ${destinationId}`, error),
      );
    }
  }

  async edit(
    destinationId: ChannelId,
    messageId: MessageId,
    payload: Embed,
  ): Promise<Result<EditOutcome, ActivityError>> {
    try {
      await this.client.messages.edit(messageId, destinationId, {
        embeds: [payload],
      });
      return OkResult("edited");
    } catch (error) {
      if (isUnknownMessageError(error)) return OkResult("not_found");
      return ErrResult(
        publishUnavailable(`Could not edit report ${messageId} in ${destinationId}`, error),
      );
    }
  }

  async remove(
    destinationId: ChannelId,
    messageId: MessageId,
  ): Promise<Result<void, ActivityError>> {
    try {
      await this.client.messages.delete(messageId, destinationId);
      return OkResult(undefined);
    } catch (error) {
      if (isUnknownMessageError(error)) return OkResult(undefined);
      return ErrResult(
        publishUnavailable(`Could not delete report ${messageId} in ${destinationId}`, error),
      );
    }
  }
}

/** Text channels of a guild grouped by parent category. */
export class SeyfertChannelDirectory implements EntityDirectory {
  constructor(
    private readonly client: UsingClient,
    private readonly guildId: GuildId,
  ) {}

  async listEntities(categoryId: string): Promise<Result<TrackedEntity[], Error>> {
    try {
      const channels = await this.client.guilds.channels.list(this.guildId);
      const entities: TrackedEntity[] = [];
      for (const channel of channels) {
        if (!channel.isTextGuild() || channel.parentId !== categoryId) continue;
        entities.push({
          id: channel.id,
          name: channel.name,
          createdAt: new Date(snowflakeToMillis(channel.id)),
        });
      }
      return OkResult(entities);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async resolveCategory(channelId: ChannelId): Promise<string | null> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel.isTextGuild()) return null;
    return channel.parentId ?? null;
  }
}

/** Pages `messages.list` backwards from now until the cutoff. */
export class SeyfertMessageHistory implements MessageHistory {
  constructor(private readonly client: UsingClient) {}

  async *iterateSince(
    channelId: ChannelId,
    since: UnixSeconds,
  ): AsyncIterable<HistoricalMessage> {
    const floor = millisToSnowflake(since * 1000);
    let before: string | undefined;

    while (true) {
      const batch = await this.client.messages.list(
        channelId,
        before ? { limit: PAGE_SIZE, before } : { limit: PAGE_SIZE },
      );
      if (!batch.length) return;

      for (const message of batch) {
        if (BigInt(message.id) < BigInt(floor)) return;
        yield {
          id: message.id,
          authorIsBot: Boolean(message.author.bot),
          timestamp: snowflakeToUnixSeconds(message.id),
        };
      }

      const last = batch[batch.length - 1];
      if (batch.length < PAGE_SIZE || !last) return;
      before = last.id;
    }
  }
}
