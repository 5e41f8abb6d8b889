/**
 * Inbound message tracking: one recorded event per human message in a tracked category.
 */
import type { ChannelId, GuildId } from "@/db/types";
import { snowflakeToUnixSeconds } from "@/utils/snowflake";
import type { CategoryIds } from "./registry";
import type { ActivityLogger, CounterStore, EntityDirectory } from "./types";

/** The parts of a gateway message the tracker reads. */
export interface TrackableMessage {
  id: string;
  channelId: string;
  guildId?: string | null;
  author: { bot?: boolean | null };
}

export type TrackResult = "recorded" | "duplicate" | "ignored" | "dropped";

export interface ActivityTrackerDeps {
  store: CounterStore;
  directory: EntityDirectory;
  guildId: GuildId;
  categories: CategoryIds;
  /** Report destinations; their own messages never count. */
  excludedChannels: readonly ChannelId[];
  logger: ActivityLogger;
}

export class ActivityTracker {
  private readonly trackedCategories: ReadonlySet<string>;
  private readonly excluded: ReadonlySet<ChannelId>;

  constructor(private readonly deps: ActivityTrackerDeps) {
    this.trackedCategories = new Set([deps.categories.proposed, deps.categories.permanent]);
    this.excluded = new Set(deps.excludedChannels);
  }

  /** Never rejects: store failures are logged and the event is dropped. */
  async handleMessage(message: TrackableMessage): Promise<TrackResult> {
    if (message.author.bot) return "ignored";
    if (!message.guildId || message.guildId !== this.deps.guildId) return "ignored";
    if (this.excluded.has(message.channelId)) return "ignored";

    try {
      const categoryId = await this.deps.directory.resolveCategory(message.channelId);
      if (!categoryId || !this.trackedCategories.has(categoryId)) return "ignored";
    } catch (error) {
      this.deps.logger.warn(
        `[activity:tracker] could not resolve category of ${message.channelId}`,
        error,
      );
      return "dropped";
    }

    const recorded = await this.deps.store.recordEvent(
      message.channelId,
      message.id,
      snowflakeToUnixSeconds(message.id),
    );
    if (recorded.isErr()) {
      this.deps.logger.warn(
        `[activity:tracker] dropped message ${message.id} in ${message.channelId}`,
        recorded.error,
      );
      return "dropped";
    }
    return recorded.value.recorded ? "recorded" : "duplicate";
  }
}
