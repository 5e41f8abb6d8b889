/**
 * Rebuilds counters and logs from channel history.
 *
 * For every channel in the tracked categories (report channels excluded): clear, then
 * replay each human message newer than the lookback cutoff through `recordEvent`.
 * A failing channel is counted and the rest keep going.
 */
import type { ChannelId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { SECONDS_PER_DAY } from "./constants";
import { directoryUnavailable, type ActivityError } from "./errors";
import type { CategoryIds } from "./registry";
import type {
  ActivityLogger,
  Clock,
  CounterStore,
  EntityDirectory,
  MessageHistory,
  TrackedEntity,
  UnixSeconds,
} from "./types";

/** A "month" of lookback. */
export const DAYS_PER_MONTH = 30;

export interface RecalculateResult {
  months: number;
  channels: number;
  processed: number;
  failed: number;
  replayed: number;
  excluded: number;
}

export interface ActivityRecalculatorDeps {
  store: CounterStore;
  directory: EntityDirectory;
  history: MessageHistory;
  categories: CategoryIds;
  excludedChannels: readonly ChannelId[];
  maxMonths: number;
  clock: Clock;
  logger: ActivityLogger;
}

export const clampMonths = (months: number, maxMonths: number): number =>
  Math.min(Math.max(1, Math.trunc(months)), Math.max(1, maxMonths));

export class ActivityRecalculator {
  constructor(private readonly deps: ActivityRecalculatorDeps) {}

  async run(requestedMonths: number): Promise<Result<RecalculateResult, ActivityError>> {
    const months = clampMonths(requestedMonths, this.deps.maxMonths);
    const cutoff = this.deps.clock() - months * DAYS_PER_MONTH * SECONDS_PER_DAY;

    const channels: TrackedEntity[] = [];
    for (const categoryId of [this.deps.categories.proposed, this.deps.categories.permanent]) {
      const listed = await this.deps.directory.listEntities(categoryId);
      if (listed.isErr()) return ErrResult(directoryUnavailable(categoryId, listed.error));
      channels.push(...listed.value);
    }

    const excludedIds = new Set(this.deps.excludedChannels);
    const targets = channels.filter((channel) => !excludedIds.has(channel.id));
    const result: RecalculateResult = {
      months,
      channels: targets.length,
      processed: 0,
      failed: 0,
      replayed: 0,
      excluded: channels.length - targets.length,
    };

    for (const channel of targets) {
      try {
        result.replayed += await this.replayChannel(channel.id, cutoff);
        result.processed += 1;
      } catch (error) {
        result.failed += 1;
        this.deps.logger.error(`[activity:recalculate] channel ${channel.id} failed`, error);
      }
    }

    this.deps.logger.info(
      `[activity:recalculate] ${result.processed}/${result.channels} channels, ${result.replayed} messages, ${months} month(s)`,
    );
    return OkResult(result);
  }

  /** @returns messages recorded for the channel. */
  private async replayChannel(channelId: ChannelId, cutoff: UnixSeconds): Promise<number> {
    const cleared = await this.deps.store.clear(channelId);
    if (cleared.isErr()) throw cleared.error;

    let replayed = 0;
    for await (const message of this.deps.history.iterateSince(channelId, cutoff)) {
      if (message.authorIsBot || message.timestamp < cutoff) continue;
      const recorded = await this.deps.store.recordEvent(channelId, message.id, message.timestamp);
      if (recorded.isErr()) throw recorded.error;
      if (recorded.value.recorded) replayed += 1;
    }
    return replayed;
  }
}
