/**
 * Turns raw counters into comparable metrics.
 *
 * Stateless over the counter store: every call reads the store at call time with the
 * injected clock, so two calls without writes in between return the same numbers.
 */
import type { ChannelId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { ACTIVITY_WINDOW_DAYS, SCORE_WEIGHTS, SECONDS_PER_DAY } from "./constants";
import type { ActivityError } from "./errors";
import type { Clock, CounterStore, EntityMetrics, UnixSeconds } from "./types";

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export const computeScore = (totalCount: number, recentCount: number): number =>
  totalCount * SCORE_WEIGHTS.lifetime + recentCount * SCORE_WEIGHTS.recent;

export class ActivityAggregator {
  constructor(
    private readonly store: CounterStore,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Start of a trailing window of `windowDays` ending now. */
  windowStart(windowDays: number): UnixSeconds {
    return this.clock() - windowDays * SECONDS_PER_DAY;
  }

  recentCount(
    entityId: ChannelId,
    windowDays: number = ACTIVITY_WINDOW_DAYS,
  ): Promise<Result<number, ActivityError>> {
    return this.store.countSince(entityId, this.windowStart(windowDays));
  }

  async score(entityId: ChannelId): Promise<Result<number, ActivityError>> {
    const metrics = await this.metrics(entityId);
    if (metrics.isErr()) return ErrResult(metrics.error);
    return OkResult(metrics.value.score);
  }

  async metrics(entityId: ChannelId): Promise<Result<EntityMetrics, ActivityError>> {
    const counters = await this.store.getCounters(entityId);
    if (counters.isErr()) return ErrResult(counters.error);

    const recent = await this.recentCount(entityId, ACTIVITY_WINDOW_DAYS);
    if (recent.isErr()) return ErrResult(recent.error);

    const { totalCount } = counters.value;
    return OkResult({
      totalCount,
      recentCount: recent.value,
      score: computeScore(totalCount, recent.value),
    });
  }

  /** Drops log entries older than the window; lifetime totals are kept. */
  retain(
    entityId: ChannelId,
    windowDays: number = ACTIVITY_WINDOW_DAYS,
  ): Promise<Result<number, ActivityError>> {
    return this.store.purgeBefore(entityId, this.windowStart(windowDays));
  }
}
