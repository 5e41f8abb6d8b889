/**
 * Activity Aggregator Unit Tests.
 *
 * Purpose: verify the score formula, the 7-day window and retention against a fixed
 * clock, including the end-to-end scenario for channel 42.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { ActivityAggregator, computeScore } from "@/modules/activity/aggregator";
import { SCORE_WEIGHTS } from "@/modules/activity/constants";
import { MemoryCounterStore } from "@/modules/activity/store/memory";
import type { Result } from "@/utils/result";
import { DAY, NOW, fixedClock } from "./_utils/fakes";

const valueOf = <T>(result: Result<T, unknown>): T => {
  if (result.isErr()) throw new Error("expected Ok result");
  return result.value;
};

describe("ActivityAggregator", () => {
  let store: MemoryCounterStore;
  let aggregator: ActivityAggregator;

  beforeEach(() => {
    store = new MemoryCounterStore();
    aggregator = new ActivityAggregator(store, fixedClock(NOW));
  });

  it("uses the 0.4 / 0.6 weights", () => {
    expect(SCORE_WEIGHTS).toEqual({ lifetime: 0.4, recent: 0.6 });
    expect(computeScore(10, 5)).toBe(10 * 0.4 + 5 * 0.6);
    expect(computeScore(0, 0)).toBe(0);
  });

  it("scores an unknown channel as zero", async () => {
    expect(valueOf(await aggregator.score("unknown"))).toBe(0);
    expect(valueOf(await aggregator.metrics("unknown"))).toEqual({
      totalCount: 0,
      recentCount: 0,
      score: 0,
    });
  });

  it("computes recent count, total and score for channel 42", async () => {
    await store.recordEvent("42", "m1", NOW - 1 * DAY);
    await store.recordEvent("42", "m2", NOW - 2 * DAY);
    await store.recordEvent("42", "m3", NOW - 10 * DAY);

    expect(valueOf(await aggregator.recentCount("42", 7))).toBe(2);
    const metrics = valueOf(await aggregator.metrics("42"));
    expect(metrics.totalCount).toBe(3);
    expect(metrics.recentCount).toBe(2);
    expect(metrics.score).toBe(3 * 0.4 + 2 * 0.6);
    expect(metrics.score).toBeCloseTo(2.4, 10);
  });

  it("returns identical metrics when recomputed without writes", async () => {
    await store.recordEvent("42", "m1", NOW - DAY);
    const first = valueOf(await aggregator.metrics("42"));
    const second = valueOf(await aggregator.metrics("42"));
    expect(second).toEqual(first);
  });

  it("counts an event exactly at the window start", async () => {
    await store.recordEvent("42", "edge", NOW - 7 * DAY);
    await store.recordEvent("42", "outside", NOW - 7 * DAY - 1);
    expect(valueOf(await aggregator.recentCount("42"))).toBe(1);
  });

  it("retention drops entries older than the window and keeps the total", async () => {
    await store.recordEvent("42", "m1", NOW - 1 * DAY);
    await store.recordEvent("42", "m2", NOW - 2 * DAY);
    await store.recordEvent("42", "m3", NOW - 10 * DAY);
    const before = NOW - 10 * DAY - 1;

    expect(valueOf(await store.countSince("42", before))).toBe(3);
    expect(valueOf(await aggregator.retain("42", 7))).toBe(1);
    expect(valueOf(await store.countSince("42", before))).toBe(2);
    expect(valueOf(await store.getCounters("42")).totalCount).toBe(3);
  });
});
