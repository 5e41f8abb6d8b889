/**
 * Activity Recalculator Unit Tests.
 *
 * Purpose: clear-then-replay of human messages inside the lookback, clamping of the
 * requested months, report channel exclusion and per-channel failure counting.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { ActivityRecalculator, DAYS_PER_MONTH, clampMonths } from "@/modules/activity/recalculate";
import { MemoryCounterStore } from "@/modules/activity/store/memory";
import { DAY, FakeDirectory, FakeHistory, NOW, createLogger, entity, fixedClock } from "./_utils/fakes";

const PROPOSED = "300000000000000001";
const PERMANENT = "300000000000000002";
const REPORT_CHANNEL = "400000000000000001";

describe("clampMonths", () => {
  it("keeps the request inside 1..max", () => {
    expect(clampMonths(0, 6)).toBe(1);
    expect(clampMonths(3, 6)).toBe(3);
    expect(clampMonths(12, 6)).toBe(6);
    expect(clampMonths(2.7, 6)).toBe(2);
  });
});

describe("ActivityRecalculator", () => {
  let store: MemoryCounterStore;
  let directory: FakeDirectory;
  let history: FakeHistory;
  let recalculator: ActivityRecalculator;

  beforeEach(() => {
    store = new MemoryCounterStore();
    directory = new FakeDirectory()
      .addChannel(PROPOSED, entity("a"))
      .addChannel(PROPOSED, entity(REPORT_CHANNEL))
      .addChannel(PERMANENT, entity("b"));
    history = new FakeHistory();
    recalculator = new ActivityRecalculator({
      store,
      directory,
      history,
      categories: { proposed: PROPOSED, permanent: PERMANENT },
      excludedChannels: [REPORT_CHANNEL],
      maxMonths: 6,
      clock: fixedClock(NOW),
      logger: createLogger(),
    });
  });

  it("clears stale counters and replays only human messages within the lookback", async () => {
    await store.recordEvent("a", "stale-1", NOW - 100 * DAY);
    await store.recordEvent("a", "stale-2", NOW - 100 * DAY);
    history.set("a", [
      { id: "m1", authorIsBot: false, timestamp: NOW - DAY },
      { id: "m2", authorIsBot: true, timestamp: NOW - 2 * DAY },
      { id: "m3", authorIsBot: false, timestamp: NOW - 20 * DAY },
      { id: "m4", authorIsBot: false, timestamp: NOW - (DAYS_PER_MONTH + 1) * DAY },
    ]);
    history.set("b", [{ id: "m5", authorIsBot: false, timestamp: NOW - 3 * DAY }]);

    const res = await recalculator.run(1);

    expect(res.isOk() && res.value).toEqual({
      months: 1,
      channels: 2,
      processed: 2,
      failed: 0,
      replayed: 3,
      excluded: 1,
    });
    const a = await store.getCounters("a");
    expect(a.isOk() && a.value).toEqual({ totalCount: 2, lastEventTimestamp: NOW - 20 * DAY });
    const recent = await store.countSince("a", NOW - 7 * DAY);
    expect(recent.isOk() && recent.value).toBe(1);
  });

  it("clamps the lookback to the configured limit", async () => {
    history.set("a", [{ id: "old", authorIsBot: false, timestamp: NOW - 200 * DAY }]);
    const res = await recalculator.run(12);
    expect(res.isOk() && res.value.months).toBe(6);
    expect(res.isOk() && res.value.replayed).toBe(0);
  });

  it("counts a failing channel and keeps going", async () => {
    history.failingChannels.add("a");
    history.set("b", [{ id: "m1", authorIsBot: false, timestamp: NOW - DAY }]);

    const res = await recalculator.run(1);

    expect(res.isOk() && res.value.failed).toBe(1);
    expect(res.isOk() && res.value.processed).toBe(1);
    expect(res.isOk() && res.value.replayed).toBe(1);
  });

  it("fails when a category cannot be listed", async () => {
    directory.failingCategories.add(PERMANENT);
    const res = await recalculator.run(1);
    expect(res.isErr() && res.error.code).toBe("DIRECTORY_UNAVAILABLE");
  });
});
