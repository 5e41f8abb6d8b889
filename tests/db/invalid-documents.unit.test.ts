/**
 * Invalid Document Unit Tests.
 *
 * Purpose: malformed Mongo documents are reported through the injected logger and
 * degrade to "missing" or zero instead of failing the read.
 */
import { describe, it, expect, beforeEach, vi } from "vitest";
import { ReportKind } from "@/modules/activity/constants";
import { createMongoReportReferences, createMongoTrackedChannels } from "@/db/repositories";
import { MongoCounterStore } from "@/modules/activity/store/mongo";
import { createLogger } from "../activity/_utils/fakes";

const collection = vi.hoisted(() => ({ docs: [] as unknown[] }));

vi.mock("@/db/mongo", () => ({
  getDb: async () => ({
    collection: () => ({
      findOne: async () => collection.docs[0] ?? null,
      find: () => ({ toArray: async () => collection.docs }),
    }),
  }),
  getMongoClient: async () => ({}),
}));

describe("invalid Mongo documents", () => {
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    logger = createLogger();
    collection.docs = [];
  });

  it("reads a malformed counter document as zero and logs it", async () => {
    collection.docs = [{ _id: 7 }];
    const store = new MongoCounterStore({ logger });

    const res = await store.getCounters("100000000000000001");

    expect(res.isOk() && res.value).toEqual({ totalCount: 0, lastEventTimestamp: 0 });
    expect(logger.error).toHaveBeenCalledWith(
      "[activity:store] invalid counter document; using zero",
      expect.objectContaining({ entityId: "100000000000000001" }),
    );
  });

  it("treats a malformed report reference as missing and logs it", async () => {
    collection.docs = [{ _id: "unknown_report" }];

    const res = await createMongoReportReferences(logger).get(ReportKind.Proposed);

    expect(res.isOk() && res.value).toBeNull();
    expect(logger.error).toHaveBeenCalledWith(
      "[published-reports] invalid document; treating as missing",
      expect.objectContaining({ kind: "proposed_activity" }),
    );
  });

  it("skips malformed tracked channels and logs each one", async () => {
    collection.docs = [
      { _id: "c1", channelId: "c1", category: "proposed", createdAt: new Date(0) },
      { _id: "c2", channelId: "c2", category: "archived", createdAt: new Date(0) },
    ];

    const res = await createMongoTrackedChannels(logger).list();

    expect(res.isOk() && res.value).toEqual([
      { channelId: "c1", category: "proposed", createdAt: new Date(0) },
    ]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      "[tracked-channels] skipping invalid document",
      expect.objectContaining({ id: "c2" }),
    );
  });
});
