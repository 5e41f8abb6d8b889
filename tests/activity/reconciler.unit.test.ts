/**
 * Report Reconciler Unit Tests.
 *
 * Purpose: first publish, edit in place, self-healing after the message vanished,
 * destination moves, and failures that must leave the stored reference alone.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { ReportKind } from "@/modules/activity/constants";
import { ReportReconciler } from "@/modules/activity/reconciler";
import { MemoryReportReferenceRepo } from "@/modules/activity/store/memory";
import { FakePublishTarget, createLogger } from "./_utils/fakes";

const DESTINATION = "200000000000000001";

describe("ReportReconciler", () => {
  let references: MemoryReportReferenceRepo;
  let target: FakePublishTarget<string>;
  let reconciler: ReportReconciler<string>;

  beforeEach(() => {
    references = new MemoryReportReferenceRepo(() => new Date("2024-05-01T00:00:00Z"));
    target = new FakePublishTarget<string>();
    reconciler = new ReportReconciler(references, target, createLogger());
  });

  const storedReference = async () => {
    const res = await references.get(ReportKind.Proposed);
    return res.isOk() ? res.value : undefined;
  };

  it("creates a message and persists the reference on first publish", async () => {
    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");

    expect(res.isOk() && res.value).toBe("created");
    expect(target.sends).toEqual([DESTINATION]);
    expect(await storedReference()).toEqual({
      reportKind: ReportKind.Proposed,
      destinationId: DESTINATION,
      externalMessageId: "msg-1",
      updatedAt: new Date("2024-05-01T00:00:00Z"),
    });
  });

  it("edits the existing message on later publishes", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v2");

    expect(res.isOk() && res.value).toBe("updated");
    expect(target.sends).toHaveLength(1);
    expect(target.edits).toEqual(["msg-1"]);
    expect(target.messages.get("msg-1")?.payload).toBe("v2");
    expect((await storedReference())?.externalMessageId).toBe("msg-1");
  });

  it("recreates the message when it was deleted out of band", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    target.messages.delete("msg-1");

    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v2");

    expect(res.isOk() && res.value).toBe("recreated");
    expect(target.messages.get("msg-2")?.payload).toBe("v2");
    expect((await storedReference())?.externalMessageId).toBe("msg-2");
  });

  it("republishes into a new destination and repoints the reference", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    const moved = "200000000000000002";

    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, moved, "v2");

    expect(res.isOk() && res.value).toBe("recreated");
    expect(target.edits).toEqual([]);
    expect(target.sends).toEqual([DESTINATION, moved]);
    const reference = await storedReference();
    expect(reference?.destinationId).toBe(moved);
    expect(reference?.externalMessageId).toBe("msg-2");
    expect(target.removals).toEqual(["msg-1"]);
    expect([...target.messages.keys()]).toEqual(["msg-2"]);
  });

  it("still repoints the reference when the old message cannot be deleted", async () => {
    const logger = createLogger();
    reconciler = new ReportReconciler(references, target, logger);
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    target.failingRemovals = true;

    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, "200000000000000002", "v2");

    expect(res.isOk() && res.value).toBe("recreated");
    expect((await storedReference())?.externalMessageId).toBe("msg-2");
    expect(logger.warn).toHaveBeenCalledWith(
      "[activity:reconciler] could not delete old proposed_activity message msg-1",
      expect.objectContaining({ code: "PUBLISH_TARGET_UNAVAILABLE" }),
    );
  });

  it("does not delete anything when editing in place or recreating a vanished message", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v2");
    target.messages.delete("msg-1");
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v3");

    expect(target.removals).toEqual([]);
  });

  it("returns the publish error and keeps the previous reference", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v1");
    target.failing = true;

    const res = await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "v2");

    expect(res.isErr() && res.error.code).toBe("PUBLISH_TARGET_UNAVAILABLE");
    expect((await storedReference())?.externalMessageId).toBe("msg-1");
  });

  it("keeps one reference per report kind", async () => {
    await reconciler.publishOrUpdate(ReportKind.Proposed, DESTINATION, "p");
    await reconciler.publishOrUpdate(ReportKind.Permanent, DESTINATION, "q");

    const proposed = await references.get(ReportKind.Proposed);
    const permanent = await references.get(ReportKind.Permanent);
    expect(proposed.isOk() && proposed.value?.externalMessageId).toBe("msg-1");
    expect(permanent.isOk() && permanent.value?.externalMessageId).toBe("msg-2");
  });
});
