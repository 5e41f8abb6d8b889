/**
 * In-process persistence for ephemeral runs (`ACTIVITY_STORE_BACKEND=memory`) and tests.
 * Same contracts as the Mongo backend; state is lost on restart.
 */
import type { ChannelId, MessageId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";
import type { ReportKind } from "../constants";
import type { ActivityError } from "../errors";
import type {
  ActivityCounters,
  ActivityPersistence,
  CounterStore,
  PublishedReportReference,
  RecordOutcome,
  ReportReferenceRepo,
  TrackedChannelRecord,
  TrackedChannelRepo,
  TrackedChannelSyncResult,
  UnixSeconds,
} from "../types";

export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<ChannelId, ActivityCounters>();
  /** channelId -> (eventId -> timestamp) */
  private readonly logs = new Map<ChannelId, Map<MessageId, UnixSeconds>>();

  async recordEvent(
    entityId: ChannelId,
    eventId: MessageId,
    timestamp: UnixSeconds,
  ): Promise<Result<RecordOutcome, ActivityError>> {
    let log = this.logs.get(entityId);
    if (!log) {
      log = new Map();
      this.logs.set(entityId, log);
    }
    if (log.has(eventId)) return OkResult({ recorded: false });
    log.set(eventId, timestamp);

    const current = this.counters.get(entityId);
    this.counters.set(entityId, {
      totalCount: (current?.totalCount ?? 0) + 1,
      lastEventTimestamp: timestamp,
    });
    return OkResult({ recorded: true });
  }

  async getCounters(
    entityId: ChannelId,
  ): Promise<Result<ActivityCounters, ActivityError>> {
    const current = this.counters.get(entityId);
    return OkResult(
      current ? { ...current } : { totalCount: 0, lastEventTimestamp: 0 },
    );
  }

  async countSince(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>> {
    let count = 0;
    for (const timestamp of this.logs.get(entityId)?.values() ?? []) {
      if (timestamp >= cutoff) count += 1;
    }
    return OkResult(count);
  }

  async purgeBefore(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>> {
    const log = this.logs.get(entityId);
    if (!log) return OkResult(0);
    let removed = 0;
    for (const [eventId, timestamp] of log) {
      if (timestamp < cutoff) {
        log.delete(eventId);
        removed += 1;
      }
    }
    return OkResult(removed);
  }

  async clear(entityId: ChannelId): Promise<Result<void, ActivityError>> {
    this.counters.delete(entityId);
    this.logs.delete(entityId);
    return OkResult(undefined);
  }

  async listTrackedEntities(): Promise<Result<ChannelId[], ActivityError>> {
    return OkResult([...this.counters.keys()]);
  }
}

export class MemoryReportReferenceRepo implements ReportReferenceRepo {
  private readonly references = new Map<ReportKind, PublishedReportReference>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(
    kind: ReportKind,
  ): Promise<Result<PublishedReportReference | null, ActivityError>> {
    const found = this.references.get(kind);
    return OkResult(found ? { ...found } : null);
  }

  async upsert(
    reference: Omit<PublishedReportReference, "updatedAt">,
  ): Promise<Result<PublishedReportReference, ActivityError>> {
    const saved = { ...reference, updatedAt: this.now() };
    this.references.set(reference.reportKind, saved);
    return OkResult({ ...saved });
  }
}

export class MemoryTrackedChannelRepo implements TrackedChannelRepo {
  private readonly records = new Map<ChannelId, TrackedChannelRecord>();

  async list(): Promise<Result<TrackedChannelRecord[], ActivityError>> {
    return OkResult([...this.records.values()].map((record) => ({ ...record })));
  }

  async sync(
    current: TrackedChannelRecord[],
  ): Promise<Result<TrackedChannelSyncResult, ActivityError>> {
    const next = new Map(current.map((record) => [record.channelId, record]));
    let removed = 0;
    for (const channelId of this.records.keys()) {
      if (!next.has(channelId)) removed += 1;
    }
    let added = 0;
    for (const channelId of next.keys()) {
      if (!this.records.has(channelId)) added += 1;
    }

    this.records.clear();
    for (const [channelId, record] of next) {
      this.records.set(channelId, { ...record });
    }
    return OkResult({ added, removed, total: next.size });
  }
}

export const createMemoryPersistence = (): ActivityPersistence => ({
  counters: new MemoryCounterStore(),
  references: new MemoryReportReferenceRepo(),
  trackedChannels: new MemoryTrackedChannelRepo(),
});
