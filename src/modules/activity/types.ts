/**
 * Contracts of the activity engine and its collaborators.
 *
 * The core (store, aggregator, report builder, reconciler, cycles) only talks to these
 * interfaces; Mongo and Seyfert implementations live in `store/` and `platform/`.
 */
import type { ChannelId, MessageId } from "@/db/types";
import type { Result } from "@/utils/result";
import type { ChannelCategory, ReportKind } from "./constants";
import type { ActivityError } from "./errors";

export type UnixSeconds = number;

/** Current time in Unix seconds. Injected so windowed queries are testable. */
export type Clock = () => UnixSeconds;

/** Subset of Seyfert's `Logger` the engine writes to. */
export interface ActivityLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ActivityCounters {
  totalCount: number;
  lastEventTimestamp: UnixSeconds;
}

export interface RecordOutcome {
  /** `false` when the event id was already in the log (replay). */
  recorded: boolean;
}

/**
 * Per-channel activity counters plus a time-ordered event log.
 * Every method reports backend failures as `STORE_UNAVAILABLE`; none retries.
 */
export interface CounterStore {
  recordEvent(
    entityId: ChannelId,
    eventId: MessageId,
    timestamp: UnixSeconds,
  ): Promise<Result<RecordOutcome, ActivityError>>;
  getCounters(entityId: ChannelId): Promise<Result<ActivityCounters, ActivityError>>;
  /** Log entries with `timestamp >= cutoff`. */
  countSince(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>>;
  /** Deletes log entries with `timestamp < cutoff`; the lifetime total is untouched. */
  purgeBefore(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>>;
  clear(entityId: ChannelId): Promise<Result<void, ActivityError>>;
  listTrackedEntities(): Promise<Result<ChannelId[], ActivityError>>;
}

export interface EntityMetrics {
  totalCount: number;
  recentCount: number;
  score: number;
}

/** A channel as seen by the platform: identity plus the metadata reports need. */
export interface TrackedEntity {
  id: ChannelId;
  name: string | null;
  createdAt: Date;
}

export interface PublishedReportReference {
  reportKind: ReportKind;
  destinationId: ChannelId;
  externalMessageId: MessageId | null;
  updatedAt: Date;
}

export interface ReportReferenceRepo {
  get(
    kind: ReportKind,
  ): Promise<Result<PublishedReportReference | null, ActivityError>>;
  upsert(
    reference: Omit<PublishedReportReference, "updatedAt">,
  ): Promise<Result<PublishedReportReference, ActivityError>>;
}

export type EditOutcome = "edited" | "not_found";

/** Where report documents are published (a Discord channel in production). */
export interface PublishTarget<TPayload> {
  send(
    destinationId: ChannelId,
    payload: TPayload,
  ): Promise<Result<MessageId, ActivityError>>;
  edit(
    destinationId: ChannelId,
    messageId: MessageId,
    payload: TPayload,
  ): Promise<Result<EditOutcome, ActivityError>>;
  /** Deletes a published message. A message that is already gone counts as removed. */
  remove(
    destinationId: ChannelId,
    messageId: MessageId,
  ): Promise<Result<void, ActivityError>>;
}

/** Platform-owned view of which channels exist in each tracked category. */
export interface EntityDirectory {
  listEntities(categoryId: string): Promise<Result<TrackedEntity[], Error>>;
  /** Parent category of a text channel, or `null` when it has none or is unknown. */
  resolveCategory(channelId: ChannelId): Promise<string | null>;
}

export interface HistoricalMessage {
  id: MessageId;
  authorIsBot: boolean;
  timestamp: UnixSeconds;
}

/** Channel message history, newest first, stopping at `since`. */
export interface MessageHistory {
  iterateSince(
    channelId: ChannelId,
    since: UnixSeconds,
  ): AsyncIterable<HistoricalMessage>;
}

export interface TrackedChannelRecord {
  channelId: ChannelId;
  category: ChannelCategory;
  createdAt: Date;
}

export interface TrackedChannelSyncResult {
  added: number;
  removed: number;
  total: number;
}

export interface TrackedChannelRepo {
  list(): Promise<Result<TrackedChannelRecord[], ActivityError>>;
  /** Replaces the stored set with `current`, returning how many rows changed. */
  sync(
    current: TrackedChannelRecord[],
  ): Promise<Result<TrackedChannelSyncResult, ActivityError>>;
}

/** Everything the engine persists, behind one handle chosen at startup. */
export interface ActivityPersistence {
  counters: CounterStore;
  references: ReportReferenceRepo;
  trackedChannels: TrackedChannelRepo;
}
