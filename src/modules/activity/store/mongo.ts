/**
 * MongoDB-backed counter store.
 *
 * Model:
 * - `channel_counters`: one document per channel with the lifetime total and the
 *   timestamp of the last recorded message.
 * - `channel_activity_events`: one document per recorded message, keyed by
 *   `<channelId>:<messageId>` so a replayed message is recorded once.
 *
 * Reads are validated with Zod `safeParse`; corrupt counter documents degrade to zero
 * instead of failing the whole report.
 */
import { MongoServerError, type Collection, type Db, type MongoClient } from "mongodb";
import { getDb, getMongoClient } from "@/db/mongo";
import {
  ACTIVITY_COLLECTIONS,
  ChannelCounterSchema,
  activityEventKey,
  type ActivityEventDoc,
  type ChannelCounterDoc,
} from "@/db/schemas/activity";
import type { ChannelId, MessageId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { storeUnavailable, type ActivityError } from "../errors";
import type {
  ActivityCounters,
  ActivityLogger,
  CounterStore,
  RecordOutcome,
  UnixSeconds,
} from "../types";

const DUPLICATE_KEY = 11000;
/** Returned by standalone servers when a transaction is started. */
const ILLEGAL_OPERATION = 20;

const hasServerCode = (error: unknown, code: number): boolean =>
  error instanceof MongoServerError && error.code === code;

export interface MongoCounterStoreOptions {
  logger: ActivityLogger;
  db?: () => Promise<Db>;
  client?: () => Promise<MongoClient>;
}

export class MongoCounterStore implements CounterStore {
  private readonly db: () => Promise<Db>;
  private readonly client: () => Promise<MongoClient>;
  private readonly logger: ActivityLogger;

  constructor(options: MongoCounterStoreOptions) {
    this.logger = options.logger;
    this.db = options.db ?? getDb;
    this.client = options.client ?? getMongoClient;
  }

  private async counters(): Promise<Collection<ChannelCounterDoc>> {
    return (await this.db()).collection<ChannelCounterDoc>(
      ACTIVITY_COLLECTIONS.counters,
    );
  }

  private async events(): Promise<Collection<ActivityEventDoc>> {
    return (await this.db()).collection<ActivityEventDoc>(
      ACTIVITY_COLLECTIONS.events,
    );
  }

  /** Creates the `{channelId, timestamp}` index used by window counts and pruning. */
  async ensureIndexes(): Promise<Result<void, ActivityError>> {
    try {
      const events = await this.events();
      await events.createIndex({ channelId: 1, timestamp: 1 });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(storeUnavailable("ensureIndexes", error));
    }
  }

  async recordEvent(
    entityId: ChannelId,
    eventId: MessageId,
    timestamp: UnixSeconds,
  ): Promise<Result<RecordOutcome, ActivityError>> {
    try {
      const events = await this.events();
      const inserted = await events.updateOne(
        { _id: activityEventKey(entityId, eventId) },
        { $setOnInsert: { channelId: entityId, eventId, timestamp } },
        { upsert: true },
      );
      if (inserted.upsertedCount === 0) {
        return OkResult({ recorded: false });
      }

      const counters = await this.counters();
      await counters.updateOne(
        { _id: entityId },
        {
          $inc: { totalCount: 1 },
          $set: { lastEventTimestamp: timestamp, updatedAt: new Date() },
        },
        { upsert: true },
      );
      return OkResult({ recorded: true });
    } catch (error) {
      // Two concurrent upserts of the same key: the loser sees E11000.
      if (hasServerCode(error, DUPLICATE_KEY)) {
        return OkResult({ recorded: false });
      }
      return ErrResult(storeUnavailable("recordEvent", error));
    }
  }

  async getCounters(
    entityId: ChannelId,
  ): Promise<Result<ActivityCounters, ActivityError>> {
    try {
      const counters = await this.counters();
      const raw = await counters.findOne({ _id: entityId });
      if (!raw) return OkResult({ totalCount: 0, lastEventTimestamp: 0 });

      const parsed = ChannelCounterSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.error("[activity:store] invalid counter document; using zero", {
          entityId,
          issues: parsed.error.issues,
        });
        return OkResult({ totalCount: 0, lastEventTimestamp: 0 });
      }
      return OkResult({
        totalCount: parsed.data.totalCount,
        lastEventTimestamp: parsed.data.lastEventTimestamp,
      });
    } catch (error) {
      return ErrResult(storeUnavailable("getCounters", error));
    }
  }

  async countSince(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>> {
    try {
      const events = await this.events();
      const count = await events.countDocuments({
        channelId: entityId,
        timestamp: { $gte: cutoff },
      });
      return OkResult(count);
    } catch (error) {
      return ErrResult(storeUnavailable("countSince", error));
    }
  }

  async purgeBefore(
    entityId: ChannelId,
    cutoff: UnixSeconds,
  ): Promise<Result<number, ActivityError>> {
    try {
      const events = await this.events();
      const res = await events.deleteMany({
        channelId: entityId,
        timestamp: { $lt: cutoff },
      });
      return OkResult(res.deletedCount);
    } catch (error) {
      return ErrResult(storeUnavailable("purgeBefore", error));
    }
  }

  async clear(entityId: ChannelId): Promise<Result<void, ActivityError>> {
    try {
      const [client, counters, events] = await Promise.all([
        this.client(),
        this.counters(),
        this.events(),
      ]);
      const session = client.startSession();
      try {
        await session.withTransaction(async () => {
          await events.deleteMany({ channelId: entityId }, { session });
          await counters.deleteOne({ _id: entityId }, { session });
        });
      } catch (error) {
        if (!hasServerCode(error, ILLEGAL_OPERATION)) throw error;
        // Standalone server: counter first so a half-cleared channel is no longer listed.
        await counters.deleteOne({ _id: entityId });
        await events.deleteMany({ channelId: entityId });
      } finally {
        await session.endSession();
      }
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(storeUnavailable("clear", error));
    }
  }

  async listTrackedEntities(): Promise<Result<ChannelId[], ActivityError>> {
    try {
      const counters = await this.counters();
      const docs = await counters
        .find({}, { projection: { _id: 1 } })
        .toArray();
      return OkResult(docs.map((doc) => doc._id));
    } catch (error) {
      return ErrResult(storeUnavailable("listTrackedEntities", error));
    }
  }
}
