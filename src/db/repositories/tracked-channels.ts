/**
 * Repository of tracked channels.
 *
 * Model:
 * - `tracked_channels`: one document per channel (`_id = channelId`) currently living in
 *   the proposed or permanent category. Rebuilt from the guild on every sync.
 */
import type { AnyBulkWriteOperation } from "mongodb";
import { getDb } from "@/db/mongo";
import {
  ACTIVITY_COLLECTIONS,
  TrackedChannelSchema,
  type TrackedChannelDoc,
} from "@/db/schemas/activity";
import { storeUnavailable, type ActivityError } from "@/modules/activity/errors";
import type {
  ActivityLogger,
  TrackedChannelRecord,
  TrackedChannelRepo,
  TrackedChannelSyncResult,
} from "@/modules/activity/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

const trackedCol = async () =>
  (await getDb()).collection<TrackedChannelDoc>(
    ACTIVITY_COLLECTIONS.trackedChannels,
  );

/** Lists tracked channels; malformed documents are logged and skipped. */
export async function listTrackedChannels(
  logger: ActivityLogger,
): Promise<Result<TrackedChannelRecord[], ActivityError>> {
  try {
    const col = await trackedCol();
    const docs = await col.find({}).toArray();
    const records: TrackedChannelRecord[] = [];
    for (const doc of docs) {
      const parsed = TrackedChannelSchema.safeParse(doc);
      if (!parsed.success) {
        logger.error("[tracked-channels] skipping invalid document", {
          id: doc._id,
          issues: parsed.error.issues,
        });
        continue;
      }
      records.push({
        channelId: parsed.data.channelId,
        category: parsed.data.category,
        createdAt: parsed.data.createdAt,
      });
    }
    return OkResult(records);
  } catch (error) {
    return ErrResult(storeUnavailable("listTrackedChannels", error));
  }
}

/**
 * Makes the collection match `current`: upserts every record and deletes channels
 * that left both categories.
 */
export async function syncTrackedChannels(
  current: TrackedChannelRecord[],
): Promise<Result<TrackedChannelSyncResult, ActivityError>> {
  try {
    const col = await trackedCol();
    const ids = current.map((record) => record.channelId);

    const ops: AnyBulkWriteOperation<TrackedChannelDoc>[] = current.map(
      (record) => ({
        updateOne: {
          filter: { _id: record.channelId },
          update: {
            $set: {
              channelId: record.channelId,
              category: record.category,
              createdAt: record.createdAt,
            },
          },
          upsert: true,
        },
      }),
    );

    let added = 0;
    if (ops.length > 0) {
      const res = await col.bulkWrite(ops, { ordered: false });
      added = res.upsertedCount;
    }
    const removed = await col.deleteMany({ _id: { $nin: ids } });

    return OkResult({
      added,
      removed: removed.deletedCount,
      total: current.length,
    });
  } catch (error) {
    return ErrResult(storeUnavailable("syncTrackedChannels", error));
  }
}

export const createMongoTrackedChannels = (
  logger: ActivityLogger,
): TrackedChannelRepo => ({
  list: () => listTrackedChannels(logger),
  sync: syncTrackedChannels,
});
