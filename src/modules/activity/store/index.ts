/**
 * Persistence selection for the activity engine.
 * The backend is chosen once at startup from `ACTIVITY_STORE_BACKEND`.
 */
import type { StoreBackend } from "@/configuration/env";
import { createMongoReportReferences, createMongoTrackedChannels } from "@/db/repositories";
import { OkResult, type Result } from "@/utils/result";
import type { ActivityError } from "../errors";
import type { ActivityLogger, ActivityPersistence } from "../types";
import { createMemoryPersistence } from "./memory";
import { MongoCounterStore } from "./mongo";

export {
  MemoryCounterStore,
  MemoryReportReferenceRepo,
  MemoryTrackedChannelRepo,
  createMemoryPersistence,
} from "./memory";
export { MongoCounterStore } from "./mongo";

export interface PersistenceHandle {
  persistence: ActivityPersistence;
  /** Creates backend indexes; a no-op for the memory backend. */
  ensureIndexes(): Promise<Result<void, ActivityError>>;
}

export function createPersistence(
  backend: StoreBackend,
  logger: ActivityLogger,
): PersistenceHandle {
  if (backend === "memory") {
    return {
      persistence: createMemoryPersistence(),
      ensureIndexes: async () => OkResult<void, ActivityError>(undefined),
    };
  }

  const counters = new MongoCounterStore({ logger });
  return {
    persistence: {
      counters,
      references: createMongoReportReferences(logger),
      trackedChannels: createMongoTrackedChannels(logger),
    },
    ensureIndexes: () => counters.ensureIndexes(),
  };
}
