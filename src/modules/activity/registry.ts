/**
 * Tracked channel registry: mirrors the live contents of the proposed and permanent
 * categories into the tracked channel repository.
 */
import { ErrResult, type Result } from "@/utils/result";
import type { ChannelCategory } from "./constants";
import { directoryUnavailable, type ActivityError } from "./errors";
import type {
  EntityDirectory,
  TrackedChannelRecord,
  TrackedChannelRepo,
  TrackedChannelSyncResult,
} from "./types";

export type CategoryIds = Readonly<Record<ChannelCategory, string>>;

const CATEGORY_ORDER: readonly ChannelCategory[] = ["proposed", "permanent"];

export class TrackedChannelRegistry {
  constructor(
    private readonly directory: EntityDirectory,
    private readonly repo: TrackedChannelRepo,
    private readonly categories: CategoryIds,
  ) {}

  /**
   * Replaces the stored set with the channels currently in both categories.
   * If either category cannot be listed nothing is written, so a transient platform
   * error never empties the registry.
   */
  async refresh(): Promise<Result<TrackedChannelSyncResult, ActivityError>> {
    const records: TrackedChannelRecord[] = [];
    for (const category of CATEGORY_ORDER) {
      const listed = await this.directory.listEntities(this.categories[category]);
      if (listed.isErr()) {
        return ErrResult(
          directoryUnavailable(this.categories[category], listed.error),
        );
      }
      for (const entity of listed.value) {
        records.push({ channelId: entity.id, category, createdAt: entity.createdAt });
      }
    }
    return this.repo.sync(records);
  }
}
