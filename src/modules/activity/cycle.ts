/**
 * Job bodies run by the scheduler.
 *
 * Both cycles isolate failures: one channel failing drops that channel, one report kind
 * failing still lets the other publish. Neither `run()` rejects.
 */
import type { ChannelId } from "@/db/types";
import { toError } from "@/utils/discordErrors";
import type { ActivityAggregator } from "./aggregator";
import type { ReportKind } from "./constants";
import { ActivityError, directoryUnavailable } from "./errors";
import type { PublishOutcome, ReportReconciler } from "./reconciler";
import type { TrackedChannelRegistry } from "./registry";
import {
  buildActivityReport,
  type ActivityReport,
  type ReportEntry,
  type ReportMode,
} from "./report";
import type {
  ActivityLogger,
  CounterStore,
  EntityDirectory,
  TrackedChannelSyncResult,
} from "./types";

export interface ReportTarget {
  kind: ReportKind;
  title: string;
  mode: ReportMode;
  categoryId: string;
  /** Channel the report is published to; `null` disables this report. */
  destinationId: ChannelId | null;
}

export type ReportCycleOutcome =
  | {
      kind: ReportKind;
      status: "published";
      outcome: PublishOutcome;
      channels: number;
      failedChannels: number;
    }
  | { kind: ReportKind; status: "skipped"; reason: string }
  | { kind: ReportKind; status: "failed"; error: Error };

export interface ReportCycleDeps<TPayload> {
  directory: EntityDirectory;
  aggregator: ActivityAggregator;
  reconciler: ReportReconciler<TPayload>;
  render: (report: ActivityReport) => TPayload;
  targets: readonly ReportTarget[];
  maxEntries: number;
  logger: ActivityLogger;
  now?: () => Date;
}

export class ReportCycle<TPayload> {
  private readonly excluded: ReadonlySet<ChannelId>;

  constructor(private readonly deps: ReportCycleDeps<TPayload>) {
    const destinations = deps.targets
      .map((target) => target.destinationId)
      .filter((id): id is ChannelId => id !== null);
    this.excluded = new Set(destinations);
  }

  async run(): Promise<ReportCycleOutcome[]> {
    const outcomes: ReportCycleOutcome[] = [];
    for (const target of this.deps.targets) {
      try {
        outcomes.push(await this.runTarget(target));
      } catch (error) {
        this.deps.logger.error(`[activity:report] ${target.kind} crashed`, error);
        outcomes.push({ kind: target.kind, status: "failed", error: toError(error) });
      }
    }
    return outcomes;
  }

  private async runTarget(target: ReportTarget): Promise<ReportCycleOutcome> {
    const { logger } = this.deps;
    if (!target.destinationId) {
      logger.warn(`[activity:report] no report channel configured for ${target.kind}`);
      return { kind: target.kind, status: "skipped", reason: "no destination" };
    }

    const listed = await this.deps.directory.listEntities(target.categoryId);
    if (listed.isErr()) {
      const error = directoryUnavailable(target.categoryId, listed.error);
      logger.error(`[activity:report] ${target.kind}: ${error.message}`, listed.error);
      return { kind: target.kind, status: "failed", error };
    }

    const entities = listed.value.filter((entity) => !this.excluded.has(entity.id));
    const computed = await Promise.all(
      entities.map(async (entity) => {
        const metrics = await this.deps.aggregator.metrics(entity.id);
        if (metrics.isOk()) return { entity, metrics: metrics.value };
        const error = new ActivityError(
          "ENTITY_METRIC_FAILED",
          `Metrics failed for channel ${entity.id}`,
          { cause: metrics.error },
        );
        logger.warn(`[activity:report] ${error.message}; excluded from ${target.kind}`, metrics.error);
        return null;
      }),
    );
    const entries = computed.filter((entry): entry is ReportEntry => entry !== null);

    const report = buildActivityReport(entries, {
      kind: target.kind,
      title: target.title,
      mode: target.mode,
      maxEntries: this.deps.maxEntries,
      generatedAt: this.deps.now?.() ?? new Date(),
    });

    const published = await this.deps.reconciler.publishOrUpdate(
      target.kind,
      target.destinationId,
      this.deps.render(report),
    );
    if (published.isErr()) {
      logger.error(`[activity:report] ${target.kind} publish failed`, published.error);
      return { kind: target.kind, status: "failed", error: published.error };
    }

    logger.info(
      `[activity:report] ${target.kind} ${published.value} (${entries.length} channels)`,
    );
    return {
      kind: target.kind,
      status: "published",
      outcome: published.value,
      channels: entries.length,
      failedChannels: entities.length - entries.length,
    };
  }
}

export interface RetentionOutcome {
  channels: number;
  purged: number;
  failedChannels: number;
  /** `null` when the registry sync failed or no registry is configured. */
  sync: TrackedChannelSyncResult | null;
}

export interface RetentionCycleDeps {
  store: CounterStore;
  aggregator: ActivityAggregator;
  retentionDays: number;
  registry?: TrackedChannelRegistry;
  logger: ActivityLogger;
}

export class RetentionCycle {
  constructor(private readonly deps: RetentionCycleDeps) {}

  async run(): Promise<RetentionOutcome> {
    const { logger } = this.deps;
    const outcome: RetentionOutcome = { channels: 0, purged: 0, failedChannels: 0, sync: null };

    const tracked = await this.deps.store.listTrackedEntities();
    if (tracked.isErr()) {
      logger.error("[activity:retention] could not list tracked channels", tracked.error);
    } else {
      for (const channelId of tracked.value) {
        const retained = await this.deps.aggregator.retain(channelId, this.deps.retentionDays);
        if (retained.isErr()) {
          outcome.failedChannels += 1;
          logger.warn(`[activity:retention] purge failed for ${channelId}`, retained.error);
          continue;
        }
        outcome.channels += 1;
        outcome.purged += retained.value;
      }
      if (outcome.channels > 0) {
        logger.info(
          `[activity:retention] pruned ${outcome.purged} entries across ${outcome.channels} channels`,
        );
      }
    }

    if (this.deps.registry) {
      const synced = await this.deps.registry.refresh();
      if (synced.isErr()) {
        logger.error("[activity:retention] tracked channel sync failed", synced.error);
      } else {
        outcome.sync = synced.value;
        if (synced.value.added > 0 || synced.value.removed > 0) {
          logger.info(
            `[activity:retention] tracked channels: +${synced.value.added} -${synced.value.removed}`,
          );
        }
      }
    }

    return outcome;
  }
}
