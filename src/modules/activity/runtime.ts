/**
 * Composition root of the activity engine.
 *
 * Role in system:
 * - `createActivityRuntime` wires persistence, platform adapters, cycles and the
 *   scheduler once at bootstrap, before the gateway connects.
 * - Events and commands reach it through `getActivityRuntime()`, which is `null` when
 *   the engine could not be initialized; callers check once and degrade.
 *
 * Gotchas:
 * - `markReady()` may arrive before `start()`; readiness is a promise, so the order
 *   does not matter.
 */
import { Logger, type Embed, type UsingClient } from "seyfert";
import type { BotConfig } from "@/configuration/env";
import { ActivityAggregator, systemClock } from "./aggregator";
import { ReportKind } from "./constants";
import { ReportCycle, RetentionCycle, type ReportTarget } from "./cycle";
import { renderActivityReport } from "./embeds";
import {
  SeyfertChannelDirectory,
  SeyfertMessageHistory,
  SeyfertPublishTarget,
} from "./platform/seyfert";
import { ActivityRecalculator } from "./recalculate";
import { ReportReconciler } from "./reconciler";
import { TrackedChannelRegistry } from "./registry";
import { ActivityScheduler } from "./scheduler";
import { createPersistence } from "./store";
import { ActivityTracker } from "./tracker";
import type { ActivityLogger, Clock, CounterStore } from "./types";

export interface ActivityRuntime {
  readonly config: BotConfig;
  readonly store: CounterStore;
  readonly aggregator: ActivityAggregator;
  readonly tracker: ActivityTracker;
  readonly registry: TrackedChannelRegistry;
  readonly scheduler: ActivityScheduler;
  readonly recalculator: ActivityRecalculator;
  markReady(): void;
  /** Starts both jobs once the bot is ready. */
  start(): Promise<void>;
  stop(): void;
}

export interface ActivityRuntimeOptions {
  logger?: ActivityLogger;
  clock?: Clock;
}

export const reportTargets = (config: BotConfig): ReportTarget[] => [
  {
    kind: ReportKind.Proposed,
    title: "📊 Proposed Channels Activity",
    mode: "score",
    categoryId: config.categories.proposed,
    destinationId: config.reportChannels.proposed,
  },
  {
    kind: ReportKind.Permanent,
    title: "📊 Permanent Channels Activity",
    mode: "creation",
    categoryId: config.categories.permanent,
    destinationId: config.reportChannels.permanent,
  },
];

const reportChannelIds = (config: BotConfig): string[] =>
  [config.reportChannels.proposed, config.reportChannels.permanent].filter(
    (id): id is string => id !== null,
  );

let current: ActivityRuntime | null = null;

export function getActivityRuntime(): ActivityRuntime | null {
  return current;
}

/**
 * Builds the runtime and registers it for events and commands.
 * Returns `null` (and registers nothing) when the store cannot be prepared.
 */
export async function createActivityRuntime(
  client: UsingClient,
  config: BotConfig,
  options: ActivityRuntimeOptions = {},
): Promise<ActivityRuntime | null> {
  const logger = options.logger ?? new Logger({ name: "[activity]" });
  const clock = options.clock ?? systemClock;

  const { persistence, ensureIndexes } = createPersistence(config.activity.backend, logger);
  const indexed = await ensureIndexes();
  if (indexed.isErr()) {
    logger.error("[activity] store initialization failed; activity disabled", indexed.error);
    return null;
  }

  const directory = new SeyfertChannelDirectory(client, config.guildId);
  const aggregator = new ActivityAggregator(persistence.counters, clock);
  const registry = new TrackedChannelRegistry(
    directory,
    persistence.trackedChannels,
    config.categories,
  );
  const excludedChannels = reportChannelIds(config);

  const reportCycle = new ReportCycle<Embed>({
    directory,
    aggregator,
    reconciler: new ReportReconciler(
      persistence.references,
      new SeyfertPublishTarget(client),
      logger,
    ),
    render: renderActivityReport,
    targets: reportTargets(config),
    maxEntries: config.activity.maxReportEntries,
    logger,
  });
  const retentionCycle = new RetentionCycle({
    store: persistence.counters,
    aggregator,
    retentionDays: config.activity.retentionDays,
    registry,
    logger,
  });
  const scheduler = new ActivityScheduler({
    reportIntervalMinutes: config.activity.reportIntervalMinutes,
    retentionIntervalHours: config.activity.retentionIntervalHours,
    reportCycle,
    retentionCycle,
    logger,
  });

  let resolveReady: () => void = () => undefined;
  const ready = new Promise<void>((resolve) => {
    resolveReady = resolve;
  });

  const runtime: ActivityRuntime = {
    config,
    store: persistence.counters,
    aggregator,
    registry,
    scheduler,
    tracker: new ActivityTracker({
      store: persistence.counters,
      directory,
      guildId: config.guildId,
      categories: config.categories,
      excludedChannels,
      logger,
    }),
    recalculator: new ActivityRecalculator({
      store: persistence.counters,
      directory,
      history: new SeyfertMessageHistory(client),
      categories: config.categories,
      excludedChannels,
      maxMonths: config.activity.recalculationMonthLimit,
      clock,
      logger,
    }),
    markReady: () => resolveReady(),
    start: () => scheduler.start(ready),
    stop: () => scheduler.stop(),
  };

  current = runtime;
  logger.info(`[activity] runtime ready (backend: ${config.activity.backend})`);
  return runtime;
}
