export * from "./constants";
export * from "./errors";
export * from "./types";
export { ActivityAggregator, computeScore, systemClock } from "./aggregator";
export { buildActivityReport } from "./report";
export type { ActivityReport, RankedReportEntry, ReportEntry, ReportMode, ReportSummary } from "./report";
export { renderActivityReport } from "./embeds";
export { ReportReconciler, type PublishOutcome } from "./reconciler";
export { TrackedChannelRegistry, type CategoryIds } from "./registry";
export { ReportCycle, RetentionCycle } from "./cycle";
export type { ReportCycleOutcome, ReportTarget, RetentionOutcome } from "./cycle";
export { ActivityScheduler, PeriodicJob, type JobState, type TickResult } from "./scheduler";
export { ActivityTracker, type TrackableMessage, type TrackResult } from "./tracker";
export { ActivityRecalculator, clampMonths, type RecalculateResult } from "./recalculate";
export { createActivityRuntime, getActivityRuntime, type ActivityRuntime } from "./runtime";
