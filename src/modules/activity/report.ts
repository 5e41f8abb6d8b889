/**
 * Report builder: ranks a batch of channel metrics into a static snapshot.
 *
 * Pure: no I/O, no clock reads unless `generatedAt` is omitted.
 */
import { DEFAULT_MAX_REPORT_ENTRIES, type ReportKind } from "./constants";
import type { EntityMetrics, TrackedEntity } from "./types";

/** `score`: highest score first. `creation`: newest channel first. */
export type ReportMode = "score" | "creation";

export interface ReportEntry {
  entity: TrackedEntity;
  metrics: EntityMetrics;
}

export interface RankedReportEntry extends ReportEntry {
  /** 1-based position after sorting. */
  rank: number;
}

export interface ReportSummary {
  channelCount: number;
  totalCount: number;
  recentCount: number;
  averageScore: number;
}

export interface ActivityReport {
  kind: ReportKind;
  title: string;
  mode: ReportMode;
  generatedAt: Date;
  summary: ReportSummary;
  entries: RankedReportEntry[];
  /** Entries beyond `maxEntries`, counted in the summary but not listed. */
  omitted: number;
  empty: boolean;
}

export interface BuildReportOptions {
  kind: ReportKind;
  title: string;
  mode: ReportMode;
  maxEntries?: number;
  generatedAt?: Date;
}

const compareFor = (mode: ReportMode) =>
  mode === "score"
    ? (a: ReportEntry, b: ReportEntry) => b.metrics.score - a.metrics.score
    : (a: ReportEntry, b: ReportEntry) =>
        b.entity.createdAt.getTime() - a.entity.createdAt.getTime();

const summarize = (entries: ReportEntry[]): ReportSummary => {
  let totalCount = 0;
  let recentCount = 0;
  let scoreSum = 0;
  for (const { metrics } of entries) {
    totalCount += metrics.totalCount;
    recentCount += metrics.recentCount;
    scoreSum += metrics.score;
  }
  return {
    channelCount: entries.length,
    totalCount,
    recentCount,
    averageScore: entries.length > 0 ? scoreSum / entries.length : 0,
  };
};

/**
 * Sorts (stable; ties keep input order), caps and summarizes `entries`.
 * Empty input yields zero totals and `empty = true`.
 */
export function buildActivityReport(
  entries: readonly ReportEntry[],
  options: BuildReportOptions,
): ActivityReport {
  const maxEntries = Math.max(
    1,
    Math.trunc(options.maxEntries ?? DEFAULT_MAX_REPORT_ENTRIES),
  );
  // Array.prototype.sort is stable since ES2019.
  const sorted = [...entries].sort(compareFor(options.mode));
  const listed = sorted.slice(0, maxEntries);

  return {
    kind: options.kind,
    title: options.title,
    mode: options.mode,
    generatedAt: options.generatedAt ?? new Date(),
    summary: summarize(sorted),
    entries: listed.map((entry, index) => ({ ...entry, rank: index + 1 })),
    omitted: sorted.length - listed.length,
    empty: sorted.length === 0,
  };
}
