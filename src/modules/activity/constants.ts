/**
 * Constants shared by the activity scoring engine.
 *
 * `ACTIVITY_WINDOW_DAYS` is both the recency window of the score and the default
 * retention window of the event log. The log only keeps what the score reads, so
 * widening the score window means widening retention too.
 */
export const ACTIVITY_WINDOW_DAYS = 7;

export const SECONDS_PER_DAY = 86_400;

/** Largest delay Node timers accept; longer ones fire after 1 ms instead. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_REPORT_INTERVAL_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);
export const MAX_RETENTION_INTERVAL_HOURS = Math.floor(MAX_TIMER_DELAY_MS / 3_600_000);

/** score = totalCount * lifetime + recentCount * recent */
export const SCORE_WEIGHTS = Object.freeze({
  lifetime: 0.4,
  recent: 0.6,
});

export const DEFAULT_REPORT_INTERVAL_MINUTES = 30;
export const DEFAULT_RETENTION_INTERVAL_HOURS = 6;
export const DEFAULT_MAX_REPORT_ENTRIES = 15;
/** Keeps a rendered report inside Discord's 6000-character embed limit. */
export const MAX_REPORT_ENTRIES = 50;

/** Discord's limit for one embed field value. */
export const EMBED_FIELD_VALUE_LIMIT = 1024;

/** Lines rendered in the first ranking field before spilling into "More channels". */
export const REPORT_FIELD_LINES = 10;

export const ReportKind = {
  Proposed: "proposed_activity",
  Permanent: "permanent_activity",
} as const;

export type ReportKind = (typeof ReportKind)[keyof typeof ReportKind];

export type ChannelCategory = "proposed" | "permanent";
