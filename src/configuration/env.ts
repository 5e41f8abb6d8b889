/**
 * Process-level configuration read from the environment.
 *
 * Role in system:
 * - Parses `process.env` once with zod into a typed, frozen `BotConfig`.
 * - The activity runtime, the Mongo client and the commands read from here; nothing
 *   else touches `process.env` directly (Seyfert's config file reads the token).
 *
 * Invariants:
 * - `activity.retentionDays` is never below `ACTIVITY_WINDOW_DAYS`: pruning the log
 *   tighter than the scoring window would make scores wrong.
 * - Job intervals fit in a Node timer delay (`MAX_TIMER_DELAY_MS`).
 *
 * Gotchas:
 * - `getConfig()` caches the first successful parse; tests build configs with
 *   `parseConfig(env)` instead.
 */
import { z } from "zod";
import {
  ACTIVITY_WINDOW_DAYS,
  DEFAULT_MAX_REPORT_ENTRIES,
  DEFAULT_REPORT_INTERVAL_MINUTES,
  DEFAULT_RETENTION_INTERVAL_HOURS,
  MAX_REPORT_ENTRIES,
  MAX_REPORT_INTERVAL_MINUTES,
  MAX_RETENTION_INTERVAL_HOURS,
} from "@/modules/activity/constants";

const snowflake = z
  .string()
  .trim()
  .regex(/^\d{17,20}$/, "must be a Discord snowflake");

const optionalSnowflake = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null))
  .pipe(snowflake.nullable());

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const boundedInt = (fallback: number, max: number, unit: string) =>
  z.coerce
    .number()
    .int()
    .positive()
    .max(max, `must be at most ${max} ${unit}`)
    .default(fallback);

const EnvSchema = z.object({
  GUILD_ID: snowflake,
  PROPOSED_CHANNEL_CATEGORY_ID: snowflake,
  PERMANENT_CHANNEL_CATEGORY_ID: snowflake,
  PROPOSED_ACTIVITY_REPORT_CHANNEL_ID: optionalSnowflake,
  PERMANENT_ACTIVITY_REPORT_CHANNEL_ID: optionalSnowflake,
  STATS_REFRESH_INTERVAL_MINUTES: boundedInt(
    DEFAULT_REPORT_INTERVAL_MINUTES,
    MAX_REPORT_INTERVAL_MINUTES,
    "minutes",
  ),
  ACTIVITY_RETENTION_DAYS: z.coerce
    .number()
    .int()
    .min(
      ACTIVITY_WINDOW_DAYS,
      `must be at least the ${ACTIVITY_WINDOW_DAYS}-day scoring window`,
    )
    .default(ACTIVITY_WINDOW_DAYS),
  ACTIVITY_RETENTION_INTERVAL_HOURS: boundedInt(
    DEFAULT_RETENTION_INTERVAL_HOURS,
    MAX_RETENTION_INTERVAL_HOURS,
    "hours",
  ),
  ACTIVITY_REPORT_MAX_ENTRIES: boundedInt(
    DEFAULT_MAX_REPORT_ENTRIES,
    MAX_REPORT_ENTRIES,
    "entries",
  ),
  STATS_RECALCULATION_MONTH_LIMIT: positiveInt(6),
  ACTIVITY_STORE_BACKEND: z.enum(["mongo", "memory"]).default("mongo"),
  MONGO_URI: z.string().trim().optional(),
  DB_NAME: z.string().trim().min(1).default("agora"),
  MONGO_TIMEOUT_MS: positiveInt(5_000),
});

export type StoreBackend = "mongo" | "memory";

export interface BotConfig {
  readonly guildId: string;
  readonly categories: {
    readonly proposed: string;
    readonly permanent: string;
  };
  readonly reportChannels: {
    readonly proposed: string | null;
    readonly permanent: string | null;
  };
  readonly activity: {
    readonly reportIntervalMinutes: number;
    readonly retentionDays: number;
    readonly retentionIntervalHours: number;
    readonly maxReportEntries: number;
    readonly recalculationMonthLimit: number;
    readonly backend: StoreBackend;
  };
  readonly mongo: {
    readonly uri: string | null;
    readonly dbName: string;
    readonly timeoutMs: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parses an environment map into `BotConfig`.
 *
 * @throws ConfigError with one line per invalid variable. Only the bootstrap calls
 * this path, where failing fast is the intended behaviour.
 */
export function parseConfig(env: NodeJS.ProcessEnv): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  const data = parsed.data;
  if (data.ACTIVITY_STORE_BACKEND === "mongo" && !data.MONGO_URI) {
    throw new ConfigError(["MONGO_URI: required when ACTIVITY_STORE_BACKEND=mongo"]);
  }

  return Object.freeze({
    guildId: data.GUILD_ID,
    categories: {
      proposed: data.PROPOSED_CHANNEL_CATEGORY_ID,
      permanent: data.PERMANENT_CHANNEL_CATEGORY_ID,
    },
    reportChannels: {
      proposed: data.PROPOSED_ACTIVITY_REPORT_CHANNEL_ID,
      permanent: data.PERMANENT_ACTIVITY_REPORT_CHANNEL_ID,
    },
    activity: {
      reportIntervalMinutes: data.STATS_REFRESH_INTERVAL_MINUTES,
      retentionDays: data.ACTIVITY_RETENTION_DAYS,
      retentionIntervalHours: data.ACTIVITY_RETENTION_INTERVAL_HOURS,
      maxReportEntries: data.ACTIVITY_REPORT_MAX_ENTRIES,
      recalculationMonthLimit: data.STATS_RECALCULATION_MONTH_LIMIT,
      backend: data.ACTIVITY_STORE_BACKEND,
    },
    mongo: {
      uri: data.MONGO_URI ? data.MONGO_URI : null,
      dbName: data.DB_NAME,
      timeoutMs: data.MONGO_TIMEOUT_MS,
    },
  });
}

let cached: BotConfig | null = null;

export function getConfig(): BotConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}
