/**
 * Configuration Unit Tests.
 *
 * Purpose: defaults, optional report channels, and the validation errors that stop
 * the bootstrap.
 */
import { describe, it, expect } from "vitest";
import { ConfigError, parseConfig } from "@/configuration/env";

const BASE_ENV = {
  GUILD_ID: "500000000000000001",
  PROPOSED_CHANNEL_CATEGORY_ID: "300000000000000001",
  PERMANENT_CHANNEL_CATEGORY_ID: "300000000000000002",
  ACTIVITY_STORE_BACKEND: "memory",
};

const captureIssues = (env: NodeJS.ProcessEnv): string[] => {
  try {
    parseConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
};

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig(BASE_ENV);

    expect(config.guildId).toBe("500000000000000001");
    expect(config.reportChannels).toEqual({ proposed: null, permanent: null });
    expect(config.activity).toEqual({
      reportIntervalMinutes: 30,
      retentionDays: 7,
      retentionIntervalHours: 6,
      maxReportEntries: 15,
      recalculationMonthLimit: 6,
      backend: "memory",
    });
    expect(config.mongo).toEqual({ uri: null, dbName: "agora", timeoutMs: 5000 });
  });

  it("reads numeric overrides and report channels", () => {
    const config = parseConfig({
      ...BASE_ENV,
      PROPOSED_ACTIVITY_REPORT_CHANNEL_ID: "400000000000000001",
      PERMANENT_ACTIVITY_REPORT_CHANNEL_ID: "",
      STATS_REFRESH_INTERVAL_MINUTES: "10",
      ACTIVITY_RETENTION_DAYS: "14",
    });

    expect(config.reportChannels).toEqual({ proposed: "400000000000000001", permanent: null });
    expect(config.activity.reportIntervalMinutes).toBe(10);
    expect(config.activity.retentionDays).toBe(14);
  });

  it("rejects a retention window shorter than the scoring window", () => {
    expect(captureIssues({ ...BASE_ENV, ACTIVITY_RETENTION_DAYS: "3" })).toEqual([
      "ACTIVITY_RETENTION_DAYS: must be at least the 7-day scoring window",
    ]);
  });

  it("accepts job intervals up to the largest timer delay", () => {
    const config = parseConfig({
      ...BASE_ENV,
      STATS_REFRESH_INTERVAL_MINUTES: "35791",
      ACTIVITY_RETENTION_INTERVAL_HOURS: "596",
    });

    expect(config.activity.reportIntervalMinutes).toBe(35791);
    expect(config.activity.retentionIntervalHours).toBe(596);
  });

  it("rejects job intervals a Node timer cannot hold", () => {
    expect(
      captureIssues({
        ...BASE_ENV,
        STATS_REFRESH_INTERVAL_MINUTES: "35792",
        ACTIVITY_RETENTION_INTERVAL_HOURS: "720",
      }),
    ).toEqual([
      "STATS_REFRESH_INTERVAL_MINUTES: must be at most 35791 minutes",
      "ACTIVITY_RETENTION_INTERVAL_HOURS: must be at most 596 hours",
    ]);
  });

  it("caps the report size at 50 entries", () => {
    expect(parseConfig({ ...BASE_ENV, ACTIVITY_REPORT_MAX_ENTRIES: "50" }).activity.maxReportEntries).toBe(50);
    expect(captureIssues({ ...BASE_ENV, ACTIVITY_REPORT_MAX_ENTRIES: "51" })).toEqual([
      "ACTIVITY_REPORT_MAX_ENTRIES: must be at most 50 entries",
    ]);
  });

  it("requires a Mongo URI for the mongo backend", () => {
    expect(captureIssues({ ...BASE_ENV, ACTIVITY_STORE_BACKEND: "mongo" })).toEqual([
      "MONGO_URI: required when ACTIVITY_STORE_BACKEND=mongo",
    ]);
  });

  it("rejects malformed snowflakes", () => {
    expect(captureIssues({ ...BASE_ENV, GUILD_ID: "not-a-snowflake" })).toEqual([
      "GUILD_ID: must be a Discord snowflake",
    ]);
  });
});
