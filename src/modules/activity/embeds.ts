/**
 * Discord rendering of activity reports.
 */
import { Embed } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { EMBED_FIELD_VALUE_LIMIT, REPORT_FIELD_LINES, SCORE_WEIGHTS } from "./constants";
import type { ReportCycleOutcome } from "./cycle";
import type { RecalculateResult } from "./recalculate";
import type { ActivityReport, RankedReportEntry } from "./report";
import type { ActivityCounters, EntityMetrics } from "./types";

const MEDALS = ["🥇", "🥈", "🥉"] as const;
const ZERO_WIDTH = "\u200b";

const formatCount = (value: number): string => value.toLocaleString("en-US");

/** `MM/DD` in UTC. */
export const formatCreatedDate = (date: Date): string => {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${month}/${day}`;
};

const rankLabel = (rank: number): string => MEDALS[rank - 1] ?? `${rank}.`;

export const formatReportLine = (
  entry: RankedReportEntry,
  mode: ActivityReport["mode"],
): string => {
  const { entity, metrics } = entry;
  const counts = `(${formatCount(metrics.totalCount)} total, ${metrics.recentCount} recent)`;
  if (mode === "score") {
    return `${rankLabel(entry.rank)} <#${entity.id}> - **${metrics.score.toFixed(1)}** pts ${counts}`;
  }
  return `• <#${entity.id}> - Created ${formatCreatedDate(entity.createdAt)} ${counts}`;
};

/**
 * Packs lines into field values of at most `limit` characters, keeping line order.
 * A single line longer than `limit` is cut with an ellipsis.
 */
export const packFieldValues = (
  lines: readonly string[],
  limit = EMBED_FIELD_VALUE_LIMIT,
): string[] => {
  const values: string[] = [];
  let current = "";
  for (const line of lines) {
    const clipped = line.length > limit ? `${line.slice(0, limit - 1)}…` : line;
    const next = current ? `${current}\n${clipped}` : clipped;
    if (current && next.length > limit) {
      values.push(current);
      current = clipped;
    } else {
      current = next;
    }
  }
  if (current) values.push(current);
  return values;
};

export function renderActivityReport(report: ActivityReport): Embed {
  const isScore = report.mode === "score";
  const embed = new Embed()
    .setTitle(report.title)
    .setDescription(`Activity report for ${report.summary.channelCount} channels`)
    .setColor(isScore ? EmbedColors.Blurple : EmbedColors.Green)
    .setTimestamp(report.generatedAt);

  if (report.empty) {
    return embed
      .addFields({
        name: "No Data",
        value: "No channels found in this category",
        inline: false,
      })
      .setFooter({ text: "Report updates automatically" });
  }

  const { summary } = report;
  embed.addFields(
    {
      name: "📈 Summary",
      value: [
        `**Total Messages:** ${formatCount(summary.totalCount)}`,
        `**Recent (7d):** ${formatCount(summary.recentCount)}`,
        `**Avg Score:** ${summary.averageScore.toFixed(1)}`,
      ].join("\n"),
      inline: true,
    },
    { name: ZERO_WIDTH, value: ZERO_WIDTH, inline: true },
    { name: ZERO_WIDTH, value: ZERO_WIDTH, inline: true },
  );

  const lines = report.entries.map((entry) => formatReportLine(entry, report.mode));
  embed.addFields({
    name: isScore ? "🏆 Top Channels by Activity Score" : "📅 Channels by Creation Date",
    value: lines.slice(0, REPORT_FIELD_LINES).join("\n"),
    inline: false,
  });

  const overflow = lines.slice(REPORT_FIELD_LINES);
  if (overflow.length > 0 || report.omitted > 0) {
    if (report.omitted > 0) overflow.push(`…and ${report.omitted} more`);
    // Continuation fields carry a blank name so the list reads as one block.
    embed.addFields(
      packFieldValues(overflow).map((value, index) => ({
        name: index === 0 ? "📋 More Channels" : ZERO_WIDTH,
        value,
        inline: false,
      })),
    );
  }

  embed.addFields({
    name: "📋 Legend",
    value: isScore
      ? `**Score Formula:** (total × ${SCORE_WEIGHTS.lifetime}) + (recent × ${SCORE_WEIGHTS.recent})\n**Recent:** Messages in last 7 days`
      : "**Ordering:** Channels ordered by creation date (newest first)\n**Recent:** Messages in last 7 days",
    inline: false,
  });

  return embed.setFooter({
    text: isScore
      ? "Report updates automatically • Proposed channels"
      : "Report updates automatically • Permanent channels",
  });
}

export function buildChannelStatsEmbed(
  channelId: string,
  counters: ActivityCounters,
  metrics: EntityMetrics,
): Embed {
  const lastActivity =
    counters.lastEventTimestamp > 0 ? `<t:${counters.lastEventTimestamp}:R>` : "Never";
  return new Embed()
    .setTitle("📊 Channel Activity")
    .setDescription(`<#${channelId}>`)
    .setColor(EmbedColors.Blurple)
    .addFields(
      { name: "Total Messages", value: formatCount(metrics.totalCount), inline: true },
      { name: "Recent (7d)", value: formatCount(metrics.recentCount), inline: true },
      { name: "Score", value: metrics.score.toFixed(1), inline: true },
      { name: "Last Activity", value: lastActivity, inline: false },
    );
}

/** One status line per report kind, for admin replies. */
export const describeReportOutcome = (outcome: ReportCycleOutcome): string => {
  switch (outcome.status) {
    case "published":
      return `${outcome.kind}: ${outcome.outcome} (${outcome.channels} channels)`;
    case "skipped":
      return `${outcome.kind}: skipped (${outcome.reason})`;
    case "failed":
      return `${outcome.kind}: failed`;
  }
};

export function buildRecalculateEmbed(result: RecalculateResult): Embed {
  return new Embed()
    .setTitle("✅ Statistics Recalculation Complete")
    .setColor(result.failed > 0 ? EmbedColors.Yellow : EmbedColors.Green)
    .addFields(
      { name: "Channels Processed", value: `${result.processed}/${result.channels}`, inline: true },
      { name: "Errors", value: String(result.failed), inline: true },
      { name: "Messages Replayed", value: formatCount(result.replayed), inline: true },
      { name: "Excluded", value: `${result.excluded} report channels`, inline: true },
      { name: "Lookback Period", value: `${result.months} month(s)`, inline: true },
    );
}
