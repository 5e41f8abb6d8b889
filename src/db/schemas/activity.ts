/**
 * Zod schemas for the activity collections.
 * Purpose: define persisted shapes and defaults so every read is validated in the stores.
 */
import { z } from "zod";
import { ReportKind } from "@/modules/activity/constants";

export const ACTIVITY_COLLECTIONS = {
  counters: "channel_counters",
  events: "channel_activity_events",
  publishedReports: "published_reports",
  trackedChannels: "tracked_channels",
} as const;

/** One document per channel; `_id` is the channel id. */
export const ChannelCounterSchema = z.object({
  _id: z.string(),
  totalCount: z.number().int().nonnegative().catch(0),
  lastEventTimestamp: z.number().int().nonnegative().catch(0),
  updatedAt: z.date().optional(),
});

/** One document per recorded message; `_id` is `<channelId>:<eventId>`. */
export const ActivityEventSchema = z.object({
  _id: z.string(),
  channelId: z.string(),
  eventId: z.string(),
  timestamp: z.number().int(),
});

const ReportKindSchema = z.enum([ReportKind.Proposed, ReportKind.Permanent]);

/** One document per report kind; `_id` is the kind. */
export const PublishedReportSchema = z.object({
  _id: ReportKindSchema,
  reportKind: ReportKindSchema,
  destinationId: z.string(),
  externalMessageId: z.string().nullable().catch(null),
  updatedAt: z.date().catch(() => new Date(0)),
});

export const TrackedChannelSchema = z.object({
  _id: z.string(),
  channelId: z.string(),
  category: z.enum(["proposed", "permanent"]),
  createdAt: z.date(),
});

export type ChannelCounterDoc = z.infer<typeof ChannelCounterSchema>;
export type ActivityEventDoc = z.infer<typeof ActivityEventSchema>;
export type PublishedReportDoc = z.infer<typeof PublishedReportSchema>;
export type TrackedChannelDoc = z.infer<typeof TrackedChannelSchema>;

export const activityEventKey = (channelId: string, eventId: string): string =>
  `${channelId}:${eventId}`;
