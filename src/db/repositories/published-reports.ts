/**
 * Repository of published activity reports.
 *
 * Model:
 * - `published_reports`: one document per report kind (`_id = reportKind`) pointing at
 *   the Discord message that currently shows that report.
 *
 * The kind is the document id, so there is never more than one reference per kind.
 */
import { getDb } from "@/db/mongo";
import {
  ACTIVITY_COLLECTIONS,
  PublishedReportSchema,
  type PublishedReportDoc,
} from "@/db/schemas/activity";
import type { ReportKind } from "@/modules/activity/constants";
import { storeUnavailable, type ActivityError } from "@/modules/activity/errors";
import type {
  ActivityLogger,
  PublishedReportReference,
  ReportReferenceRepo,
} from "@/modules/activity/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

const reportsCol = async () =>
  (await getDb()).collection<PublishedReportDoc>(
    ACTIVITY_COLLECTIONS.publishedReports,
  );

const toReference = (doc: PublishedReportDoc): PublishedReportReference => ({
  reportKind: doc.reportKind,
  destinationId: doc.destinationId,
  externalMessageId: doc.externalMessageId,
  updatedAt: doc.updatedAt,
});

/**
 * Reads the reference for `kind`.
 * A malformed document is logged and reported as missing, so the next publish
 * overwrites it with a fresh message.
 */
export async function getPublishedReport(
  kind: ReportKind,
  logger: ActivityLogger,
): Promise<Result<PublishedReportReference | null, ActivityError>> {
  try {
    const col = await reportsCol();
    const raw = await col.findOne({ _id: kind });
    if (!raw) return OkResult(null);

    const parsed = PublishedReportSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error("[published-reports] invalid document; treating as missing", {
        kind,
        issues: parsed.error.issues,
      });
      return OkResult(null);
    }
    return OkResult(toReference(parsed.data));
  } catch (error) {
    return ErrResult(storeUnavailable("getPublishedReport", error));
  }
}

export async function upsertPublishedReport(
  reference: Omit<PublishedReportReference, "updatedAt">,
): Promise<Result<PublishedReportReference, ActivityError>> {
  try {
    const col = await reportsCol();
    const updatedAt = new Date();
    await col.updateOne(
      { _id: reference.reportKind },
      {
        $set: {
          reportKind: reference.reportKind,
          destinationId: reference.destinationId,
          externalMessageId: reference.externalMessageId,
          updatedAt,
        },
      },
      { upsert: true },
    );
    return OkResult({ ...reference, updatedAt });
  } catch (error) {
    return ErrResult(storeUnavailable("upsertPublishedReport", error));
  }
}

export const createMongoReportReferences = (
  logger: ActivityLogger,
): ReportReferenceRepo => ({
  get: (kind) => getPublishedReport(kind, logger),
  upsert: upsertPublishedReport,
});
