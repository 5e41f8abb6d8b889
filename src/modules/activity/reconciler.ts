/**
 * Keeps one live published message per report kind.
 *
 * publishOrUpdate:
 * 1. Read the stored reference for the kind.
 * 2. Same destination and a message id: edit in place. A vanished message falls through.
 * 3. Send a new message and repoint the reference to it.
 * 4. After a destination move, delete the message left in the old destination.
 *    A failed delete is logged and does not fail the publish.
 *
 * A send/edit failure leaves the stored reference untouched; the next cycle retries.
 */
import type { ChannelId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ReportKind } from "./constants";
import type { ActivityError } from "./errors";
import type { ActivityLogger, PublishTarget, ReportReferenceRepo } from "./types";

/** `updated`: edited in place. `created`: first publish. `recreated`: replaced a lost or moved message. */
export type PublishOutcome = "updated" | "created" | "recreated";

export class ReportReconciler<TPayload> {
  constructor(
    private readonly references: ReportReferenceRepo,
    private readonly target: PublishTarget<TPayload>,
    private readonly logger?: ActivityLogger,
  ) {}

  async publishOrUpdate(
    kind: ReportKind,
    destinationId: ChannelId,
    payload: TPayload,
  ): Promise<Result<PublishOutcome, ActivityError>> {
    const stored = await this.references.get(kind);
    if (stored.isErr()) return ErrResult(stored.error);

    const reference = stored.value;
    let outcome: PublishOutcome = "created";
    let superseded: { destinationId: ChannelId; messageId: string } | null = null;

    if (reference?.externalMessageId) {
      outcome = "recreated";
      if (reference.destinationId === destinationId) {
        const edited = await this.target.edit(
          destinationId,
          reference.externalMessageId,
          payload,
        );
        if (edited.isErr()) return ErrResult(edited.error);
        if (edited.value === "edited") return OkResult("updated");

        this.logger?.warn(
          `[activity:reconciler] ${kind} message ${reference.externalMessageId} is gone; recreating`,
        );
      } else {
        this.logger?.info(
          `[activity:reconciler] ${kind} destination moved ${reference.destinationId} -> ${destinationId}`,
        );
        superseded = {
          destinationId: reference.destinationId,
          messageId: reference.externalMessageId,
        };
      }
    }

    const sent = await this.target.send(destinationId, payload);
    if (sent.isErr()) return ErrResult(sent.error);

    const saved = await this.references.upsert({
      reportKind: kind,
      destinationId,
      externalMessageId: sent.value,
    });
    if (saved.isErr()) return ErrResult(saved.error);

    if (superseded) {
      const removed = await this.target.remove(superseded.destinationId, superseded.messageId);
      if (removed.isErr()) {
        this.logger?.warn(
          `[activity:reconciler] could not delete old ${kind} message ${superseded.messageId}`,
          removed.error,
        );
      }
    }

    return OkResult(outcome);
  }
}
