/**
 * Error model of the activity engine.
 *
 * - `STORE_UNAVAILABLE`: the counter/reference backend failed (connectivity, timeout).
 * - `ENTITY_METRIC_FAILED`: one channel's metrics could not be computed; the cycle
 *   drops that channel and continues.
 * - `PUBLISH_TARGET_UNAVAILABLE`: the report destination is missing or send/edit failed.
 * - `DIRECTORY_UNAVAILABLE`: the channels of a category could not be listed.
 *
 * A vanished published message is not an error: the publish target reports it as the
 * `"not_found"` edit outcome and the reconciler recreates it.
 */
export type ActivityErrorCode =
  | "STORE_UNAVAILABLE"
  | "ENTITY_METRIC_FAILED"
  | "PUBLISH_TARGET_UNAVAILABLE"
  | "DIRECTORY_UNAVAILABLE";

export class ActivityError extends Error {
  constructor(
    public readonly code: ActivityErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ActivityError";
  }
}

export const storeUnavailable = (
  operation: string,
  cause: unknown,
): ActivityError =>
  new ActivityError("STORE_UNAVAILABLE", `Counter store failed during ${operation}`, {
    cause,
  });

export const publishUnavailable = (
  message: string,
  cause?: unknown,
): ActivityError =>
  new ActivityError("PUBLISH_TARGET_UNAVAILABLE", message, { cause });

export const directoryUnavailable = (
  categoryId: string,
  cause: unknown,
): ActivityError =>
  new ActivityError(
    "DIRECTORY_UNAVAILABLE",
    `Could not list channels of category ${categoryId}`,
    { cause },
  );
