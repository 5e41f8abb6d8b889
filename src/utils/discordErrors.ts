/**
 * Helpers to classify Discord REST errors by their JSON error code.
 *
 * Seyfert surfaces REST failures as errors carrying the API `code`. "Unknown
 * Message" (10008) means a stored report reference points at a deleted message.
 */
const UNKNOWN_MESSAGE = 10008;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object";

const getDiscordErrorCode = (error: unknown): number | null => {
  if (!isRecord(error)) return null;
  const code = error.code;
  if (typeof code === "number") return code;
  if (typeof code === "string" && code.trim()) {
    const parsed = Number(code);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const isUnknownMessageError = (error: unknown): boolean =>
  getDiscordErrorCode(error) === UNKNOWN_MESSAGE;

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
