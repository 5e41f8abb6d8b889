/** Discord epoch (2015-01-01T00:00:00.000Z) in milliseconds. */
export const DISCORD_EPOCH_MS = 1_420_070_400_000n;

/**
 * Creation time encoded in a snowflake, in milliseconds.
 * The upper 42 bits hold the milliseconds elapsed since the Discord epoch.
 */
export const snowflakeToMillis = (snowflake: string): number => {
  return Number((BigInt(snowflake) >> 22n) + DISCORD_EPOCH_MS);
};

/** Same as `snowflakeToMillis`, truncated to Unix seconds. */
export const snowflakeToUnixSeconds = (snowflake: string): number => {
  return Math.floor(snowflakeToMillis(snowflake) / 1000);
};

/**
 * Smallest snowflake that could have been created at `millis`.
 * Used as a `before`/`after` bound when paging message history by time.
 */
export const millisToSnowflake = (millis: number): string => {
  const offset = BigInt(Math.max(0, Math.trunc(millis))) - DISCORD_EPOCH_MS;
  if (offset <= 0n) return "0";
  return (offset << 22n).toString();
};
