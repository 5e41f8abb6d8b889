/**
 * Snowflake Helpers Unit Tests.
 */
import { describe, it, expect } from "vitest";
import { millisToSnowflake, snowflakeToMillis, snowflakeToUnixSeconds } from "@/utils/snowflake";

describe("snowflake helpers", () => {
  it("decodes the creation time", () => {
    const id = (1_000n << 22n).toString();
    expect(snowflakeToMillis(id)).toBe(1_420_070_401_000);
    expect(snowflakeToUnixSeconds(id)).toBe(1_420_070_401);
  });

  it("encodes the smallest id for a time", () => {
    const millis = Date.UTC(2024, 0, 1);
    const id = millisToSnowflake(millis);
    expect(snowflakeToMillis(id)).toBe(millis);
    expect(snowflakeToMillis((BigInt(id) + 4_194_303n).toString())).toBe(millis);
    expect(millisToSnowflake(0)).toBe("0");
  });
});
