/**
 * Unit tests for strftime-style timestamp parsing.
 */
import { describe, test, expect } from "vitest";
import { compileTimestampFormat, parseTimestamp } from "../src/core/timestamp.js";
import { ISO_SECONDS } from "../src/entities/account.js";

describe("parseTimestamp", () => {
  test("parses ISO seconds as UTC", () => {
    const d = parseTimestamp("2025-01-02T09:30:00", ISO_SECONDS);
    expect(d?.toISOString()).toBe("2025-01-02T09:30:00.000Z");
  });

  test("fractional seconds are truncated to milliseconds", () => {
    const d = parseTimestamp("20250102 09:30:00.123456", "%Y%m%d %H:%M:%S.%f");
    expect(d?.toISOString()).toBe("2025-01-02T09:30:00.123Z");
  });

  test("literal percent", () => {
    expect(parseTimestamp("2025%", "%Y%%")?.toISOString()).toBe("2025-01-01T00:00:00.000Z");
  });

  test("surrounding whitespace is ignored", () => {
    expect(parseTimestamp(" 2025-03-04T05:06:07 ", ISO_SECONDS)?.toISOString()).toBe(
      "2025-03-04T05:06:07.000Z",
    );
  });

  test("rejects mismatched text", () => {
    expect(parseTimestamp("2025-01-02", ISO_SECONDS)).toBeNull();
    expect(parseTimestamp("2025/01/02T09:30:00", ISO_SECONDS)).toBeNull();
  });

  test("rejects out-of-range fields", () => {
    expect(parseTimestamp("2025-13-01T00:00:00", ISO_SECONDS)).toBeNull();
    expect(parseTimestamp("2025-01-01T24:00:00", ISO_SECONDS)).toBeNull();
    expect(parseTimestamp("2025-02-30T00:00:00", ISO_SECONDS)).toBeNull();
  });

  test("accepts leap days", () => {
    expect(parseTimestamp("2024-02-29T00:00:00", ISO_SECONDS)?.toISOString()).toBe(
      "2024-02-29T00:00:00.000Z",
    );
  });
});

describe("compileTimestampFormat", () => {
  test("unsupported directive", () => {
    expect(() => compileTimestampFormat("%Y-%q")).toThrow(
      'Unsupported timestamp directive %q in "%Y-%q"',
    );
  });

  test("compiled formats are cached", () => {
    expect(compileTimestampFormat(ISO_SECONDS)).toBe(compileTimestampFormat(ISO_SECONDS));
  });
});
