import { describe, expect, it } from "vitest";
import { InvalidDurationError } from "./errors.js";
import { formatDuration, fromMillis, fromSeconds, toMillis, toSeconds } from "./Duration.js";

describe("Duration", () => {
  it("converts to integer nanoseconds", () => {
    expect(fromSeconds(1)).toBe(1_000_000_000n);
    expect(fromMillis(50)).toBe(50_000_000n);
    expect(fromMillis(16.5)).toBe(16_500_000n);
  });

  it("converts back to milliseconds and seconds", () => {
    expect(toMillis(600_000_000n)).toBe(600);
    expect(toSeconds(2_500_000_000n)).toBe(2.5);
  });

  it("rejects NaN and infinite input", () => {
    expect(() => fromMillis(Number.NaN)).toThrow(InvalidDurationError);
    expect(() => fromSeconds(Number.POSITIVE_INFINITY)).toThrow(
      "Invalid duration: Infinity (expected a finite number of nanoseconds)",
    );
  });

  it("formats as milliseconds", () => {
    expect(formatDuration(600_000_000n)).toBe("600ms");
    expect(formatDuration(16_500_000n)).toBe("16.5ms");
  });
});
