import type { Duration } from "./Duration.js";

function ms(d: Duration): string {
  return `${Number(d) / 1e6}ms`;
}

/** A tick rate or message send rate outside its accepted range. */
export class InvalidRateError extends RangeError {
  override readonly name = "InvalidRateError";
  readonly setting: string;
  readonly value: unknown;

  constructor(setting: string, value: unknown, expected: string) {
    super(`Invalid ${setting}: ${String(value)} (expected ${expected})`);
    this.setting = setting;
    this.value = value;
  }
}

export class InvalidDurationError extends RangeError {
  override readonly name = "InvalidDurationError";

  constructor(value: Duration | number, expected: string) {
    const shown = typeof value === "bigint" ? ms(value) : String(value);
    super(`Invalid duration: ${shown} (expected ${expected})`);
  }
}

export class InvalidFrameNumberError extends RangeError {
  override readonly name = "InvalidFrameNumberError";

  constructor(field: string, value: number) {
    super(`Invalid ${field}: ${value} (expected an integer in 0..4294967295)`);
  }
}

/** advanceFrameChecked() was called with less than one frame of time banked. */
export class InsufficientElapsedTimeError extends Error {
  override readonly name = "InsufficientElapsedTimeError";
  readonly elapsed: Duration;
  readonly required: Duration;

  constructor(elapsed: Duration, required: Duration) {
    super(
      `Cannot advance frame: ${ms(elapsed)} banked, ${ms(required)} required`,
    );
    this.elapsed = elapsed;
    this.required = required;
  }
}
