import { InvalidDurationError } from "./errors.js";

/**
 * Durations are integer nanoseconds held in a `bigint`, so per-frame
 * arithmetic never drifts from floating-point rounding.
 */
export type Duration = bigint;

export const NANOS_PER_SECOND = 1_000_000_000n;

export const ZERO_DURATION: Duration = 0n;

export function fromSeconds(seconds: number): Duration {
  return fromNanos(seconds * 1e9);
}

/** Fractional milliseconds are kept down to the nanosecond. */
export function fromMillis(ms: number): Duration {
  return fromNanos(ms * 1e6);
}

/** Throws InvalidDurationError for NaN or infinite input. */
export function fromNanos(nanos: number): Duration {
  if (!Number.isFinite(nanos)) {
    throw new InvalidDurationError(nanos, "a finite number of nanoseconds");
  }
  return BigInt(Math.round(nanos));
}

export function toMillis(d: Duration): number {
  return Number(d) / 1e6;
}

export function toSeconds(d: Duration): number {
  return Number(d) / 1e9;
}

/** Human-readable form for logs, e.g. "600ms". */
export function formatDuration(d: Duration): string {
  return `${toMillis(d)}ms`;
}
