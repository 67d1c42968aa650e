import {
  DEFAULT_INITIAL_FRAME_LAG,
  DEFAULT_MESSAGE_SEND_RATE,
  DEFAULT_PER_FRAME_DURATION,
  MAX_FRAME_NUMBER,
  MAX_MESSAGE_SEND_RATE,
} from "../config/constants.js";
import { type Duration, NANOS_PER_SECOND, ZERO_DURATION } from "./Duration.js";
import {
  InsufficientElapsedTimeError,
  InvalidDurationError,
  InvalidFrameNumberError,
  InvalidRateError,
} from "./errors.js";
import { FrameRange } from "./FrameRange.js";

export interface FrameAccumulatorOptions {
  /** Network frames per second. Omit for the 100 frames/minute default. */
  tickRateHz?: number;
  /** Send a message every Nth frame. */
  messageSendRate?: number;
  /** Frames owed before any time is banked. Defaults to 1 so frame 0 runs. */
  initialFrameLag?: number;
}

export interface FrameAccumulatorSnapshot {
  frameNumber: number;
  elapsed: Duration;
  perFrameDuration: Duration;
  messageSendRate: number;
  frameLag: number;
}

/**
 * Fixed-step accumulator for network frames, tracked separately from the
 * render loop. The host banks wall-clock time with addElapsed(), advances
 * one frame per perFrameDuration banked, then runs framesToRun() and calls
 * resetFrameLag() once it has caught up.
 *
 * Send cadence is aligned to frame numbers, not calls, so the same frame
 * always makes the same send decision (replay, rollback).
 */
export class FrameAccumulator {
  private frame = 0;
  private banked: Duration = ZERO_DURATION;
  private frameDuration: Duration = DEFAULT_PER_FRAME_DURATION;
  private sendRate = DEFAULT_MESSAGE_SEND_RATE;
  private lag = DEFAULT_INITIAL_FRAME_LAG;

  constructor(options: FrameAccumulatorOptions = {}) {
    if (options.tickRateHz !== undefined) this.setTickRate(options.tickRateHz);
    if (options.messageSendRate !== undefined) this.setMessageSendRate(options.messageSendRate);
    if (options.initialFrameLag !== undefined) {
      assertFrameNumber("initialFrameLag", options.initialFrameLag);
      this.lag = options.initialFrameLag;
    }
  }

  /** Most recently completed network frame. */
  get frameNumber(): number {
    return this.frame;
  }

  /** Time banked since the last frame was consumed. */
  get elapsed(): Duration {
    return this.banked;
  }

  get perFrameDuration(): Duration {
    return this.frameDuration;
  }

  get messageSendRate(): number {
    return this.sendRate;
  }

  /** Frames advanced since the last resetFrameLag(). Usually 0 or 1 when keeping up. */
  get frameLag(): number {
    return this.lag;
  }

  addElapsed(duration: Duration): void {
    if (duration < ZERO_DURATION) throw new InvalidDurationError(duration, "a non-negative duration");
    this.banked += duration;
  }

  /** True when at least one full frame of time is banked. */
  hasPendingFrame(): boolean {
    return this.banked >= this.frameDuration;
  }

  /**
   * Spend exactly one frame of banked time. Unchecked: calling this without
   * a full frame banked leaves elapsed negative.
   */
  advanceFrame(): void {
    this.frame += 1;
    this.banked -= this.frameDuration;
    this.lag += 1;
  }

  advanceFrameChecked(): void {
    if (!this.hasPendingFrame()) {
      throw new InsufficientElapsedTimeError(this.banked, this.frameDuration);
    }
    this.advanceFrame();
  }

  /** Advance while a full frame is banked, at most maxFrames times. Returns frames advanced. */
  drain(maxFrames = Number.POSITIVE_INFINITY): number {
    let advanced = 0;
    while (advanced < maxFrames && this.hasPendingFrame()) {
      this.advanceFrame();
      advanced++;
    }
    return advanced;
  }

  /**
   * Frames owed to the simulation: [frameNumber - frameLag + 1, frameNumber].
   * Empty when frameLag is 0. The start is clamped at frame 0 when a resync
   * moved frameNumber below the lag.
   */
  framesToRun(): FrameRange {
    if (this.lag === 0) return FrameRange.empty(this.frame);
    const start = Math.max(0, this.frame - this.lag + 1);
    return new FrameRange(start, this.frame);
  }

  resetFrameLag(): void {
    this.lag = 0;
  }

  shouldSendNow(): boolean {
    return this.shouldSend(this.frame);
  }

  shouldSend(frame: number): boolean {
    return frame % this.sendRate === 0;
  }

  /** Force the frame number, e.g. to resync with an authoritative server. Leaves elapsed and lag alone. */
  setFrameNumber(frame: number): void {
    assertFrameNumber("frameNumber", frame);
    this.frame = frame;
  }

  /** Set frames per second. perFrameDuration becomes one second over hz, floored to the nanosecond. */
  setTickRate(hz: number): void {
    if (!Number.isFinite(hz) || hz <= 0) {
      throw new InvalidRateError("tick rate", hz, "a positive number of Hz");
    }
    const duration = Number.isInteger(hz)
      ? NANOS_PER_SECOND / BigInt(hz)
      : BigInt(Math.floor(1e9 / hz));
    if (duration <= ZERO_DURATION) {
      throw new InvalidRateError("tick rate", hz, "at most 1e9 Hz");
    }
    this.frameDuration = duration;
  }

  /** Set the frame length directly, e.g. to restore a duration read earlier from perFrameDuration. */
  setPerFrameDuration(duration: Duration): void {
    if (duration <= ZERO_DURATION) {
      throw new InvalidDurationError(duration, "a positive frame duration");
    }
    this.frameDuration = duration;
  }

  /** Send a message every `rate` frames. */
  setMessageSendRate(rate: number): void {
    if (!Number.isInteger(rate) || rate < 1 || rate > MAX_MESSAGE_SEND_RATE) {
      throw new InvalidRateError(
        "message send rate",
        rate,
        `an integer in 1..${MAX_MESSAGE_SEND_RATE}`,
      );
    }
    this.sendRate = rate;
  }

  snapshot(): FrameAccumulatorSnapshot {
    return {
      frameNumber: this.frame,
      elapsed: this.banked,
      perFrameDuration: this.frameDuration,
      messageSendRate: this.sendRate,
      frameLag: this.lag,
    };
  }
}

function assertFrameNumber(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_FRAME_NUMBER) {
    throw new InvalidFrameNumberError(field, value);
  }
}
