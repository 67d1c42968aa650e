import { HOST_LOOP_INTERVAL_MS, MAX_STEP_MS } from "../config/constants.js";
import { formatDuration, fromMillis } from "../core/Duration.js";
import { FrameAccumulator, type FrameAccumulatorOptions } from "../core/FrameAccumulator.js";
import type { FrameRange } from "../core/FrameRange.js";
import { serverLog, serverLogError } from "./serverLog.js";

export interface NetworkFrameHooks {
  /** Run one network frame of simulation. */
  simulate(frame: number): void;
  /** Serialize and transmit state. Only called on frames the send cadence selects. */
  send?(frame: number): void;
}

export interface NetworkFrameLoopOptions extends FrameAccumulatorOptions {
  /** Wall clock in milliseconds. Defaults to performance.now(). */
  now?: () => number;
  /** Wall-clock time credited per step at most, so a stall doesn't trigger a burst of frames. */
  maxStepMs?: number;
}

/**
 * Host loop around a FrameAccumulator. Each step banks wall-clock time,
 * advances every full frame banked, runs the owed frames in order and
 * acknowledges them.
 *
 * Can be driven by start() (setInterval) or by calling step() directly
 * from another loop.
 */
export class NetworkFrameLoop {
  readonly accumulator: FrameAccumulator;
  private readonly hooks: NetworkFrameHooks;
  private readonly now: () => number;
  private readonly maxStepMs: number;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private lastTime = 0;

  constructor(hooks: NetworkFrameHooks, options: NetworkFrameLoopOptions = {}) {
    const { now, maxStepMs, ...frameOptions } = options;
    this.accumulator = new FrameAccumulator(frameOptions);
    this.hooks = hooks;
    this.now = now ?? (() => performance.now());
    this.maxStepMs = maxStepMs ?? MAX_STEP_MS;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  /** Credit `elapsedMs` of wall-clock time and run every frame now owed. Returns the frames that ran. NaN is rejected with InvalidDurationError. */
  step(elapsedMs: number): FrameRange {
    const credited = Math.min(Math.max(elapsedMs, 0), this.maxStepMs);
    this.accumulator.addElapsed(fromMillis(credited));
    this.accumulator.drain();

    const range = this.accumulator.framesToRun();
    for (const frame of range) {
      this.runFrame(frame);
    }
    this.accumulator.resetFrameLag();
    return range;
  }

  start(intervalMs = HOST_LOOP_INTERVAL_MS): void {
    if (this.intervalId !== null) return;
    this.lastTime = this.now();
    this.intervalId = setInterval(() => {
      try {
        const t = this.now();
        const dt = t - this.lastTime;
        this.lastTime = t;
        this.step(dt);
      } catch (err) {
        serverLogError("tick error", err);
      }
    }, intervalMs);
    serverLog(
      `network frame loop started (frame ${formatDuration(this.accumulator.perFrameDuration)}, send every ${this.accumulator.messageSendRate})`,
    );
  }

  stop(): void {
    if (this.intervalId === null) return;
    clearInterval(this.intervalId);
    this.intervalId = null;
    serverLog(`network frame loop stopped at frame ${this.accumulator.frameNumber}`);
  }

  private runFrame(frame: number): void {
    try {
      this.hooks.simulate(frame);
    } catch (err) {
      serverLogError(`simulate error (frame ${frame})`, err);
    }
    if (!this.hooks.send || !this.accumulator.shouldSend(frame)) return;
    try {
      this.hooks.send(frame);
    } catch (err) {
      serverLogError(`send error (frame ${frame})`, err);
    }
  }
}
