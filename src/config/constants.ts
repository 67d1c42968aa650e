import { type Duration, NANOS_PER_SECOND } from "../core/Duration.js";

/** Default network frames per minute when no tick rate is configured. */
export const DEFAULT_TICKS_PER_MINUTE = 100;

/** Default length of one network frame: one minute over DEFAULT_TICKS_PER_MINUTE (600ms). */
export const DEFAULT_PER_FRAME_DURATION: Duration =
  (60n * NANOS_PER_SECOND) / BigInt(DEFAULT_TICKS_PER_MINUTE);

/** Send a network message every Nth frame. 1 = every frame. */
export const DEFAULT_MESSAGE_SEND_RATE = 1;

/** Starting lag of one so frame 0 runs once before any time is banked. */
export const DEFAULT_INITIAL_FRAME_LAG = 1;

/** Upper bound for the message send rate (stored as a u8 on the wire). */
export const MAX_MESSAGE_SEND_RATE = 255;

/** Frame numbers are u32 on the wire. */
export const MAX_FRAME_NUMBER = 0xffff_ffff;

/** Wall-clock cap per host-loop step, to avoid a spiral of death after a stall (ms). */
export const MAX_STEP_MS = 250;

/** Default host-loop interval for NetworkFrameLoop.start() (ms). */
export const HOST_LOOP_INTERVAL_MS = 16;
