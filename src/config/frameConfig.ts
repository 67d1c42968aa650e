import type { FrameAccumulatorOptions } from "../core/FrameAccumulator.js";
import { InvalidRateError } from "../core/errors.js";

export const TICK_RATE_ENV = "NET_TICK_RATE_HZ";
export const SEND_RATE_ENV = "NET_MESSAGE_SEND_RATE";

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Read frame options from the environment. Unset or blank variables are
 * left out so the accumulator defaults apply; range checks happen in the
 * accumulator setters.
 */
export function loadFrameConfig(env: Env = process.env): FrameAccumulatorOptions {
  const config: FrameAccumulatorOptions = {};
  const tickRate = readNumber(env, TICK_RATE_ENV);
  if (tickRate !== undefined) config.tickRateHz = tickRate;
  const sendRate = readNumber(env, SEND_RATE_ENV);
  if (sendRate !== undefined) config.messageSendRate = sendRate;
  return config;
}

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidRateError(name, raw, "a number");
  }
  return value;
}
