export {
  DEFAULT_INITIAL_FRAME_LAG,
  DEFAULT_MESSAGE_SEND_RATE,
  DEFAULT_PER_FRAME_DURATION,
  DEFAULT_TICKS_PER_MINUTE,
  MAX_FRAME_NUMBER,
  MAX_MESSAGE_SEND_RATE,
} from "./config/constants.js";
export { loadFrameConfig, SEND_RATE_ENV, TICK_RATE_ENV } from "./config/frameConfig.js";
export { CVar, type CVarCategory, type CVarDesc } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { bindNetCVars, NET_CVAR_DEFS, NET_SENDRATE, NET_TICKRATE } from "./console/netCVars.js";
export * from "./core/Duration.js";
export * from "./core/errors.js";
export {
  FrameAccumulator,
  type FrameAccumulatorOptions,
  type FrameAccumulatorSnapshot,
} from "./core/FrameAccumulator.js";
export { FrameRange } from "./core/FrameRange.js";
export {
  type NetworkFrameHooks,
  NetworkFrameLoop,
  type NetworkFrameLoopOptions,
} from "./server/NetworkFrameLoop.js";
export { initServerLog, installCrashHandlers, serverLog, serverLogError } from "./server/serverLog.js";
