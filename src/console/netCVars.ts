import { MAX_MESSAGE_SEND_RATE } from "../config/constants.js";
import { toSeconds } from "../core/Duration.js";
import type { FrameAccumulator } from "../core/FrameAccumulator.js";
import type { CVarDesc } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export const NET_TICKRATE = "net_tickrate";
export const NET_SENDRATE = "net_sendrate";

/** Network frame CVars. Defaults are taken from the accumulator at bind time. */
export const NET_CVAR_DEFS: readonly Omit<CVarDesc, "defaultValue">[] = [
  {
    name: NET_TICKRATE,
    description: "Network frame rate (Hz)",
    min: 1,
    max: 240,
    category: "net",
  },
  {
    name: NET_SENDRATE,
    description: "Send a network message every Nth frame",
    min: 1,
    max: MAX_MESSAGE_SEND_RATE,
    integer: true,
    category: "net",
  },
];

/**
 * Register net_tickrate and net_sendrate and push every change into the
 * accumulator. Returns a function that unregisters both.
 */
export function bindNetCVars(registry: CVarRegistry, acc: FrameAccumulator): () => void {
  const [tickDef, sendDef] = NET_CVAR_DEFS;
  if (!tickDef || !sendDef) throw new Error("[cvar] net cvar definitions missing");

  // Frame durations floor to the nanosecond, so the Hz read back is rounded for display
  // and the default maps back to the exact duration the accumulator started with.
  const baseDuration = acc.perFrameDuration;
  const tickrate = registry.register({
    ...tickDef,
    defaultValue: Number((1 / toSeconds(baseDuration)).toPrecision(6)),
  });
  const sendrate = registry.register({ ...sendDef, defaultValue: acc.messageSendRate });

  const unsubs = [
    tickrate.onChange((hz) => {
      if (hz === tickrate.defaultValue) acc.setPerFrameDuration(baseDuration);
      else acc.setTickRate(hz);
    }),
    sendrate.onChange((rate) => acc.setMessageSendRate(rate)),
  ];

  return () => {
    for (const unsub of unsubs) unsub();
    registry.unregister(NET_TICKRATE);
    registry.unregister(NET_SENDRATE);
  };
}
