import { loadFrameConfig } from "../config/frameConfig.js";
import { NetworkFrameLoop } from "./NetworkFrameLoop.js";
import { initServerLog, installCrashHandlers, serverLog } from "./serverLog.js";

const DATA_DIR = process.env.DATA_DIR ?? "./data";

installCrashHandlers();
initServerLog(DATA_DIR);

// Demo simulation: one counter, sent on the configured cadence
let ticks = 0;
const loop = new NetworkFrameLoop(
  {
    simulate: () => {
      ticks++;
    },
    send: (frame) => {
      serverLog(`send frame=${frame} ticks=${ticks}`);
    },
  },
  loadFrameConfig(),
);

loop.start();

function shutdown() {
  serverLog("Shutting down...");
  loop.stop();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
