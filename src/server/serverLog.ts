import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;
let fileLogFailed = false;

/** Initialize file logging. Call once at startup with the data directory. */
export function initServerLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "netframe.log");
  fileLogFailed = false;
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(line: string): void {
  console.error(line);
  if (!logPath || fileLogFailed) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (err) {
    // Keep logging to stderr; report the broken file once
    fileLogFailed = true;
    console.error(`${timestamp()} [netframe] log file disabled: ${String(err)}`);
  }
}

/** Log an informational message to stderr and the log file. */
export function serverLog(msg: string): void {
  write(`${timestamp()} [netframe] ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function serverLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write(`${timestamp()} [netframe] ${label}: ${msg}`);
}

/**
 * Install global handlers for uncaught exceptions and unhandled rejections.
 * Logs the error, then exits so the process still crashes.
 */
export function installCrashHandlers(): void {
  process.on("uncaughtException", (err) => {
    serverLogError("uncaughtException", err);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    serverLogError("unhandledRejection", reason);
    process.exit(1);
  });
}
