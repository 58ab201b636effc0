import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;

/** Initialize file logging. Call once at startup with the data directory. */
export function initNetLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "tickwarp.log");
}

/** Stop appending to the log file (stderr output continues). */
export function closeNetLog(): void {
  logPath = null;
}

export function getNetLogPath(): string | null {
  return logPath;
}

function timestamp(): string {
  return new Date().toISOString();
}

function emit(line: string): void {
  console.error(line);
  if (!logPath) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (err) {
    // Disable the file sink so a broken disk doesn't fail every tick.
    const failedPath = logPath;
    logPath = null;
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`${timestamp()} [tickwarp] log file ${failedPath} disabled: ${reason}`);
  }
}

/** Log an informational message to stderr and the log file. */
export function netLog(msg: string): void {
  emit(`${timestamp()} [tickwarp] ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function netLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  emit(`${timestamp()} [tickwarp] ${label}: ${msg}`);
}

/**
 * Install global handlers for uncaught exceptions and unhandled rejections.
 * Logs the error, then exits so the process still crashes.
 */
export function installCrashHandlers(): void {
  process.on("uncaughtException", (err) => {
    netLogError("uncaughtException", err);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    netLogError("unhandledRejection", reason);
    process.exit(1);
  });
}
