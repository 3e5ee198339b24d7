/**
 * Console-backed logger with a process-wide level threshold.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return rank[level] >= rank[threshold];
}

export function logDebug(message: string, payload?: unknown): void {
  if (!enabled("debug")) return;
  if (payload !== undefined) {
    console.debug(`[DEBUG] ${message}`, payload);
  } else {
    console.debug(`[DEBUG] ${message}`);
  }
}

export function logInfo(message: string, payload?: unknown): void {
  if (!enabled("info")) return;
  if (payload !== undefined) {
    console.info(`[INFO] ${message}`, payload);
  } else {
    console.info(`[INFO] ${message}`);
  }
}

export function logWarn(message: string, payload?: unknown): void {
  if (!enabled("warn")) return;
  if (payload !== undefined) {
    console.warn(`[WARN] ${message}`, payload);
  } else {
    console.warn(`[WARN] ${message}`);
  }
}

/**
 * Logs an error message and optional error object.
 */
export function logError(message: string, error?: unknown): void {
  if (!enabled("error")) return;
  if (error !== undefined) {
    console.error(`[ERROR] ${message}`, error);
  } else {
    console.error(`[ERROR] ${message}`);
  }
}
