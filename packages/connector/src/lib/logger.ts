/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels. One logger per module,
 * named after it ("local-store", "sync-orchestrator", "garmin-api", ...), all
 * sharing one process-wide level. Lines go to stdout:
 *
 *   [2025-03-10 12:00:00] WARN  [local-store] Corrupt store file ...; moved to ...
 *
 * The level only filters; nothing here decides whether a failure is fatal.
 *
 * Log levels:
 * - debug: Sync plans, HTTP requests, state transitions
 * - info: Sync start/end, per-kind record counts
 * - warn: Recoverable issues (quarantined files, config fallbacks, per-kind fetch failures)
 * - error: Failures that end the invocation
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error (or LOG_LEVEL)
 * - Library: setLogLevel("warn") before calling sync functions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function log(level: LogLevel, name: string, message: string): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  console.log(`[${timestamp}] ${levelStr} [${name}] ${message}`);
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Set global log level.
 * Call this early in your application (e.g., in CLI before sync).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Create a logger instance for a specific module.
 */
export function setupLogger(name: string): Logger {
  return {
    debug: (message: string) => log("debug", name, message),
    info: (message: string) => log("info", name, message),
    warn: (message: string) => log("warn", name, message),
    error: (message: string) => log("error", name, message),
  };
}
