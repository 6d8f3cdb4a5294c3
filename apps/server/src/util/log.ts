/**
 * Console logger with a level threshold.
 *
 *   LOG_LEVEL=info (default)  lifecycle, warnings, errors
 *   LOG_LEVEL=debug           adds per-attempt diagnostics
 *   LOG_LEVEL=silent          nothing (tests)
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogData = Record<string, unknown>;

export type Logger = {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
  child: (scope: string) => Logger;
};

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const lower = (raw ?? "info").trim().toLowerCase();
  const found = LOG_LEVELS.find((l) => l === lower);
  return found ?? "info";
}

// Read per call so tests and the bootstrap can set LOG_LEVEL after import.
function currentLevelIndex() {
  return LOG_LEVELS.indexOf(parseLogLevel(process.env.LOG_LEVEL));
}

function shouldLog(level: Exclude<LogLevel, "silent">) {
  return LOG_LEVELS.indexOf(level) >= currentLevelIndex();
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, data) {
      if (shouldLog("debug")) console.debug(prefix, message, data ?? {});
    },
    info(message, data) {
      if (shouldLog("info")) console.info(prefix, message, data ?? {});
    },
    warn(message, data) {
      if (shouldLog("warn")) console.warn(prefix, message, data ?? {});
    },
    error(message, data) {
      if (shouldLog("error")) console.error(prefix, message, data ?? {});
    },
    child(child: string) {
      return createLogger(`${scope}:${child}`);
    },
  };
}

export const logger = createLogger("parley");
