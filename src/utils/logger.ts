// ============================================================================
// Structured Logger
// One JSON line per event, filtered by LOG_LEVEL
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

function currentLevel(): LogLevel {
  const level = (process.env["LOG_LEVEL"] || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function log(level: LogLevel, message: string, data?: LogData): void {
  if (levels[level] < levels[currentLevel()]) return;

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  };

  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export const logger: Logger = {
  debug: (msg, data) => log("debug", msg, data),
  info: (msg, data) => log("info", msg, data),
  warn: (msg, data) => log("warn", msg, data),
  error: (msg, data) => log("error", msg, data),
};
