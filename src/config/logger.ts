/**
 * Structured logger with level filtering.
 *
 * Development prints `[component] LEVEL message {extra}` lines, production
 * (NODE_ENV=production) prints JSON lines. LOG_LEVEL sets the minimum level
 * (default "info"); LOG_FILE, when set, receives a copy of every line.
 *
 *   logger.warn("retry", "Attempt 1/4 failed", { delayMs: 1000 });
 */

import fs from "fs";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

function appendToLogFile(entry: LogEntry): void {
  const file = process.env.LOG_FILE;
  if (!file) return;
  try {
    fs.appendFileSync(file, `${entry.timestamp} - ${formatPretty(entry)}\n`, "utf8");
  } catch (err) {
    // Console output still carries the entry.
    console.error(`[logger] ERROR cannot write ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function log(level: LogLevel, component: string, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const formatted = isProduction() ? JSON.stringify(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }

  appendToLogFile(entry);
}

const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: Record<string, unknown>): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: Record<string, unknown>): void {
    log("error", component, message, extra);
  },
};

export { logger };
export type { LogLevel, LogEntry };
