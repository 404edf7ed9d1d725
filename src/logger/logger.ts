/**
 * Micro-logger — level-filtered lines on console.*
 *
 * Line format: [ISO timestamp] [LEVEL] message {"json":"meta"}
 * Sessions get a bound logger from withContext() unless the caller injects one.
 */

import type { Logger, LogLevel, LogMeta } from "@/types";
import { DEFAULT_LOG_LEVEL, ENV_LOG_LEVEL, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Map a raw LOG_LEVEL value onto a known level (case-insensitive)
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

const currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env[ENV_LOG_LEVEL])];

/**
 * Errors stringify to {} by default; keep their name and message
 */
function metaReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Build one log line
 */
export function formatLine(
  level: LogLevel,
  message: string,
  meta?: LogMeta,
  now: Date = new Date(),
): string {
  const formattedMeta =
    meta && Object.keys(meta).length > 0
      ? " " + JSON.stringify(meta, metaReplacer)
      : "";
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${formattedMeta}`;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const line = formatLine(level, message, meta);
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (per-call meta wins on key clashes)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
