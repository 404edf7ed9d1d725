/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields appended to a log line as JSON
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger accepted by ResilientSession
 *
 * The module logger (@/logger) and withContext() both satisfy it; callers
 * can pass their own to route session logs elsewhere.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
