/**
 * Logger constants — level priorities and environment defaults
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Used when LOG_LEVEL is unset or not one of LOG_LEVELS
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const ENV_LOG_LEVEL = "LOG_LEVEL";
