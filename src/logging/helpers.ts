/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Log level constants
 */
export const LOG_LEVELS: Readonly<LogLevels> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

const LEVEL_NAMES: Readonly<Record<string, LogLevel>> = {
  debug: 0,
  info: 1,
  warn: 2,
  warning: 2,
  error: 3,
  critical: 3
};

/**
 * Format log message with level tag
 *
 * Adds a fixed-width prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "[INFO]     "
 * - WARNING: "[WARNING]  "
 * - CRITICAL: "[CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "[INFO]     ";
  if (level === logLevels.WARNING) tag = "[WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "[CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message should be logged at the current threshold
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Parse a level name from configuration ("debug", "info", "warn", "error", ...)
 * @returns The level, or null for an unknown name
 */
export function parseLogLevel(name: string): LogLevel | null {
  const key = name.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : null;
}
