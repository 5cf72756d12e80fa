/**
 * Logging helper functions
 */

import type { LogLevel, LogLevelName, LogLevels, FilterContext } from './types';

/**
 * Log level constants
 */
export const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LOG_LEVELS.DEBUG,
  info: LOG_LEVELS.INFO,
  warning: LOG_LEVELS.WARNING,
  critical: LOG_LEVELS.CRITICAL
};

/**
 * Resolve a level name from configuration or environment
 * @param name - Level name, case-insensitive; "warn" is accepted for warning
 * @returns Matching level, or null when the name is unknown
 */
export function parseLogLevel(name: string): LogLevel | null {
  const key = name.trim().toLowerCase();
  if (key === 'warn') {
    return LOG_LEVELS.WARNING;
  }
  if (key === 'debug' || key === 'info' || key === 'warning' || key === 'critical') {
    return LEVELS_BY_NAME[key];
  }
  return null;
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level
 * @param msg - Message to format
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string): string {
  let tag = '[DEBUG]    ';
  if (level === LOG_LEVELS.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === LOG_LEVELS.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === LOG_LEVELS.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === LOG_LEVELS.INFO &&
      context.currentLevel > LOG_LEVELS.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Format an optional reading for log lines
 * @param value - Reading or null
 * @param unit - Unit suffix
 */
export function fmtReading(value: number | null, unit: string): string {
  if (value === null) return 'n/a';
  return value.toFixed(2) + unit;
}
