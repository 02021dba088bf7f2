/**
 * Logging helper functions
 */

import type { LogLevelName } from '../types/common';
import type { LogLevel, LogLevels } from './types';

export const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

/**
 * Format log message with level tag
 *
 * Adds a fixed-width prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]   "
 * - INFO: "[INFO]    "
 * - WARNING: "[WARNING] "
 * - ERROR: "[ERROR]   "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=ERROR)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]   ';
  if (level === logLevels.INFO) tag = '[INFO]    ';
  if (level === logLevels.WARNING) tag = '[WARNING] ';
  if (level === logLevels.ERROR) tag = '[ERROR]   ';

  return tag + msg;
}

/**
 * Check if message should be logged based on level
 * @param level - Log level to check
 * @param currentLevel - Current minimum level
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Map a configured level name to its numeric level
 * @param name - Level name from configuration
 * @param logLevels - Log level constants object
 * @returns Numeric log level
 */
export function levelFromName(name: LogLevelName, logLevels: LogLevels): LogLevel {
  switch (name) {
    case 'debug': return logLevels.DEBUG;
    case 'info': return logLevels.INFO;
    case 'warning': return logLevels.WARNING;
    case 'error': return logLevels.ERROR;
  }
}
