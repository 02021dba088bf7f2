/**
 * Logger coordinator
 *
 * Filters by level, prefixes the level tag and hands each line to every sink.
 */

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies } from './types';
import { formatLogMessage, shouldLog } from './helpers';

/**
 * Create a logger instance
 *
 * A sink that throws is reported through `dependencies.fallback` and the
 * remaining sinks still receive the line.
 *
 * @param config - Logger configuration (level)
 * @param dependencies - Sinks and the fallback for sink failures
 * @param logLevels - Log level constants object
 * @returns Logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   { sinks: [createConsoleSink(console, { colors: true })], fallback: console },
 *   LOG_LEVELS
 * );
 *
 * logger.info('Opening file: data_tn.tdv');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  function emit(level: LogLevel, msg: string): void {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const line = formatLogMessage(level, msg, logLevels);

    for (const sink of dependencies.sinks) {
      try {
        sink.write(line, level);
      } catch (err) {
        dependencies.fallback.warn('Logger sink error: ' + String(err));
      }
    }
  }

  return {
    debug: function (msg: string) { emit(logLevels.DEBUG, msg); },
    info: function (msg: string) { emit(logLevels.INFO, msg); },
    warning: function (msg: string) { emit(logLevels.WARNING, msg); },
    error: function (msg: string) { emit(logLevels.ERROR, msg); }
  };
}
