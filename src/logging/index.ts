/**
 * Logging module barrel export
 *
 * - Logger coordinator (createLogger)
 * - Console sink on the error stream (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, levelFromName, LOG_LEVELS } from './helpers';
export { createConsoleSink } from './console/console-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI
} from './types';
