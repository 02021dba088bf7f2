/**
 * Console output sink
 *
 * Writes log lines to the error stream so that standard output carries
 * only the report. Lines are colored by level with chalk when enabled.
 */

import chalk from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

type Paint = (text: string) => string;

const LEVEL_COLORS: Record<LogLevel, Paint> = {
  0: chalk.gray,
  1: chalk.cyan,
  2: chalk.yellow,
  3: chalk.red,
};

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true });
 * consoleSink.write('[WARNING] Skipping line 3', LOG_LEVELS.WARNING);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): LogSink {
  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.colors ? LEVEL_COLORS[level](formattedMessage) : formattedMessage;
    consoleApi.error(line);
  }

  return {
    write: write
  };
}
