/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console)
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | ERROR

/**
 * Log level constants structure
 * Passed to pure functions instead of importing LOG_LEVELS
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  ERROR: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Leveled logger handed to features
 */
export interface Logger {
  /** Per-file totals and other detail */
  debug(msg: string): void;
  /** Progress, e.g. each opened file */
  info(msg: string): void;
  /** Skipped input that does not stop the run */
  warning(msg: string): void;
  /** Failures the user must see */
  error(msg: string): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Lowest level written (0=DEBUG, 1=INFO, 2=WARNING, 3=ERROR) */
  readonly level: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Every sink receives each line that passes the level filter */
  sinks: LogSink[];
  /** Where sink failures are reported */
  fallback: Pick<ConsoleAPI, 'warn'>;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called;
 * the level is passed along for presentation only
 */
export interface LogSink {
  /** Write formatted message to sink */
  write(formattedMessage: string, level: LogLevel): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Color the line by level */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Write an error-stream line */
  error(message: string): void;
  /** Write a warning line */
  warn(message: string): void;
}
