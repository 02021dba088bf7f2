/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
} as const;

export const TEMPERATURE_CONSTANTS = {
  /** Fahrenheit degrees per kelvin */
  F_PER_K: 9 / 5,
  /** Absolute zero on the Fahrenheit scale, negated */
  F_ABSOLUTE_ZERO_OFFSET: 459.67,
} as const;

export const RECORD_FORMAT = {
  DELIMITER: '\t',
  FIELD_COUNT: 9,
} as const;

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warning', 'error'] as const;

export const TIME_ZONE_MODES = ['local', 'utc'] as const;

export const PROGRAM_NAME = 'climate-report';

export const PROGRAM_VERSION = '1.0.0';
