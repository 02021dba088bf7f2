/**
 * Common type definitions used throughout the project
 */

import type { LOG_LEVEL_NAMES, TIME_ZONE_MODES } from '../utils/constants';

/**
 * Temperature in degrees Fahrenheit
 */
export type Fahrenheit = number;

/**
 * Instant in whole seconds since the Unix epoch
 */
export type EpochSeconds = number;

/**
 * How report timestamps are rendered: process time zone or UTC
 */
export type TimeZoneMode = typeof TIME_ZONE_MODES[number];

/**
 * Log level as written in configuration
 */
export type LogLevelName = typeof LOG_LEVEL_NAMES[number];
