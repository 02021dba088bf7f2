/**
 * Helper functions for record parsing
 */

import { TEMPERATURE_CONSTANTS } from '../../utils/constants';
import type { Fahrenheit } from '../../types/common';

/**
 * Convert kelvin to Fahrenheit
 * @param kelvin - Temperature in kelvin
 * @returns Temperature in degrees Fahrenheit
 */
export function kelvinToFahrenheit(kelvin: number): Fahrenheit {
  return kelvin * TEMPERATURE_CONSTANTS.F_PER_K - TEMPERATURE_CONSTANTS.F_ABSOLUTE_ZERO_OFFSET;
}

/**
 * Decide whether a 0/1 indicator field is set
 *
 * Sources encode snow and lightning as 0.0 or 1.0; anything nonzero counts.
 *
 * @param value - Parsed indicator value
 * @returns True when the indicator is set
 */
export function isFlagSet(value: number): boolean {
  return value !== 0;
}

/**
 * Remove a trailing line terminator (\n or \r\n)
 */
export function stripLineEnding(line: string): string {
  if (line.endsWith('\r\n')) return line.slice(0, -2);
  if (line.endsWith('\n') || line.endsWith('\r')) return line.slice(0, -1);
  return line;
}
