/**
 * Helper functions for running statistics
 */

import type { StateStats } from './types';

/**
 * Create statistics for a state that has not been seen yet
 *
 * Extrema start at -Infinity / +Infinity so the first folded
 * observation always replaces them.
 *
 * @param code - State code
 * @returns Fresh statistics with zero sums
 */
export function createStateStats(code: string): StateStats {
  return {
    code,
    recordCount: 0,
    humiditySum: 0,
    cloudCoverSum: 0,
    temperatureSum: 0,
    lightningCount: 0,
    snowCount: 0,
    maxTemperature: Number.NEGATIVE_INFINITY,
    maxTemperatureAt: 0,
    minTemperature: Number.POSITIVE_INFINITY,
    minTemperatureAt: 0,
  };
}

/**
 * Update extrema with a reading (MUTABLE)
 *
 * Strict comparisons: on a tie the extremum already held keeps its timestamp.
 *
 * @param stats - Statistics to update (will be mutated)
 * @param temperature - Reading in Fahrenheit
 * @param at - Time of the reading
 */
export function updateExtrema(stats: StateStats, temperature: number, at: number): void {
  if (temperature > stats.maxTemperature) {
    stats.maxTemperature = temperature;
    stats.maxTemperatureAt = at;
  }

  if (temperature < stats.minTemperature) {
    stats.minTemperature = temperature;
    stats.minTemperatureAt = at;
  }
}
