/**
 * Per-state streaming aggregation
 *
 * Folds observations into a table of running statistics keyed by state
 * code. The table only grows, has no capacity limit, and iterates in the
 * order codes were first seen.
 *
 * Tables built separately (one per input file) can be merged afterwards;
 * merging in input order gives the same ordering and extrema as folding
 * every file into one table.
 */

import type { Observation } from '../record-parser/types';
import { isFlagSet } from '../record-parser/helpers';
import type { StateStats, StateTable } from './types';
import { createStateStats, updateExtrema } from './helpers';

/**
 * Create an empty table
 * @returns Empty state table
 */
export function createStateTable(): StateTable {
  return new Map<string, StateStats>();
}

/**
 * Get the statistics for a code, inserting fresh ones when absent (MUTABLE)
 *
 * @param table - State table (may be mutated)
 * @param code - State code, compared exactly
 * @returns Statistics held by the table for this code
 */
export function lookupOrCreate(table: StateTable, code: string): StateStats {
  let stats = table.get(code);
  if (stats === undefined) {
    stats = createStateStats(code);
    table.set(code, stats);
  }
  return stats;
}

/**
 * Fold one observation into the table (MUTABLE)
 *
 * @param table - State table (will be mutated)
 * @param observation - Parsed observation
 * @returns The statistics the observation was folded into
 */
export function foldObservation(table: StateTable, observation: Observation): StateStats {
  const stats = lookupOrCreate(table, observation.state);

  stats.recordCount += 1;
  stats.humiditySum += observation.humidity;
  stats.cloudCoverSum += observation.cloudCover;
  stats.temperatureSum += observation.temperature;

  if (isFlagSet(observation.lightning)) {
    stats.lightningCount += 1;
  }

  if (isFlagSet(observation.snow)) {
    stats.snowCount += 1;
  }

  updateExtrema(stats, observation.temperature, observation.timestamp);

  return stats;
}

/**
 * Combine statistics for the same code (MUTABLE)
 *
 * `source` is treated as later input than `target`, so on an extremum tie
 * the target keeps its timestamp.
 *
 * @param target - Statistics to merge into (will be mutated)
 * @param source - Statistics to merge from (not modified)
 */
export function mergeStateStats(target: StateStats, source: StateStats): void {
  target.recordCount += source.recordCount;
  target.humiditySum += source.humiditySum;
  target.cloudCoverSum += source.cloudCoverSum;
  target.temperatureSum += source.temperatureSum;
  target.lightningCount += source.lightningCount;
  target.snowCount += source.snowCount;

  if (source.maxTemperature > target.maxTemperature) {
    target.maxTemperature = source.maxTemperature;
    target.maxTemperatureAt = source.maxTemperatureAt;
  }

  if (source.minTemperature < target.minTemperature) {
    target.minTemperature = source.minTemperature;
    target.minTemperatureAt = source.minTemperatureAt;
  }
}

/**
 * Merge tables in input order into a new table
 *
 * Input tables are not modified.
 *
 * @param tables - Tables in the order their inputs were given
 * @returns Combined table
 */
export function mergeStateTables(tables: readonly StateTable[]): StateTable {
  const merged = createStateTable();

  for (const table of tables) {
    for (const stats of table.values()) {
      mergeStateStats(lookupOrCreate(merged, stats.code), stats);
    }
  }

  return merged;
}

/**
 * List state codes in first-seen order
 * @param table - State table
 * @returns State codes
 */
export function listStateCodes(table: StateTable): string[] {
  return Array.from(table.keys());
}
