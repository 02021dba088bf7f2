/**
 * Per-state summary report
 *
 * Turns the aggregated state table into the printed report: one line
 * listing every state code in first-seen order, then one block per state.
 */

import type { StateStats, StateTable } from '../../core/state-aggregator';
import { listStateCodes } from '../../core/state-aggregator';
import type { TimeZoneMode } from '../../types/common';
import { average, formatFixed, formatInstant } from './helpers';
import type { ReportOptions, StateSummary } from './types';

/**
 * Calculate the printed figures for one state
 * @param stats - Running statistics
 * @returns Summary with averages, null when the state has no records
 */
export function summarizeState(stats: StateStats): StateSummary {
  const hasRecords = stats.recordCount > 0;

  return {
    code: stats.code,
    recordCount: stats.recordCount,
    averageHumidity: average(stats.humiditySum, stats.recordCount),
    averageTemperature: average(stats.temperatureSum, stats.recordCount),
    averageCloudCover: average(stats.cloudCoverSum, stats.recordCount),
    maxTemperature: hasRecords ? stats.maxTemperature : null,
    maxTemperatureAt: hasRecords ? stats.maxTemperatureAt : null,
    minTemperature: hasRecords ? stats.minTemperature : null,
    minTemperatureAt: hasRecords ? stats.minTemperatureAt : null,
    lightningStrikes: stats.lightningCount,
    snowCoverRecords: stats.snowCount,
  };
}

/**
 * Format the header line listing state codes
 * @param table - Aggregated table
 * @returns e.g. "States found: TN WA"
 */
export function formatStateList(table: StateTable): string {
  return ['States found:', ...listStateCodes(table)].join(' ');
}

/**
 * Format the block for one state
 * @param summary - Calculated summary
 * @param zone - Time zone for extrema timestamps
 * @returns Block lines, without terminators
 */
export function formatStateBlock(summary: StateSummary, zone: TimeZoneMode): string[] {
  return [
    `-- State: ${summary.code} --`,
    `Number of Records: ${summary.recordCount}`,
    `Average Humidity: ${formatFixed(summary.averageHumidity)}%`,
    `Average Temperature: ${formatFixed(summary.averageTemperature)}F`,
    `Max Temperature: ${formatFixed(summary.maxTemperature)}F`,
    `Max Temperature on: ${formatInstant(summary.maxTemperatureAt, zone)}`,
    `Min Temperature: ${formatFixed(summary.minTemperature)}F`,
    `Min Temperature on: ${formatInstant(summary.minTemperatureAt, zone)}`,
    `Lightning Strikes: ${summary.lightningStrikes}`,
    `Records with Snow Cover: ${summary.snowCoverRecords}`,
    `Average Cloud Cover: ${formatFixed(summary.averageCloudCover)}%`,
  ];
}

/**
 * Format the full report
 * @param table - Aggregated table
 * @param options - Report options
 * @returns Report text, every line newline-terminated
 */
export function formatReport(table: StateTable, options: ReportOptions): string {
  const lines = [formatStateList(table)];

  for (const stats of table.values()) {
    lines.push(...formatStateBlock(summarizeState(stats), options.timeZone));
  }

  return lines.map(line => line + '\n').join('');
}
