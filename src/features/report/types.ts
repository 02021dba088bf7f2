import type { EpochSeconds, Fahrenheit, TimeZoneMode } from '../../types/common';

/**
 * Derived figures for one state, ready to print
 *
 * Averages and extrema are null when the state has no records.
 */
export interface StateSummary {
  code: string;
  recordCount: number;
  averageHumidity: number | null;
  averageTemperature: Fahrenheit | null;
  averageCloudCover: number | null;
  maxTemperature: Fahrenheit | null;
  maxTemperatureAt: EpochSeconds | null;
  minTemperature: Fahrenheit | null;
  minTemperatureAt: EpochSeconds | null;
  lightningStrikes: number;
  snowCoverRecords: number;
}

export interface ReportOptions {
  /** Render extrema timestamps in the process time zone or in UTC */
  timeZone: TimeZoneMode;
}
