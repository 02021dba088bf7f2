import type { EpochSeconds, Fahrenheit } from '../../types/common';

/**
 * Running statistics for one state
 */
export interface StateStats {
  readonly code: string;
  recordCount: number;
  humiditySum: number;
  cloudCoverSum: number;
  temperatureSum: number;
  lightningCount: number;
  snowCount: number;
  maxTemperature: Fahrenheit;
  maxTemperatureAt: EpochSeconds;
  minTemperature: Fahrenheit;
  minTemperatureAt: EpochSeconds;
}

/**
 * State code to running statistics.
 * Map iteration order is insertion order, i.e. first-seen order.
 */
export type StateTable = Map<string, StateStats>;
