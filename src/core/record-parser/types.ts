import type { EpochSeconds, Fahrenheit } from '../../types/common';
import type { MalformedRecordError } from '../../types/errors';

/**
 * One parsed observation line
 *
 * Geohash and pressure are read from the line but not kept.
 */
export interface Observation {
  /** State code, verbatim from the source */
  state: string;
  /** Observation time in seconds */
  timestamp: EpochSeconds;
  /** Relative humidity, 0-100 */
  humidity: number;
  /** Snow indicator, nonzero when snow is present */
  snow: number;
  /** Cloud cover, 0-100 */
  cloudCover: number;
  /** Lightning indicator, nonzero when a strike was recorded */
  lightning: number;
  /** Surface temperature, converted from kelvin */
  temperature: Fahrenheit;
}

export type ParseResult =
  | { ok: true; observation: Observation }
  | { ok: false; error: MalformedRecordError };
