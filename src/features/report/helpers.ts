/**
 * Helper functions for report formatting
 */

import { formatCtime } from '../../utils/time/helpers';
import type { TimeZoneMode } from '../../types/common';

export const NOT_AVAILABLE = 'n/a';

/**
 * Format a value with one decimal, handling null values
 *
 * toFixed() rounds the exact binary value, picking the larger magnitude on a
 * tie. A tie at one decimal happens only when value * 4 is an odd integer
 * (x.25, x.75); those round to the even tenth instead, so 50.25 gives "50.2"
 * and 50.75 gives "50.8".
 */
export function formatFixed(value: number | null): string {
  if (value === null) {
    return NOT_AVAILABLE;
  }

  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }

  return value.toFixed(1);
}

/**
 * Format a timestamp in ctime layout, handling null values
 */
export function formatInstant(seconds: number | null, zone: TimeZoneMode): string {
  return seconds !== null ? formatCtime(seconds, zone) : NOT_AVAILABLE;
}

/**
 * Average of a sum over a count, null when there is nothing to average
 */
export function average(sum: number, count: number): number | null {
  return count > 0 ? sum / count : null;
}
