/**
 * Time utility functions
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Convert a millisecond timestamp to whole seconds
 *
 * Truncates toward zero, so -1500 ms becomes -1 s.
 *
 * @param ms - Milliseconds since epoch
 * @returns Seconds since epoch
 */
export function msToSeconds(ms: number): number {
  return Math.trunc(ms / TIME_CONSTANTS.MS_PER_SECOND);
}
