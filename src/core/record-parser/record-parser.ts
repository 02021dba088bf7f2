/**
 * Observation record parser
 *
 * Turns one tab-delimited line into a typed Observation:
 *
 *   STATE  TIMESTAMP_MS  GEOHASH  HUMIDITY  SNOW  CLOUD  LIGHTNING  PRESSURE  TEMP_K
 *
 * Values are trusted as given (no range checks). A line that does not hold
 * nine fields, or holds text where a number belongs, yields a
 * MalformedRecordError instead of an observation.
 */

import { MalformedRecordError } from '../../types/errors';
import { RECORD_FORMAT } from '../../utils/constants';
import { parseDecimal, parseInteger } from '../../utils/number';
import { msToSeconds } from '../../utils/time/time';
import type { ParseResult } from './types';
import { kelvinToFahrenheit, stripLineEnding } from './helpers';

const NUMERIC_FIELDS = [
  { index: 3, name: 'humidity' },
  { index: 4, name: 'snow' },
  { index: 5, name: 'cloud cover' },
  { index: 6, name: 'lightning' },
  { index: 7, name: 'pressure' },
  { index: 8, name: 'temperature' },
] as const;

function fail(reason: string): ParseResult {
  return { ok: false, error: new MalformedRecordError(reason) };
}

/**
 * Parse one observation line
 *
 * @param line - Raw line, with or without its line terminator
 * @returns The observation, or the reason the line was rejected
 *
 * @example
 * ```typescript
 * const result = parseRecord('CA\t1428300000000\t9prcjqk3yc80\t93.0\t0.0\t100.0\t0.0\t95644.0\t277.58716');
 * if (result.ok) {
 *   result.observation.temperature; // ~39.99
 * }
 * ```
 */
export function parseRecord(line: string): ParseResult {
  const fields = stripLineEnding(line).split(RECORD_FORMAT.DELIMITER);

  if (fields.length !== RECORD_FORMAT.FIELD_COUNT) {
    return fail(`expected ${RECORD_FORMAT.FIELD_COUNT} tab-separated fields, got ${fields.length}`);
  }

  const state = fields[0];
  if (state === '') {
    return fail('state code is empty');
  }

  const timestampMs = parseInteger(fields[1]);
  if (timestampMs === null) {
    return fail(`timestamp is not an integer (got "${fields[1]}")`);
  }

  const values: number[] = [];
  for (const field of NUMERIC_FIELDS) {
    const value = parseDecimal(fields[field.index]);
    if (value === null) {
      return fail(`${field.name} is not a number (got "${fields[field.index]}")`);
    }
    values.push(value);
  }

  return {
    ok: true,
    observation: {
      state,
      timestamp: msToSeconds(timestampMs),
      humidity: values[0],
      snow: values[1],
      cloudCover: values[2],
      lightning: values[3],
      // values[4] is pressure: validated, not retained
      temperature: kelvinToFahrenheit(values[5]),
    },
  };
}
