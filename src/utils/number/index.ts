/**
 * Strict numeric parsing for text fields
 *
 * Unlike Number() or parseFloat(), these reject empty strings, hex literals
 * and trailing garbage instead of coercing them.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a decimal number
 *
 * - parseDecimal("93.0") = 93
 * - parseDecimal("1e3") = 1000
 * - parseDecimal("") = null
 * - parseDecimal("0x10") = null
 *
 * @param text - Field text, surrounding whitespace ignored
 * @returns The number, or null when the text is not a finite decimal
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a base-10 integer
 * @param text - Field text, surrounding whitespace ignored
 * @returns The integer, or null when the text is not a safe integer
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}
