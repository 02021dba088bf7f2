/**
 * Tests for numeric parsing
 */

import { parseDecimal, parseInteger } from './index';

describe('parseDecimal', () => {
  it('should parse plain decimals', () => {
    expect(parseDecimal('93.0')).toBe(93);
    expect(parseDecimal('277.58716')).toBe(277.58716);
    expect(parseDecimal('-0.5')).toBe(-0.5);
  });

  it('should parse leading-dot and exponent forms', () => {
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('1e3')).toBe(1000);
    expect(parseDecimal('2.5E-1')).toBe(0.25);
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseDecimal(' 4.0\r')).toBe(4);
  });

  it('should reject non-decimal text', () => {
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('0x10')).toBeNull();
    expect(parseDecimal('12abc')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('NaN')).toBeNull();
  });

  it('should reject values that overflow', () => {
    expect(parseDecimal('1e400')).toBeNull();
  });
});

describe('parseInteger', () => {
  it('should parse millisecond timestamps', () => {
    expect(parseInteger('1428300000000')).toBe(1428300000000);
  });

  it('should parse signed values', () => {
    expect(parseInteger('-1500')).toBe(-1500);
    expect(parseInteger('+7')).toBe(7);
  });

  it('should reject fractions and text', () => {
    expect(parseInteger('1.5')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('12ms')).toBeNull();
  });

  it('should reject integers beyond the safe range', () => {
    expect(parseInteger('99999999999999999999')).toBeNull();
  });
});
