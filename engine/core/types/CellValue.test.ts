/**
 * Grid Engine - Cell Value Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  EMPTY,
  asNumber,
  booleanValue,
  dateValue,
  daysSinceEpoch,
  errorValue,
  formatDate,
  isTruthy,
  numberValue,
  parseInputValue,
  parseNumber,
  textValue,
  toDisplayString,
  valuesEqual,
} from './CellValue.js';

describe('parseNumber', () => {
  it('should parse integers, decimals and exponents', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber('-3.5')).toBe(-3.5);
    expect(parseNumber('.25')).toBe(0.25);
    expect(parseNumber('1e3')).toBe(1000);
    expect(parseNumber('  7  ')).toBe(7);
  });

  it('should reject non-numeric text', () => {
    expect(parseNumber('')).toBeNull();
    expect(parseNumber('   ')).toBeNull();
    expect(parseNumber('abc')).toBeNull();
    expect(parseNumber('1,000')).toBeNull();
    expect(parseNumber('0x10')).toBeNull();
  });
});

describe('asNumber', () => {
  it('should coerce each variant', () => {
    expect(asNumber(numberValue(2.5))).toBe(2.5);
    expect(asNumber(booleanValue(true))).toBe(1);
    expect(asNumber(booleanValue(false))).toBe(0);
    expect(asNumber(textValue(' 12 '))).toBe(12);
    expect(asNumber(dateValue(19000))).toBe(19000);
  });

  it('should not coerce empty, error or unparsable text', () => {
    expect(asNumber(EMPTY)).toBeNull();
    expect(asNumber(errorValue('div-by-zero'))).toBeNull();
    expect(asNumber(textValue('hello'))).toBeNull();
  });
});

describe('toDisplayString', () => {
  it('should render each variant', () => {
    expect(toDisplayString(EMPTY)).toBe('');
    expect(toDisplayString(textValue('hi'))).toBe('hi');
    expect(toDisplayString(numberValue(10))).toBe('10');
    expect(toDisplayString(numberValue(2.5))).toBe('2.5');
    expect(toDisplayString(booleanValue(true))).toBe('TRUE');
    expect(toDisplayString(errorValue('div-by-zero'))).toBe('#div-by-zero!');
    expect(toDisplayString(dateValue(0))).toBe('1970-01-01');
  });

  it('should render negative zero as 0', () => {
    expect(toDisplayString(numberValue(-0))).toBe('0');
  });
});

describe('dates', () => {
  it('should truncate fractional day counts', () => {
    expect(dateValue(3.9)).toEqual({ type: 'date', days: 3 });
  });

  it('should format day counts as ISO dates', () => {
    expect(formatDate(31)).toBe('1970-02-01');
  });

  it('should count whole UTC days', () => {
    expect(daysSinceEpoch(new Date(Date.UTC(1970, 0, 3, 23, 59)))).toBe(2);
  });
});

describe('isTruthy', () => {
  it('should follow value truthiness', () => {
    expect(isTruthy(booleanValue(true))).toBe(true);
    expect(isTruthy(numberValue(0))).toBe(false);
    expect(isTruthy(numberValue(-1))).toBe(true);
    expect(isTruthy(textValue('yes'))).toBe(true);
    expect(isTruthy(textValue(' false '))).toBe(false);
    expect(isTruthy(textValue(''))).toBe(false);
    expect(isTruthy(EMPTY)).toBe(false);
  });
});

describe('valuesEqual', () => {
  it('should compare by variant and payload', () => {
    expect(valuesEqual(numberValue(1), numberValue(1))).toBe(true);
    expect(valuesEqual(numberValue(1), textValue('1'))).toBe(false);
    expect(valuesEqual(errorValue('x'), errorValue('x'))).toBe(true);
    expect(valuesEqual(EMPTY, EMPTY)).toBe(true);
    expect(valuesEqual(numberValue(NaN), numberValue(NaN))).toBe(true);
  });
});

describe('parseInputValue', () => {
  it('should classify raw input', () => {
    expect(parseInputValue('')).toEqual(EMPTY);
    expect(parseInputValue('  ')).toEqual(EMPTY);
    expect(parseInputValue('true')).toEqual(booleanValue(true));
    expect(parseInputValue('FALSE')).toEqual(booleanValue(false));
    expect(parseInputValue('3.25')).toEqual(numberValue(3.25));
    expect(parseInputValue('hello')).toEqual(textValue('hello'));
  });

  it('should keep text that overflows to infinity', () => {
    expect(parseInputValue('1e999')).toEqual(textValue('1e999'));
  });
});
