/**
 * Grid Engine - Cell Value Helpers
 *
 * Constructors, coercion and display rules for the CellValue union.
 * Every switch here is exhaustive over `CellValue['type']`.
 */

import { CellValue, ErrorValue } from './index.js';

const MS_PER_DAY = 86_400_000;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const EMPTY: CellValue = Object.freeze({ type: 'empty' });

export function textValue(value: string): CellValue {
  return { type: 'text', value };
}

export function numberValue(value: number): CellValue {
  return { type: 'number', value };
}

export function booleanValue(value: boolean): CellValue {
  return { type: 'boolean', value };
}

export function errorValue(code: string): ErrorValue {
  return { type: 'error', code };
}

export function dateValue(days: number): CellValue {
  return { type: 'date', days: Math.trunc(days) };
}

export function isEmptyValue(value: CellValue): boolean {
  return value.type === 'empty';
}

export function isErrorValue(value: CellValue): value is ErrorValue {
  return value.type === 'error';
}

/**
 * Parse text as a float. Whitespace around the number is ignored,
 * blank text is not a number.
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Numeric coercion.
 * number → itself, boolean → 0/1, text → parsed float, date → day count;
 * empty and error values (and unparsable text) do not coerce.
 */
export function asNumber(value: CellValue): number | null {
  switch (value.type) {
    case 'number':
      return value.value;
    case 'boolean':
      return value.value ? 1 : 0;
    case 'text':
      return parseNumber(value.value);
    case 'date':
      return value.days;
    case 'empty':
    case 'error':
      return null;
  }
}

function formatNumber(n: number): string {
  if (Number.isInteger(n) && Math.abs(n) < 1e21) {
    return n.toFixed(0);
  }
  return String(n);
}

/**
 * Convert a day count to "YYYY-MM-DD".
 */
export function formatDate(days: number): string {
  return new Date(days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Display-string fallback. Localized formatting belongs to the caller.
 */
export function toDisplayString(value: CellValue): string {
  switch (value.type) {
    case 'empty':
      return '';
    case 'text':
      return value.value;
    case 'number':
      return formatNumber(value.value);
    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';
    case 'error':
      return `#${value.code}!`;
    case 'date':
      return formatDate(value.days);
  }
}

/**
 * Truthiness used by IF/AND/OR/NOT.
 * Errors are not handled here: callers propagate them first.
 */
export function isTruthy(value: CellValue): boolean {
  switch (value.type) {
    case 'boolean':
      return value.value;
    case 'number':
      return value.value !== 0;
    case 'date':
      return value.days !== 0;
    case 'text': {
      const text = value.value.trim();
      return text !== '' && text.toUpperCase() !== 'FALSE';
    }
    case 'empty':
    case 'error':
      return false;
  }
}

export function valuesEqual(a: CellValue, b: CellValue): boolean {
  switch (a.type) {
    case 'empty':
      return b.type === 'empty';
    case 'text':
      return b.type === 'text' && a.value === b.value;
    case 'number':
      return b.type === 'number' && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case 'boolean':
      return b.type === 'boolean' && a.value === b.value;
    case 'error':
      return b.type === 'error' && a.code === b.code;
    case 'date':
      return b.type === 'date' && a.days === b.days;
  }
}

/**
 * Interpret raw user input (not formulas).
 * "" → empty, TRUE/FALSE → boolean, numeric text → number, anything else → text.
 */
export function parseInputValue(raw: string): CellValue {
  if (raw.trim() === '') return EMPTY;

  const upper = raw.trim().toUpperCase();
  if (upper === 'TRUE') return booleanValue(true);
  if (upper === 'FALSE') return booleanValue(false);

  const n = parseNumber(raw);
  if (n !== null && Number.isFinite(n)) return numberValue(n);

  return textValue(raw);
}

/**
 * Day count for a JavaScript date (UTC calendar day).
 */
export function daysSinceEpoch(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY);
}
