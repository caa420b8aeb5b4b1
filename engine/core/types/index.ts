/**
 * Grid Engine - Core Type Definitions
 * Spreadsheet data model types shared by every engine module
 */

// ============================================================================
// Cell Value Types
// ============================================================================

export type CellValueType =
  | 'empty'
  | 'text'
  | 'number'
  | 'boolean'
  | 'error'
  | 'date';

export interface EmptyValue {
  readonly type: 'empty';
}

export interface TextValue {
  readonly type: 'text';
  readonly value: string;
}

export interface NumberValue {
  readonly type: 'number';
  readonly value: number;
}

export interface BooleanValue {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface ErrorValue {
  readonly type: 'error';
  /** Error code, e.g. "div-by-zero" (displayed as "#div-by-zero!") */
  readonly code: string;
}

export interface DateValue {
  readonly type: 'date';
  /** Whole days since 1970-01-01 */
  readonly days: number;
}

/**
 * Typed cell value.
 * `empty` is the only value that lets a literal cell drop out of storage.
 */
export type CellValue =
  | EmptyValue
  | TextValue
  | NumberValue
  | BooleanValue
  | ErrorValue
  | DateValue;

/**
 * Error codes stored in `error` values.
 * The first group mirrors formula error kinds; the rest are value-level results.
 */
export const ERROR_CODES = {
  DIV_BY_ZERO: 'div-by-zero',
  UNKNOWN_FUNCTION: 'unknown-function',
  INVALID_ARGUMENT: 'invalid-argument',
  TYPE_ERROR: 'type-error',
  CIRCULAR_REFERENCE: 'circular-reference',
  INVALID_SYNTAX: 'invalid-syntax',
  INVALID_REF: 'invalid-ref',
  NEGATIVE_SQRT: 'negative-sqrt',
  NO_NUMERIC_VALUES: 'no-numeric-values',
  UNEQUAL_TYPES: 'unequal-types',
  INVALID_NUMBER: 'invalid-number',
  NOT_FOUND: 'not-found',
  CHAIN_TOO_DEEP: 'chain-too-deep',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================================================
// Cell Types
// ============================================================================

export interface CellStyle {
  /** Number format string (e.g., "0.00", "yyyy-mm-dd") */
  numberFormat?: string;
  fontFamily?: string;
  /** Font size in points */
  fontSize?: number;
  bold?: boolean;
  italic?: boolean;
  /** Text color as RGBA */
  color?: readonly [number, number, number, number];
  /** Background color as RGBA */
  background?: readonly [number, number, number, number];
  horizontalAlign?: 'left' | 'center' | 'right';
  verticalAlign?: 'top' | 'middle' | 'bottom';
}

export interface Cell {
  /** Literal value, or the cached result when `formula` is set */
  value: CellValue;
  /** Formula text including the leading "=" */
  formula?: string;
  style?: CellStyle;
}

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  readonly row: number;
  readonly col: number;
}

/**
 * Rectangular span. `start` is always top-left and `end` bottom-right;
 * build ranges with `createRange` to keep that true.
 */
export interface CellRange {
  readonly start: CellRef;
  readonly end: CellRef;
}

/** Key format: "row_col" */
export type CellKey = string;

export function cellKey(ref: CellRef): CellKey {
  return `${ref.row}_${ref.col}`;
}

export function parseKey(key: CellKey): CellRef {
  const separator = key.indexOf('_');
  return {
    row: Number(key.slice(0, separator)),
    col: Number(key.slice(separator + 1)),
  };
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_ROWS = 1_048_576;
export const MAX_COLS = 16_384;
export const DEFAULT_ROW_HEIGHT = 24;
export const DEFAULT_COL_WIDTH = 100;
export const DEFAULT_SHEET_NAME = 'Sheet1';
