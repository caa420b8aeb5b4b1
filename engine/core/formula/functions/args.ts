/**
 * Grid Engine - Argument Helpers
 *
 * Shared coercions for function implementations. Helpers that reject an
 * argument throw FormulaError; value-level failures are returned as
 * error values by the functions themselves.
 */

import { CellValue, ErrorValue } from '../../types/index.js';
import { EMPTY, asNumber, toDisplayString } from '../../types/CellValue.js';
import { FormulaError } from '../FormulaError.js';
import { ArgValue, LazyArg, RangeValues } from './types.js';

export function isRangeArg(arg: ArgValue): arg is RangeValues {
  return arg.type === 'range';
}

/**
 * A scalar argument. A single-cell range is accepted as its one value.
 */
export function scalar(arg: ArgValue, fn: string): CellValue {
  if (!isRangeArg(arg)) return arg;
  if (arg.size === 1) return arg.values[0] ?? EMPTY;
  throw new FormulaError('InvalidArgument', `${fn} expects a single value, got a range`);
}

export function scalarAt(args: readonly LazyArg[], index: number, fn: string): CellValue {
  return scalar(args[index](), fn);
}

/**
 * Evaluate every argument and flatten ranges into one list.
 * The unwritten cells of a range contribute a single EMPTY: no function
 * reads the number of empties, only whether there are any.
 */
export function flatten(args: readonly LazyArg[]): CellValue[] {
  const values: CellValue[] = [];
  for (const arg of args) {
    const value = arg();
    if (!isRangeArg(value)) {
      values.push(value);
      continue;
    }
    for (const item of value.values) {
      values.push(item);
    }
    if (value.values.length < value.size) {
      values.push(EMPTY);
    }
  }
  return values;
}

/**
 * Numbers among the values; anything that does not coerce is skipped.
 */
export function numericValues(values: readonly CellValue[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    const n = asNumber(value);
    if (n !== null) numbers.push(n);
  }
  return numbers;
}

export function firstError(values: readonly CellValue[]): ErrorValue | null {
  for (const value of values) {
    if (value.type === 'error') return value;
  }
  return null;
}

/**
 * Integer argument (truncated). Empty counts as 0.
 */
export function integerArg(value: CellValue, fn: string): number {
  if (value.type === 'empty') return 0;
  const n = asNumber(value);
  if (n === null || !Number.isFinite(n)) {
    throw new FormulaError('InvalidArgument', `${fn} expects a number, got "${toDisplayString(value)}"`);
  }
  return Math.trunc(n);
}

/**
 * Integer argument that may be omitted.
 */
export function optionalIntegerAt(
  args: readonly LazyArg[],
  index: number,
  fallback: number,
  fn: string
): number {
  if (index >= args.length) return fallback;
  return integerArg(scalarAt(args, index, fn), fn);
}
