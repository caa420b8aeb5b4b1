/**
 * Grid Engine - Function Library Types
 */

import { CellValue } from '../../types/index.js';

/**
 * An evaluated range argument. Only written cells are listed, row-major;
 * the other `size - values.length` cells of the range are empty.
 */
export interface RangeValues {
  type: 'range';
  /** Cell count of the range */
  size: number;
  values: readonly CellValue[];
}

/**
 * An evaluated argument: a scalar or a range.
 */
export type ArgValue = CellValue | RangeValues;

/**
 * Arguments are evaluated on demand, so IF only evaluates the branch it takes.
 */
export type LazyArg = () => ArgValue;

export interface FunctionContext {
  now(): Date;
}

export interface FunctionDefinition {
  name: string;
  minArgs: number;
  /** Infinity for variadic functions */
  maxArgs: number;
  /** Result depends on something other than the arguments (the clock) */
  volatile?: boolean;
  evaluate(args: readonly LazyArg[], context: FunctionContext): CellValue;
}
