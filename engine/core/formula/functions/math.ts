/**
 * Grid Engine - Math Functions
 *
 * Aggregates flatten ranges and skip values that do not coerce to numbers.
 * Scalar functions return a non-coercible argument unchanged.
 */

import { CellValue, ERROR_CODES } from '../../types/index.js';
import { asNumber, errorValue, numberValue } from '../../types/CellValue.js';
import { flatten, numericValues, optionalIntegerAt, scalarAt } from './args.js';
import { FunctionDefinition, LazyArg } from './types.js';

// =============================================================================
// Aggregates
// =============================================================================

export const SUM: FunctionDefinition = {
  name: 'SUM',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    const numbers = numericValues(flatten(args));
    return numberValue(numbers.reduce((total, n) => total + n, 0));
  },
};

/**
 * AVERAGE of no numeric values is 0.
 */
export const AVERAGE: FunctionDefinition = {
  name: 'AVERAGE',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    const numbers = numericValues(flatten(args));
    if (numbers.length === 0) return numberValue(0);
    return numberValue(numbers.reduce((total, n) => total + n, 0) / numbers.length);
  },
};

/**
 * Counts number values only; numeric text does not count.
 */
export const COUNT: FunctionDefinition = {
  name: 'COUNT',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    return numberValue(flatten(args).filter(value => value.type === 'number').length);
  },
};

export const COUNTA: FunctionDefinition = {
  name: 'COUNTA',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    return numberValue(flatten(args).filter(value => value.type !== 'empty').length);
  },
};

function extreme(args: readonly LazyArg[], pick: (a: number, b: number) => number): CellValue {
  const numbers = numericValues(flatten(args));
  if (numbers.length === 0) return errorValue(ERROR_CODES.NO_NUMERIC_VALUES);
  return numberValue(numbers.reduce((a, b) => pick(a, b)));
}

export const MAX: FunctionDefinition = {
  name: 'MAX',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    return extreme(args, Math.max);
  },
};

export const MIN: FunctionDefinition = {
  name: 'MIN',
  minArgs: 0,
  maxArgs: Infinity,
  evaluate(args) {
    return extreme(args, Math.min);
  },
};

// =============================================================================
// Scalar Math
// =============================================================================

function unaryMath(name: string, op: (n: number) => CellValue): FunctionDefinition {
  return {
    name,
    minArgs: 1,
    maxArgs: 1,
    evaluate(args) {
      const value = scalarAt(args, 0, name);
      const n = asNumber(value);
      return n === null ? value : op(n);
    },
  };
}

export const ABS = unaryMath('ABS', n => numberValue(Math.abs(n)));

export const FLOOR = unaryMath('FLOOR', n => numberValue(Math.floor(n)));

export const CEIL = unaryMath('CEIL', n => numberValue(Math.ceil(n)));

export const SQRT = unaryMath('SQRT', n =>
  n < 0 ? errorValue(ERROR_CODES.NEGATIVE_SQRT) : numberValue(Math.sqrt(n))
);

/**
 * ROUND(value, [digits]). Halves round away from zero; negative digits
 * round to tens, hundreds, ...
 */
export const ROUND: FunctionDefinition = {
  name: 'ROUND',
  minArgs: 1,
  maxArgs: 2,
  evaluate(args) {
    const value = scalarAt(args, 0, 'ROUND');
    const n = asNumber(value);
    if (n === null) return value;

    const digits = optionalIntegerAt(args, 1, 0, 'ROUND');
    const factor = Math.pow(10, digits);
    return numberValue((Math.sign(n) * Math.round(Math.abs(n) * factor)) / factor);
  },
};

export const POWER: FunctionDefinition = {
  name: 'POWER',
  minArgs: 2,
  maxArgs: 2,
  evaluate(args) {
    const base = scalarAt(args, 0, 'POWER');
    const exponent = scalarAt(args, 1, 'POWER');
    const b = asNumber(base);
    const e = asNumber(exponent);
    if (b === null || e === null) return base;
    return numberValue(Math.pow(b, e));
  },
};

export const mathFunctions: FunctionDefinition[] = [
  SUM, AVERAGE, COUNT, COUNTA, MAX, MIN,
  ABS, ROUND, SQRT, FLOOR, CEIL, POWER,
];
