/**
 * Grid Engine - Logical Functions
 */

import { CellValue } from '../../types/index.js';
import { booleanValue, isTruthy } from '../../types/CellValue.js';
import { firstError, flatten, scalarAt } from './args.js';
import { FunctionDefinition } from './types.js';

/**
 * IF(condition, then, [else]). Only the chosen branch is evaluated;
 * a missing else branch yields FALSE.
 */
export const IF: FunctionDefinition = {
  name: 'IF',
  minArgs: 2,
  maxArgs: 3,
  evaluate(args) {
    const condition = scalarAt(args, 0, 'IF');
    if (condition.type === 'error') return condition;

    if (isTruthy(condition)) {
      return scalarAt(args, 1, 'IF');
    }
    return args.length > 2 ? scalarAt(args, 2, 'IF') : booleanValue(false);
  },
};

function combine(name: string, reduce: (flags: boolean[]) => boolean): FunctionDefinition {
  return {
    name,
    minArgs: 1,
    maxArgs: Infinity,
    evaluate(args): CellValue {
      const values = flatten(args);
      const error = firstError(values);
      if (error) return error;
      return booleanValue(reduce(values.map(isTruthy)));
    },
  };
}

export const AND = combine('AND', flags => flags.every(Boolean));

export const OR = combine('OR', flags => flags.some(Boolean));

export const NOT: FunctionDefinition = {
  name: 'NOT',
  minArgs: 1,
  maxArgs: 1,
  evaluate(args) {
    const value = scalarAt(args, 0, 'NOT');
    if (value.type === 'error') return value;
    return booleanValue(!isTruthy(value));
  },
};

export const TRUE: FunctionDefinition = {
  name: 'TRUE',
  minArgs: 0,
  maxArgs: 0,
  evaluate: () => booleanValue(true),
};

export const FALSE: FunctionDefinition = {
  name: 'FALSE',
  minArgs: 0,
  maxArgs: 0,
  evaluate: () => booleanValue(false),
};

export const logicalFunctions: FunctionDefinition[] = [IF, AND, OR, NOT, TRUE, FALSE];
