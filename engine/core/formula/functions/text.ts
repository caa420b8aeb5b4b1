/**
 * Grid Engine - Text Functions
 *
 * Arguments are read as display strings. Error arguments propagate,
 * except in CONCATENATE which joins display strings like `&`.
 * Positions are 1-based, counted in UTF-16 code units.
 */

import { CellValue, ERROR_CODES } from '../../types/index.js';
import { errorValue, numberValue, textValue, toDisplayString } from '../../types/CellValue.js';
import { FormulaError } from '../FormulaError.js';
import { firstError, flatten, integerArg, optionalIntegerAt, scalarAt } from './args.js';
import { FunctionDefinition, LazyArg } from './types.js';

/**
 * Read the scalar arguments of a text function, or the first error among them.
 */
function readScalars(args: readonly LazyArg[], fn: string): CellValue[] | CellValue {
  const values = args.map((_, i) => scalarAt(args, i, fn));
  return firstError(values) ?? values;
}

function textFunction(
  name: string,
  minArgs: number,
  maxArgs: number,
  body: (values: CellValue[], args: readonly LazyArg[]) => CellValue
): FunctionDefinition {
  return {
    name,
    minArgs,
    maxArgs,
    evaluate(args) {
      const read = readScalars(args, name);
      return Array.isArray(read) ? body(read, args) : read;
    },
  };
}

function nonNegative(n: number, fn: string, what: string): number {
  if (n < 0) {
    throw new FormulaError('InvalidArgument', `${fn} ${what} must not be negative`);
  }
  return n;
}

export const CONCATENATE: FunctionDefinition = {
  name: 'CONCATENATE',
  minArgs: 1,
  maxArgs: Infinity,
  evaluate(args) {
    return textValue(flatten(args).map(toDisplayString).join(''));
  },
};

export const LEN = textFunction('LEN', 1, 1, ([value]) =>
  numberValue(toDisplayString(value).length)
);

export const UPPER = textFunction('UPPER', 1, 1, ([value]) =>
  textValue(toDisplayString(value).toUpperCase())
);

export const LOWER = textFunction('LOWER', 1, 1, ([value]) =>
  textValue(toDisplayString(value).toLowerCase())
);

/**
 * Strips leading/trailing spaces and collapses inner runs to one space.
 */
export const TRIM = textFunction('TRIM', 1, 1, ([value]) =>
  textValue(toDisplayString(value).trim().replace(/\s+/g, ' '))
);

export const LEFT = textFunction('LEFT', 1, 2, ([value], args) => {
  const count = nonNegative(optionalIntegerAt(args, 1, 1, 'LEFT'), 'LEFT', 'count');
  return textValue(toDisplayString(value).slice(0, count));
});

export const RIGHT = textFunction('RIGHT', 1, 2, ([value], args) => {
  const count = nonNegative(optionalIntegerAt(args, 1, 1, 'RIGHT'), 'RIGHT', 'count');
  const text = toDisplayString(value);
  return textValue(count === 0 ? '' : text.slice(Math.max(0, text.length - count)));
});

/**
 * MID(text, start, count) with a 1-based start.
 */
export const MID = textFunction('MID', 3, 3, ([value, startArg, countArg]) => {
  const start = integerArg(startArg, 'MID');
  if (start < 1) {
    throw new FormulaError('InvalidArgument', 'MID start must be at least 1');
  }
  const count = nonNegative(integerArg(countArg, 'MID'), 'MID', 'count');
  return textValue(toDisplayString(value).slice(start - 1, start - 1 + count));
});

/**
 * FIND(needle, haystack, [start]). Case-sensitive; returns the 1-based
 * position or the "not-found" error.
 */
export const FIND = textFunction('FIND', 2, 3, ([needleArg, haystackArg], args) => {
  const start = optionalIntegerAt(args, 2, 1, 'FIND');
  if (start < 1) {
    throw new FormulaError('InvalidArgument', 'FIND start must be at least 1');
  }
  const index = toDisplayString(haystackArg).indexOf(toDisplayString(needleArg), start - 1);
  return index === -1 ? errorValue(ERROR_CODES.NOT_FOUND) : numberValue(index + 1);
});

/**
 * SUBSTITUTE(text, old, new) replaces every occurrence.
 */
export const SUBSTITUTE = textFunction('SUBSTITUTE', 3, 3, ([value, oldArg, newArg]) => {
  const text = toDisplayString(value);
  const search = toDisplayString(oldArg);
  if (search === '') return textValue(text);
  return textValue(text.split(search).join(toDisplayString(newArg)));
});

export const CHAR = textFunction('CHAR', 1, 1, ([value]) => {
  const code = integerArg(value, 'CHAR');
  if (code < 1 || code > 0x10ffff) {
    throw new FormulaError('InvalidArgument', `CHAR code out of range: ${code}`);
  }
  return textValue(String.fromCodePoint(code));
});

export const CODE = textFunction('CODE', 1, 1, ([value]) => {
  const code = toDisplayString(value).codePointAt(0);
  if (code === undefined) {
    throw new FormulaError('InvalidArgument', 'CODE of empty text');
  }
  return numberValue(code);
});

export const textFunctions: FunctionDefinition[] = [
  CONCATENATE, LEN, UPPER, LOWER, TRIM, LEFT, RIGHT, MID, FIND, SUBSTITUTE, CHAR, CODE,
];
