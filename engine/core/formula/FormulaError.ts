/**
 * Grid Engine - Formula Errors
 *
 * Parse-time kinds (InvalidSyntax, InvalidRef) reject a formula write.
 * Evaluation-time kinds end up stored in the cell as an error value.
 */

import { ERROR_CODES, ErrorValue } from '../types/index.js';
import { errorValue } from '../types/CellValue.js';

export type FormulaErrorKind =
  | 'InvalidSyntax'
  | 'InvalidRef'
  | 'UnknownFunction'
  | 'DivByZero'
  | 'InvalidArgument'
  | 'TypeError'
  | 'CircularReference';

const KIND_CODES: Record<FormulaErrorKind, string> = {
  InvalidSyntax: ERROR_CODES.INVALID_SYNTAX,
  InvalidRef: ERROR_CODES.INVALID_REF,
  UnknownFunction: ERROR_CODES.UNKNOWN_FUNCTION,
  DivByZero: ERROR_CODES.DIV_BY_ZERO,
  InvalidArgument: ERROR_CODES.INVALID_ARGUMENT,
  TypeError: ERROR_CODES.TYPE_ERROR,
  CircularReference: ERROR_CODES.CIRCULAR_REFERENCE,
};

const KIND_MESSAGES: Record<FormulaErrorKind, string> = {
  InvalidSyntax: 'Invalid syntax',
  InvalidRef: 'Invalid reference',
  UnknownFunction: 'Unknown function',
  DivByZero: 'Division by zero',
  InvalidArgument: 'Invalid argument',
  TypeError: 'Type error',
  CircularReference: 'Circular reference',
};

export class FormulaError extends Error {
  kind: FormulaErrorKind;
  detail: string;
  /** Offset into the formula text, for parse errors */
  position?: number;

  constructor(kind: FormulaErrorKind, detail: string = '', position?: number) {
    super(detail ? `${KIND_MESSAGES[kind]}: ${detail}` : KIND_MESSAGES[kind]);
    this.name = 'FormulaError';
    this.kind = kind;
    this.detail = detail;
    this.position = position;
  }

  /**
   * In-cell representation of this error.
   */
  toValue(): ErrorValue {
    return errorValue(KIND_CODES[this.kind]);
  }
}

export function isFormulaError(error: unknown): error is FormulaError {
  return error instanceof FormulaError;
}
