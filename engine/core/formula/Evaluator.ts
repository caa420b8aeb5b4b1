/**
 * Grid Engine - Formula Evaluator
 *
 * Tree-walking evaluation of a parsed expression against a cell reader.
 *
 * Failures come in two flavours:
 * - FormulaError (DivByZero, TypeError, ...) aborts evaluation and is
 *   returned as `{ success: false }`; the caller stores `error.toValue()`.
 * - Error *values* (a referenced cell holding an error, "negative-sqrt", ...)
 *   are ordinary results and propagate through operators.
 */

import { CellRange, CellRef, CellValue, ERROR_CODES } from '../types/index.js';
import {
  EMPTY,
  asNumber,
  booleanValue,
  errorValue,
  numberValue,
  textValue,
  toDisplayString,
} from '../types/CellValue.js';
import { getRangeCellCount } from '../reference/CellRange.js';
import { BinaryExpr, BinaryOperator, FormulaExpr, FunctionExpr, UnaryExpr } from './ast.js';
import { FormulaError, isFormulaError } from './FormulaError.js';
import { ArgValue, FunctionContext, LazyArg, getFunction } from './functions/index.js';

export interface EvaluationContext {
  /**
   * Current value of a cell; null for a cell that was never written.
   * May throw FormulaError (CircularReference) when the cell is mid-evaluation.
   */
  getCell(ref: CellRef): CellValue | null;
  /**
   * Values of the written cells inside a range, row-major.
   * Cells never written are left out. Throws like getCell.
   */
  getCellsInRange(range: CellRange): Iterable<CellValue>;
  /** Clock for TODAY/NOW. Defaults to the system clock. */
  now?: () => Date;
}

export type EvaluationResult =
  | { success: true; value: CellValue }
  | { success: false; error: FormulaError };

/**
 * Evaluate an expression.
 * FormulaErrors become a failed result; anything else is rethrown.
 */
export function evaluate(expr: FormulaExpr, context: EvaluationContext): EvaluationResult {
  try {
    return { success: true, value: new Evaluator(context).evaluate(expr) };
  } catch (error) {
    if (isFormulaError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

type Comparison = -1 | 0 | 1;

export class Evaluator {
  private context: EvaluationContext;
  private functionContext: FunctionContext;

  constructor(context: EvaluationContext) {
    this.context = context;
    const clock = context.now ?? (() => new Date());
    this.functionContext = { now: clock };
  }

  evaluate(expr: FormulaExpr): CellValue {
    switch (expr.type) {
      case 'literal':
        return expr.value;

      case 'cell':
        return this.readCell(expr.ref);

      case 'range': {
        // A range outside a function argument must be a single cell
        if (getRangeCellCount(expr.range) !== 1) {
          throw new FormulaError('InvalidArgument', 'a range cannot be used as a single value');
        }
        return this.readCell(expr.range.start);
      }

      case 'function':
        return finite(this.callFunction(expr));

      case 'binary':
        return finite(this.evaluateBinary(expr));

      case 'unary':
        return finite(this.evaluateUnary(expr));
    }
  }

  private readCell(ref: CellRef): CellValue {
    return this.context.getCell(ref) ?? EMPTY;
  }

  // ===========================================================================
  // Functions
  // ===========================================================================

  private callFunction(expr: FunctionExpr): CellValue {
    const definition = getFunction(expr.name);
    if (!definition) {
      throw new FormulaError('UnknownFunction', expr.name);
    }

    const count = expr.args.length;
    if (count < definition.minArgs || count > definition.maxArgs) {
      throw new FormulaError('InvalidArgument', `${definition.name} does not take ${count} argument(s)`);
    }

    const args: LazyArg[] = expr.args.map(arg => () => this.evaluateArgument(arg));
    return definition.evaluate(args, this.functionContext);
  }

  private evaluateArgument(arg: FormulaExpr): ArgValue {
    if (arg.type !== 'range') {
      return this.evaluate(arg);
    }

    return {
      type: 'range',
      size: getRangeCellCount(arg.range),
      values: [...this.context.getCellsInRange(arg.range)],
    };
  }

  // ===========================================================================
  // Operators
  // ===========================================================================

  private evaluateBinary(expr: BinaryExpr): CellValue {
    const left = this.evaluate(expr.left);
    const right = this.evaluate(expr.right);

    switch (expr.op) {
      case '&':
        return textValue(toDisplayString(left) + toDisplayString(right));

      case '=':
      case '<>':
      case '<':
      case '<=':
      case '>':
      case '>=':
        return compareValues(expr.op, left, right);

      case '+':
      case '-':
      case '*':
      case '/':
      case '^':
        return arithmetic(expr.op, left, right);
    }
  }

  private evaluateUnary(expr: UnaryExpr): CellValue {
    const operand = this.evaluate(expr.operand);

    switch (expr.op) {
      case '+':
        return operand;
      case '-': {
        const n = operandNumber(operand, '-');
        return typeof n === 'number' ? numberValue(-n) : n;
      }
      case '%': {
        const n = operandNumber(operand, '%');
        return typeof n === 'number' ? numberValue(n / 100) : n;
      }
    }
  }
}

// =============================================================================
// Operator Semantics
// =============================================================================

/**
 * Non-finite numeric results become the "invalid-number" error value.
 */
function finite(value: CellValue): CellValue {
  if (value.type === 'number' && !Number.isFinite(value.value)) {
    return errorValue(ERROR_CODES.INVALID_NUMBER);
  }
  return value;
}

/**
 * Numeric operand: empty counts as 0, an error value is passed back for
 * propagation, anything else that does not coerce is a TypeError.
 */
function operandNumber(value: CellValue, op: string): number | CellValue {
  if (value.type === 'error') return value;
  if (value.type === 'empty') return 0;

  const n = asNumber(value);
  if (n === null) {
    throw new FormulaError('TypeError', `cannot use "${toDisplayString(value)}" with '${op}'`);
  }
  return n;
}

function arithmetic(op: '+' | '-' | '*' | '/' | '^', left: CellValue, right: CellValue): CellValue {
  const a = operandNumber(left, op);
  if (typeof a !== 'number') return a;
  const b = operandNumber(right, op);
  if (typeof b !== 'number') return b;

  switch (op) {
    case '+':
      return numberValue(a + b);
    case '-':
      return numberValue(a - b);
    case '*':
      return numberValue(a * b);
    case '/':
      if (b === 0) {
        throw new FormulaError('DivByZero');
      }
      return numberValue(a / b);
    case '^':
      return numberValue(Math.pow(a, b));
  }
}

type Comparable =
  | { kind: 'numeric'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean };

/**
 * Comparison key of a value; null for empty.
 */
function comparable(value: CellValue): Comparable | null {
  switch (value.type) {
    case 'number':
      return { kind: 'numeric', value: value.value };
    case 'date':
      return { kind: 'numeric', value: value.days };
    case 'text':
      return { kind: 'text', value: value.value };
    case 'boolean':
      return { kind: 'boolean', value: value.value };
    case 'empty':
    case 'error':
      return null;
  }
}

/**
 * An empty operand takes the zero value of the other side's class.
 */
function zeroFor(other: Comparable | null): Comparable {
  switch (other?.kind) {
    case 'text':
      return { kind: 'text', value: '' };
    case 'boolean':
      return { kind: 'boolean', value: false };
    default:
      return { kind: 'numeric', value: 0 };
  }
}

function order<T extends number | string>(a: T, b: T): Comparison {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareComparables(a: Comparable, b: Comparable): Comparison | null {
  if (a.kind === 'numeric' && b.kind === 'numeric') return order(a.value, b.value);
  if (a.kind === 'text' && b.kind === 'text') {
    return order(a.value.toLowerCase(), b.value.toLowerCase());
  }
  if (a.kind === 'boolean' && b.kind === 'boolean') {
    return order(Number(a.value), Number(b.value));
  }
  return null;
}

function compareValues(
  op: Extract<BinaryOperator, '=' | '<>' | '<' | '<=' | '>' | '>='>,
  left: CellValue,
  right: CellValue
): CellValue {
  if (left.type === 'error') return left;
  if (right.type === 'error') return right;

  const a = comparable(left);
  const b = comparable(right);
  const result = compareComparables(a ?? zeroFor(b), b ?? zeroFor(a));

  if (result === null) {
    // Mismatched types never compare equal
    if (op === '=') return booleanValue(false);
    if (op === '<>') return booleanValue(true);
    return errorValue(ERROR_CODES.UNEQUAL_TYPES);
  }

  switch (op) {
    case '=':
      return booleanValue(result === 0);
    case '<>':
      return booleanValue(result !== 0);
    case '<':
      return booleanValue(result < 0);
    case '<=':
      return booleanValue(result <= 0);
    case '>':
      return booleanValue(result > 0);
    case '>=':
      return booleanValue(result >= 0);
  }
}
