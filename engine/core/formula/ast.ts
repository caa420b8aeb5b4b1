/**
 * Grid Engine - Formula AST
 */

import { CellKey, CellRef, CellRange, CellValue, cellKey } from '../types/index.js';
import { toDisplayString } from '../types/CellValue.js';
import { toA1 } from '../reference/CellReference.js';
import { rangeToString } from '../reference/CellRange.js';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '^'
  | '=' | '<>' | '<' | '<=' | '>' | '>='
  | '&';

export type UnaryOperator = '-' | '+' | '%';

export interface LiteralExpr {
  readonly type: 'literal';
  readonly value: CellValue;
}

export interface CellRefExpr {
  readonly type: 'cell';
  readonly ref: CellRef;
}

export interface RangeExpr {
  readonly type: 'range';
  readonly range: CellRange;
}

export interface FunctionExpr {
  readonly type: 'function';
  /** Name as written, uppercased */
  readonly name: string;
  readonly args: readonly FormulaExpr[];
}

export interface BinaryExpr {
  readonly type: 'binary';
  readonly op: BinaryOperator;
  readonly left: FormulaExpr;
  readonly right: FormulaExpr;
}

export interface UnaryExpr {
  readonly type: 'unary';
  readonly op: UnaryOperator;
  readonly operand: FormulaExpr;
}

export type FormulaExpr =
  | LiteralExpr
  | CellRefExpr
  | RangeExpr
  | FunctionExpr
  | BinaryExpr
  | UnaryExpr;

/**
 * A parsed formula: its source text and expression tree.
 */
export interface Formula {
  readonly text: string;
  readonly expr: FormulaExpr;
}

export interface FormulaReferences {
  cells: CellRef[];
  ranges: CellRange[];
}

/**
 * Collect the cells and ranges an expression reads.
 * Duplicate cells are reported once.
 */
export function collectReferences(expr: FormulaExpr): FormulaReferences {
  const cells: CellRef[] = [];
  const ranges: CellRange[] = [];
  const seen = new Set<CellKey>();

  // Explicit stack keeps deep operator chains off the call stack
  const stack: FormulaExpr[] = [expr];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    switch (node.type) {
      case 'literal':
        break;
      case 'cell': {
        const key = cellKey(node.ref);
        if (!seen.has(key)) {
          seen.add(key);
          cells.push(node.ref);
        }
        break;
      }
      case 'range':
        ranges.push(node.range);
        break;
      case 'function':
        for (let i = node.args.length - 1; i >= 0; i--) stack.push(node.args[i]);
        break;
      case 'binary':
        stack.push(node.right, node.left);
        break;
      case 'unary':
        stack.push(node.operand);
        break;
    }
  }

  return { cells, ranges };
}

/**
 * Does the expression call any of the given functions (uppercase names)?
 */
export function callsAnyFunction(expr: FormulaExpr, names: ReadonlySet<string>): boolean {
  switch (expr.type) {
    case 'literal':
    case 'cell':
    case 'range':
      return false;
    case 'function':
      return names.has(expr.name) || expr.args.some(arg => callsAnyFunction(arg, names));
    case 'binary':
      return callsAnyFunction(expr.left, names) || callsAnyFunction(expr.right, names);
    case 'unary':
      return callsAnyFunction(expr.operand, names);
  }
}

const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  '=': 1, '<>': 1, '<': 1, '<=': 1, '>': 1, '>=': 1,
  '&': 2,
  '+': 3, '-': 3,
  '*': 4, '/': 4,
  '^': 5,
};

const UNARY_PRECEDENCE = 6;

function precedenceOf(expr: FormulaExpr): number {
  if (expr.type === 'binary') return BINARY_PRECEDENCE[expr.op];
  if (expr.type === 'unary') return UNARY_PRECEDENCE;
  return 7;
}

function formatLiteral(value: CellValue): string {
  if (value.type === 'text') {
    return `"${value.value.replace(/"/g, '""')}"`;
  }
  return toDisplayString(value);
}

/**
 * Print an expression as canonical formula text (without the leading "=").
 * Parentheses are only emitted where precedence requires them.
 */
export function formatExpression(expr: FormulaExpr): string {
  switch (expr.type) {
    case 'literal':
      return formatLiteral(expr.value);
    case 'cell':
      return toA1(expr.ref);
    case 'range':
      return rangeToString(expr.range);
    case 'function':
      return `${expr.name}(${expr.args.map(formatExpression).join(',')})`;
    case 'binary': {
      const own = BINARY_PRECEDENCE[expr.op];
      const left = formatExpression(expr.left);
      const right = formatExpression(expr.right);
      // Left-associative: a right operand of equal precedence needs parentheses
      const leftText = precedenceOf(expr.left) < own ? `(${left})` : left;
      const rightText = precedenceOf(expr.right) <= own ? `(${right})` : right;
      return `${leftText}${expr.op}${rightText}`;
    }
    case 'unary': {
      const operand = formatExpression(expr.operand);
      const operandText = precedenceOf(expr.operand) < UNARY_PRECEDENCE ? `(${operand})` : operand;
      return expr.op === '%' ? `${operandText}%` : `${expr.op}${operandText}`;
    }
  }
}
