/**
 * Grid Engine - Formula Module Exports
 */

export { FormulaError, isFormulaError } from './FormulaError.js';
export type { FormulaErrorKind } from './FormulaError.js';

export { Lexer, tokenize } from './Lexer.js';
export type { Token, TokenType } from './Lexer.js';

export { Parser, parseFormula } from './Parser.js';
export type { ParseResult } from './Parser.js';

export { collectReferences, callsAnyFunction, formatExpression } from './ast.js';
export type {
  BinaryOperator,
  UnaryOperator,
  LiteralExpr,
  CellRefExpr,
  RangeExpr,
  FunctionExpr,
  BinaryExpr,
  UnaryExpr,
  FormulaExpr,
  Formula,
  FormulaReferences,
} from './ast.js';

export { Evaluator, evaluate } from './Evaluator.js';
export type { EvaluationContext, EvaluationResult } from './Evaluator.js';

export {
  functions,
  getFunction,
  resolveFunctionName,
  isVolatileFunction,
  FUNCTION_SYNONYMS,
  VOLATILE_FUNCTIONS,
} from './functions/index.js';
export type { ArgValue, FunctionContext, FunctionDefinition, LazyArg, RangeValues } from './functions/index.js';

export { DependencyGraph } from './DependencyGraph.js';
export type {
  DependencyInfo,
  FormulaDependencies,
  CircularReferenceError,
  CalculationOrder,
} from './DependencyGraph.js';

export { FormulaEngine } from './FormulaEngine.js';
export type {
  CellState,
  CalculationError,
  CalculationResult,
  CellRead,
  FormulaWriteResult,
  FormulaEngineOptions,
} from './FormulaEngine.js';
