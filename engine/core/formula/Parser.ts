/**
 * Grid Engine - Formula Parser
 *
 * Recursive descent over lexer tokens. One method per precedence level,
 * lowest first:
 *
 *   comparison  = <> < <= > >=
 *   concat      &
 *   additive    + -
 *   term        * /
 *   power       ^
 *   unary       prefix - +, postfix %
 *   primary     literals, references, calls, ( expr )
 *
 * All binary levels are left-associative.
 */

import { booleanValue, numberValue, textValue } from '../types/CellValue.js';
import { parseCellRef } from '../reference/CellReference.js';
import { createRange } from '../reference/CellRange.js';
import { BinaryOperator, Formula, FormulaExpr } from './ast.js';
import { FormulaError, isFormulaError } from './FormulaError.js';
import { Token, TokenType, tokenize } from './Lexer.js';

export type ParseResult =
  | { success: true; formula: Formula }
  | { success: false; error: FormulaError };

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '<>', '<', '<=', '>', '>=']);
const ADDITIVE_OPERATORS: ReadonlySet<string> = new Set(['+', '-']);
const TERM_OPERATORS: ReadonlySet<string> = new Set(['*', '/']);

function isBinaryOperator(value: string): value is BinaryOperator {
  return COMPARISON_OPERATORS.has(value)
    || ADDITIVE_OPERATORS.has(value)
    || TERM_OPERATORS.has(value)
    || value === '^'
    || value === '&';
}

/**
 * Parse formula text. The text must start with "=" (surrounding whitespace
 * is ignored).
 */
export function parseFormula(text: string): ParseResult {
  const trimmed = text.trim();
  if (!trimmed.startsWith('=')) {
    return {
      success: false,
      error: new FormulaError('InvalidSyntax', 'formula must start with "="', 0),
    };
  }

  try {
    const expr = new Parser(tokenize(trimmed.slice(1))).parse();
    return { success: true, formula: { text: trimmed, expr } };
  } catch (error) {
    if (isFormulaError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

export class Parser {
  private tokens: Token[];
  private position = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): FormulaExpr {
    if (this.peek().type === 'EOF') {
      throw new FormulaError('InvalidSyntax', 'empty formula', 0);
    }

    const expr = this.parseComparison();

    const trailing = this.peek();
    if (trailing.type !== 'EOF') {
      throw new FormulaError('InvalidSyntax', `unexpected '${trailing.value}'`, trailing.start);
    }

    return expr;
  }

  // ===========================================================================
  // Binary Levels
  // ===========================================================================

  private parseComparison(): FormulaExpr {
    return this.parseBinaryLevel(COMPARISON_OPERATORS, () => this.parseConcat());
  }

  private parseConcat(): FormulaExpr {
    return this.parseBinaryLevel(new Set(['&']), () => this.parseAdditive());
  }

  private parseAdditive(): FormulaExpr {
    return this.parseBinaryLevel(ADDITIVE_OPERATORS, () => this.parseTerm());
  }

  private parseTerm(): FormulaExpr {
    return this.parseBinaryLevel(TERM_OPERATORS, () => this.parsePower());
  }

  private parsePower(): FormulaExpr {
    return this.parseBinaryLevel(new Set(['^']), () => this.parseUnary());
  }

  private parseBinaryLevel(operators: ReadonlySet<string>, next: () => FormulaExpr): FormulaExpr {
    let left = next();

    for (;;) {
      const token = this.peek();
      if (token.type !== 'OPERATOR' || !operators.has(token.value) || !isBinaryOperator(token.value)) {
        return left;
      }
      this.advance();
      const right = next();
      left = { type: 'binary', op: token.value, left, right };
    }
  }

  // ===========================================================================
  // Unary / Postfix
  // ===========================================================================

  private parseUnary(): FormulaExpr {
    const token = this.peek();
    if (token.type === 'OPERATOR' && (token.value === '-' || token.value === '+')) {
      this.advance();
      return { type: 'unary', op: token.value, operand: this.parseUnary() };
    }

    let expr = this.parsePrimary();
    while (this.peek().type === 'OPERATOR' && this.peek().value === '%') {
      this.advance();
      expr = { type: 'unary', op: '%', operand: expr };
    }
    return expr;
  }

  // ===========================================================================
  // Primary
  // ===========================================================================

  private parsePrimary(): FormulaExpr {
    const token = this.advance();

    switch (token.type) {
      case 'NUMBER': {
        const n = Number(token.value);
        if (!Number.isFinite(n)) {
          throw new FormulaError('InvalidSyntax', `number out of range '${token.value}'`, token.start);
        }
        return { type: 'literal', value: numberValue(n) };
      }

      case 'STRING':
        return { type: 'literal', value: textValue(token.value) };

      case 'LPAREN': {
        const inner = this.parseComparison();
        this.expect('RPAREN', "')'");
        return inner;
      }

      case 'IDENTIFIER':
        return this.parseIdentifier(token);

      case 'EOF':
        throw new FormulaError('InvalidSyntax', 'unexpected end of formula', token.start);

      default:
        throw new FormulaError('InvalidSyntax', `unexpected '${token.value}'`, token.start);
    }
  }

  private parseIdentifier(token: Token): FormulaExpr {
    const next = this.peek();

    if (next.type === 'LPAREN') {
      this.advance();
      return { type: 'function', name: token.value.toUpperCase(), args: this.parseArguments() };
    }

    if (next.type === 'BANG') {
      throw new FormulaError('InvalidRef', `cross-sheet reference '${token.value}!' is not supported`, token.start);
    }

    const upper = token.value.toUpperCase();
    if (upper === 'TRUE' || upper === 'FALSE') {
      return { type: 'literal', value: booleanValue(upper === 'TRUE') };
    }

    const start = parseCellRef(token.value);
    if (!start) {
      throw new FormulaError('InvalidRef', `'${token.value}'`, token.start);
    }

    if (next.type !== 'COLON') {
      return { type: 'cell', ref: start };
    }

    this.advance();
    const endToken = this.advance();
    const end = endToken.type === 'IDENTIFIER' ? parseCellRef(endToken.value) : null;
    if (!end) {
      throw new FormulaError('InvalidRef', `'${token.value}:${endToken.value}'`, token.start);
    }

    return { type: 'range', range: createRange(start, end) };
  }

  private parseArguments(): FormulaExpr[] {
    const args: FormulaExpr[] = [];

    if (this.peek().type === 'RPAREN') {
      this.advance();
      return args;
    }

    for (;;) {
      args.push(this.parseComparison());

      const token = this.advance();
      if (token.type === 'RPAREN') return args;
      if (token.type !== 'COMMA') {
        throw new FormulaError('InvalidSyntax', `expected ',' or ')' but found '${token.value}'`, token.start);
      }
    }
  }

  // ===========================================================================
  // Token Helpers
  // ===========================================================================

  private peek(): Token {
    return this.tokens[Math.min(this.position, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'EOF') this.position++;
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.advance();
    if (token.type !== type) {
      const found = token.type === 'EOF' ? 'end of formula' : `'${token.value}'`;
      throw new FormulaError('InvalidSyntax', `expected ${description} but found ${found}`, token.start);
    }
    return token;
  }
}
