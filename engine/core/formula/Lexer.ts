/**
 * Grid Engine - Formula Lexer
 *
 * Single pass over the formula body (text after "="), producing tokens
 * with source offsets for error reporting.
 */

import { FormulaError } from './FormulaError.js';

export type TokenType =
  | 'NUMBER'
  | 'STRING'
  | 'IDENTIFIER'
  | 'OPERATOR'
  | 'LPAREN'
  | 'RPAREN'
  | 'COMMA'
  | 'COLON'
  | 'BANG'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character in the lexed text */
  start: number;
}

const TWO_CHAR_OPERATORS = new Set(['<>', '<=', '>=']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '^', '&', '=', '<', '>', '%']);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return (ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z') || ch === '_' || ch === '$';
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch) || ch === '.';
}

export class Lexer {
  private input: string;
  private position = 0;

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.position = 0;

    while (this.position < this.input.length) {
      const ch = this.input[this.position];

      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
        this.position++;
        continue;
      }

      tokens.push(this.nextToken(ch));
    }

    tokens.push({ type: 'EOF', value: '', start: this.position });
    return tokens;
  }

  private nextToken(ch: string): Token {
    const start = this.position;

    switch (ch) {
      case '(':
        this.position++;
        return { type: 'LPAREN', value: ch, start };
      case ')':
        this.position++;
        return { type: 'RPAREN', value: ch, start };
      case ',':
        this.position++;
        return { type: 'COMMA', value: ch, start };
      case ':':
        this.position++;
        return { type: 'COLON', value: ch, start };
      case '!':
        this.position++;
        return { type: 'BANG', value: ch, start };
      case '"':
        return this.readString();
    }

    const pair = this.input.slice(start, start + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      this.position += 2;
      return { type: 'OPERATOR', value: pair, start };
    }
    if (ONE_CHAR_OPERATORS.has(ch)) {
      this.position++;
      return { type: 'OPERATOR', value: ch, start };
    }

    if (isDigit(ch) || (ch === '.' && isDigit(this.input[start + 1] ?? ''))) {
      return this.readNumber();
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifier();
    }

    throw new FormulaError('InvalidSyntax', `unexpected character '${ch}'`, start);
  }

  private readNumber(): Token {
    const start = this.position;

    while (isDigit(this.peek())) this.position++;
    if (this.peek() === '.') {
      this.position++;
      while (isDigit(this.peek())) this.position++;
    }

    // Exponent only when digits follow: "1E3", "2.5e-4"
    if (this.peek() === 'e' || this.peek() === 'E') {
      let lookahead = this.position + 1;
      const sign = this.input[lookahead];
      if (sign === '+' || sign === '-') lookahead++;
      if (isDigit(this.input[lookahead] ?? '')) {
        this.position = lookahead;
        while (isDigit(this.peek())) this.position++;
      }
    }

    return { type: 'NUMBER', value: this.input.slice(start, this.position), start };
  }

  private readString(): Token {
    const start = this.position;
    this.position++; // opening quote
    let value = '';

    while (this.position < this.input.length) {
      const ch = this.input[this.position];
      if (ch === '"') {
        // "" inside a string is an escaped quote
        if (this.input[this.position + 1] === '"') {
          value += '"';
          this.position += 2;
          continue;
        }
        this.position++;
        return { type: 'STRING', value, start };
      }
      value += ch;
      this.position++;
    }

    throw new FormulaError('InvalidSyntax', 'unterminated string literal', start);
  }

  private readIdentifier(): Token {
    const start = this.position;
    while (this.position < this.input.length && isIdentifierPart(this.input[this.position])) {
      this.position++;
    }
    return { type: 'IDENTIFIER', value: this.input.slice(start, this.position), start };
  }

  private peek(): string {
    return this.input[this.position] ?? '';
  }
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
