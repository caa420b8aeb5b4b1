/**
 * Grid Engine - Formula Lexer Tests
 */

import { describe, it, expect } from 'vitest';
import { tokenize } from './Lexer.js';
import { FormulaError } from './FormulaError.js';

function types(input: string): string[] {
  return tokenize(input).map(token => token.type);
}

function values(input: string): string[] {
  return tokenize(input).map(token => token.value);
}

describe('Lexer', () => {
  it('should tokenize a function call with a range', () => {
    expect(types('SUM(A1:B2, 3)')).toEqual([
      'IDENTIFIER', 'LPAREN', 'IDENTIFIER', 'COLON', 'IDENTIFIER', 'COMMA', 'NUMBER', 'RPAREN', 'EOF',
    ]);
  });

  it('should record source offsets', () => {
    const tokens = tokenize('A1 + 20');
    expect(tokens.map(token => token.start)).toEqual([0, 3, 5, 7]);
  });

  it('should read two-character operators greedily', () => {
    expect(values('A1<>B1<=C1>=D1')).toEqual(['A1', '<>', 'B1', '<=', 'C1', '>=', 'D1', '']);
  });

  it('should read numbers with decimals and exponents', () => {
    expect(values('1.5 .25 2e3 4E-2')).toEqual(['1.5', '.25', '2e3', '4E-2', '']);
  });

  it('should not consume an exponent marker without digits', () => {
    expect(types('2e')).toEqual(['NUMBER', 'IDENTIFIER', 'EOF']);
  });

  it('should unescape doubled quotes in strings', () => {
    const [token] = tokenize('"say ""hi"""');
    expect(token).toEqual({ type: 'STRING', value: 'say "hi"', start: 0 });
  });

  it('should read identifiers with $ and dots', () => {
    expect(values('$A$1 my.name')).toEqual(['$A$1', 'my.name', '']);
  });

  it('should produce a BANG token for sheet separators', () => {
    expect(types('Sheet2!A1')).toEqual(['IDENTIFIER', 'BANG', 'IDENTIFIER', 'EOF']);
  });

  it('should reject unterminated strings', () => {
    expect(() => tokenize('"open')).toThrow('Invalid syntax: unterminated string literal');
  });

  it('should reject unknown characters with their position', () => {
    try {
      tokenize('1 # 2');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormulaError);
      if (error instanceof FormulaError) {
        expect(error.kind).toBe('InvalidSyntax');
        expect(error.position).toBe(2);
      }
    }
  });
});
