/**
 * Grid Engine - Formula Parser Tests
 *
 * Covers:
 * - Operator precedence and associativity
 * - Literals, references, ranges and calls
 * - Rejected formulas (syntax and reference errors)
 * - Canonical printing and reference collection
 */

import { describe, it, expect } from 'vitest';
import { parseFormula } from './Parser.js';
import { Formula, FormulaExpr, callsAnyFunction, collectReferences, formatExpression } from './ast.js';
import { FormulaErrorKind } from './FormulaError.js';

// =============================================================================
// Test Helpers
// =============================================================================

function parse(text: string): Formula {
  const result = parseFormula(text);
  if (!result.success) {
    throw new Error(`expected ${text} to parse: ${result.error.message}`);
  }
  return result.formula;
}

function expr(text: string): FormulaExpr {
  return parse(text).expr;
}

function print(text: string): string {
  return formatExpression(expr(text));
}

function rejection(text: string): FormulaErrorKind | null {
  const result = parseFormula(text);
  return result.success ? null : result.error.kind;
}

// =============================================================================
// Structure
// =============================================================================

describe('parseFormula', () => {
  describe('literals and references', () => {
    it('should parse numbers, strings and booleans', () => {
      expect(expr('=42')).toEqual({ type: 'literal', value: { type: 'number', value: 42 } });
      expect(expr('="a""b"')).toEqual({ type: 'literal', value: { type: 'text', value: 'a"b' } });
      expect(expr('=true')).toEqual({ type: 'literal', value: { type: 'boolean', value: true } });
    });

    it('should parse cell references case-insensitively', () => {
      expect(expr('=b3')).toEqual({ type: 'cell', ref: { row: 2, col: 1 } });
      expect(expr('=$B$3')).toEqual({ type: 'cell', ref: { row: 2, col: 1 } });
    });

    it('should normalize range corners', () => {
      expect(expr('=C5:A1')).toEqual({
        type: 'range',
        range: { start: { row: 0, col: 0 }, end: { row: 4, col: 2 } },
      });
    });

    it('should uppercase function names and allow empty argument lists', () => {
      expect(expr('=sum(1,2)')).toEqual({
        type: 'function',
        name: 'SUM',
        args: [
          { type: 'literal', value: { type: 'number', value: 1 } },
          { type: 'literal', value: { type: 'number', value: 2 } },
        ],
      });
      expect(expr('=now()')).toEqual({ type: 'function', name: 'NOW', args: [] });
    });

    it('should keep the trimmed source text', () => {
      expect(parse('  =A1+1 ').text).toBe('=A1+1');
    });
  });

  describe('precedence', () => {
    it('should bind * tighter than +', () => {
      expect(print('=1+2*3')).toBe('1+2*3');
      expect(print('=(1+2)*3')).toBe('(1+2)*3');
    });

    it('should associate to the left', () => {
      expect(print('=10-4-3')).toBe('10-4-3');
      expect(print('=10-(4-3)')).toBe('10-(4-3)');
      expect(print('=2^3^2')).toBe('2^3^2');
    });

    it('should bind unary minus tighter than ^', () => {
      expect(expr('=-2^2')).toEqual({
        type: 'binary',
        op: '^',
        left: { type: 'unary', op: '-', operand: { type: 'literal', value: { type: 'number', value: 2 } } },
        right: { type: 'literal', value: { type: 'number', value: 2 } },
      });
    });

    it('should put & between comparison and arithmetic', () => {
      expect(print('=A1&B1+1=C1')).toBe('A1&B1+1=C1');
      expect(print('=(A1&B1)+1')).toBe('(A1&B1)+1');
    });

    it('should apply postfix % repeatedly', () => {
      expect(print('=50%%')).toBe('50%%');
      expect(print('=-A1%')).toBe('-A1%');
    });

    it('should drop redundant parentheses', () => {
      expect(print('=((A1))+(B1*2)')).toBe('A1+B1*2');
    });
  });

  // ===========================================================================
  // Rejections
  // ===========================================================================

  describe('rejections', () => {
    it('should require a leading =', () => {
      expect(rejection('A1+1')).toBe('InvalidSyntax');
    });

    it('should reject malformed syntax', () => {
      expect(rejection('=')).toBe('InvalidSyntax');
      expect(rejection('=1+')).toBe('InvalidSyntax');
      expect(rejection('=(1+2')).toBe('InvalidSyntax');
      expect(rejection('=1 2')).toBe('InvalidSyntax');
      expect(rejection('=SUM(1;2)')).toBe('InvalidSyntax');
      expect(rejection('=SUM(1,')).toBe('InvalidSyntax');
      expect(rejection('=1e999')).toBe('InvalidSyntax');
    });

    it('should reject bad references', () => {
      expect(rejection('=A0')).toBe('InvalidRef');
      expect(rejection('=foo')).toBe('InvalidRef');
      expect(rejection('=A1:5')).toBe('InvalidRef');
      expect(rejection('=Sheet2!A1')).toBe('InvalidRef');
    });

    it('should describe what was found', () => {
      const result = parseFormula('=(1');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Invalid syntax: expected ')' but found end of formula");
      }
    });
  });
});

// =============================================================================
// AST Helpers
// =============================================================================

describe('collectReferences', () => {
  it('should report each cell once and every range', () => {
    const refs = collectReferences(expr('=A1+A1*SUM(B1:B3,C2)+IF(A1,D4,1)'));

    expect(refs.cells).toEqual([
      { row: 0, col: 0 },
      { row: 1, col: 2 },
      { row: 3, col: 3 },
    ]);
    expect(refs.ranges).toEqual([{ start: { row: 0, col: 1 }, end: { row: 2, col: 1 } }]);
  });

  it('should return nothing for constant formulas', () => {
    expect(collectReferences(expr('=1+2'))).toEqual({ cells: [], ranges: [] });
  });
});

describe('callsAnyFunction', () => {
  it('should find nested calls', () => {
    const names = new Set(['NOW']);
    expect(callsAnyFunction(expr('=1+ROUND(NOW(),0)'), names)).toBe(true);
    expect(callsAnyFunction(expr('=ROUND(A1,0)'), names)).toBe(false);
  });
});

describe('formatExpression', () => {
  it('should print canonical references and quoted strings', () => {
    expect(print('=sum(a1:c5, "x""y", true)')).toBe('SUM(A1:C5,"x""y",TRUE)');
  });

  it('should reparse to the same tree', () => {
    const original = expr('=-(A1+2)*B1^2%&"s"');
    const reparsed = expr(`=${formatExpression(original)}`);
    expect(reparsed).toEqual(original);
  });
});
