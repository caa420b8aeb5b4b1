/**
 * Grid Engine - Sheet Unit Tests
 *
 * Covers:
 * - Sparse storage and removal of empty cells
 * - Range, row and column queries
 * - Used range tracking
 * - Row/column sizing and frozen panes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Sheet } from './Sheet.js';
import { Cell } from '../types/index.js';
import { EMPTY, numberValue, textValue } from '../types/CellValue.js';
import { createRange } from '../reference/CellRange.js';

// =============================================================================
// Test Helpers
// =============================================================================

function numberCell(n: number): Cell {
  return { value: numberValue(n) };
}

describe('Sheet', () => {
  let sheet: Sheet;

  beforeEach(() => {
    sheet = new Sheet('Sheet1');
  });

  // ===========================================================================
  // Cell Storage
  // ===========================================================================

  describe('cell storage', () => {
    it('should return null for cells never written', () => {
      expect(sheet.getCell({ row: 0, col: 0 })).toBeNull();
      expect(sheet.cellCount).toBe(0);
    });

    it('should store and return cells', () => {
      sheet.setCell({ row: 2, col: 1 }, { value: textValue('hello') });

      expect(sheet.getCell({ row: 2, col: 1 })).toEqual({ value: textValue('hello') });
      expect(sheet.hasCell({ row: 2, col: 1 })).toBe(true);
      expect(sheet.cellCount).toBe(1);
    });

    it('should remove the cell when an empty value is written', () => {
      sheet.setCell({ row: 0, col: 0 }, numberCell(1));
      sheet.setCell({ row: 0, col: 0 }, { value: EMPTY });

      expect(sheet.getCell({ row: 0, col: 0 })).toBeNull();
      expect(sheet.cellCount).toBe(0);
    });

    it('should keep empty-valued formula cells', () => {
      sheet.setCell({ row: 0, col: 0 }, { value: EMPTY, formula: '=B1' });
      expect(sheet.hasCell({ row: 0, col: 0 })).toBe(true);
    });

    it('should hand out the stored object', () => {
      sheet.setCell({ row: 0, col: 0 }, numberCell(1));
      const cell = sheet.getCell({ row: 0, col: 0 });
      if (cell) cell.value = numberValue(2);

      expect(sheet.getCell({ row: 0, col: 0 })?.value).toEqual(numberValue(2));
    });

    it('should iterate stored cells in insertion order', () => {
      sheet.setCell({ row: 5, col: 0 }, numberCell(1));
      sheet.setCell({ row: 0, col: 3 }, numberCell(2));

      const refs = [...sheet.entries()].map(([ref]) => ref);
      expect(refs).toEqual([{ row: 5, col: 0 }, { row: 0, col: 3 }]);
    });
  });

  // ===========================================================================
  // Range Queries
  // ===========================================================================

  describe('range queries', () => {
    beforeEach(() => {
      sheet.setCell({ row: 0, col: 0 }, numberCell(1));
      sheet.setCell({ row: 1, col: 1 }, numberCell(2));
      sheet.setCell({ row: 4, col: 2 }, numberCell(3));
    });

    it('should report the used range', () => {
      expect(sheet.getUsedRange()).toEqual({ start: { row: 0, col: 0 }, end: { row: 4, col: 2 } });
    });

    it('should shrink the used range when edge cells are cleared', () => {
      sheet.clearCell({ row: 4, col: 2 });
      expect(sheet.getUsedRange()).toEqual({ start: { row: 0, col: 0 }, end: { row: 1, col: 1 } });
    });

    it('should return null for an empty sheet', () => {
      sheet.clear();
      expect(sheet.getUsedRange()).toBeNull();
    });

    it('should find cells in a small range', () => {
      const cells = sheet.getCellsInRange(createRange({ row: 0, col: 0 }, { row: 0, col: 1 }));
      expect([...cells.keys()]).toEqual(['0_0']);
    });

    it('should find cells in a large range', () => {
      const cells = sheet.getCellsInRange(createRange({ row: 0, col: 0 }, { row: 100, col: 100 }));
      expect(cells.size).toBe(3);
    });

    it('should clear a range and report the removed cells', () => {
      const removed = sheet.clearRange(createRange({ row: 0, col: 0 }, { row: 1, col: 1 }));

      expect(removed).toHaveLength(2);
      expect(sheet.cellCount).toBe(1);
      expect(sheet.hasCell({ row: 4, col: 2 })).toBe(true);
    });

    it('should query rows and columns', () => {
      sheet.setCell({ row: 1, col: 3 }, numberCell(4));

      expect([...sheet.getCellsInRow(1).keys()].sort()).toEqual([1, 3]);
      expect([...sheet.getCellsInColumn(2).keys()]).toEqual([4]);
      expect(sheet.getCellsInRow(9).size).toBe(0);
    });
  });

  // ===========================================================================
  // Sizing
  // ===========================================================================

  describe('sizing', () => {
    it('should use defaults until overridden', () => {
      expect(sheet.getRowHeight(3)).toBe(24);
      expect(sheet.getColumnWidth(3)).toBe(100);

      sheet.setRowHeight(3, 40);
      sheet.setColumnWidth(3, 150);

      expect(sheet.getRowHeight(3)).toBe(40);
      expect(sheet.getColumnWidth(3)).toBe(150);
    });

    it('should drop overrides equal to the default', () => {
      sheet.setColumnWidth(2, 150);
      sheet.setColumnWidth(2, 100);
      expect(sheet.getColumnWidthOverrides()).toEqual([]);
    });

    it('should list overrides sorted by index', () => {
      sheet.setRowHeight(9, 30);
      sheet.setRowHeight(2, 50);
      expect(sheet.getRowHeightOverrides()).toEqual([[2, 50], [9, 30]]);
    });

    it('should reject non-positive sizes', () => {
      expect(() => sheet.setRowHeight(0, 0)).toThrow(RangeError);
      expect(() => sheet.setColumnWidth(0, -5)).toThrow('Invalid column width: -5');
      expect(() => new Sheet('Bad', { defaultRowHeight: 0 })).toThrow(RangeError);
    });

    it('should validate frozen pane counts', () => {
      sheet.frozenRows = 2;
      expect(sheet.frozenRows).toBe(2);
      expect(() => {
        sheet.frozenCols = -1;
      }).toThrow(RangeError);
    });
  });

  describe('getStats', () => {
    it('should count cells and formulas', () => {
      sheet.setCell({ row: 0, col: 0 }, numberCell(1));
      sheet.setCell({ row: 0, col: 1 }, { value: numberValue(2), formula: '=A1*2' });
      sheet.setRowHeight(0, 30);

      expect(sheet.getStats()).toEqual({
        cellCount: 2,
        formulaCount: 1,
        usedRows: 1,
        usedCols: 2,
        customRowHeights: 1,
        customColWidths: 0,
      });
    });
  });
});
