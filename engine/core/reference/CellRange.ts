/**
 * Grid Engine - Cell Range Algebra
 *
 * Pure functions over normalized rectangular ranges.
 */

import { CellRef, CellRange } from '../types/index.js';
import { parseCellRef, toA1 } from './CellReference.js';

/**
 * Create a normalized range from any two corners.
 * start is the element-wise minimum, end the element-wise maximum.
 */
export function createRange(a: CellRef, b: CellRef): CellRange {
  return Object.freeze({
    start: Object.freeze({
      row: Math.min(a.row, b.row),
      col: Math.min(a.col, b.col),
    }),
    end: Object.freeze({
      row: Math.max(a.row, b.row),
      col: Math.max(a.col, b.col),
    }),
  });
}

/**
 * Create a single-cell range.
 */
export function cellToRange(cell: CellRef): CellRange {
  return createRange(cell, cell);
}

/**
 * Inclusive containment on both axes.
 */
export function rangeContains(range: CellRange, cell: CellRef): boolean {
  return cell.row >= range.start.row &&
         cell.row <= range.end.row &&
         cell.col >= range.start.col &&
         cell.col <= range.end.col;
}

/**
 * Row-major enumeration. Each call returns a fresh iterator.
 */
export function* rangeCells(range: CellRange): Generator<CellRef, void, undefined> {
  for (let row = range.start.row; row <= range.end.row; row++) {
    for (let col = range.start.col; col <= range.end.col; col++) {
      yield { row, col };
    }
  }
}

export function rangeRowCount(range: CellRange): number {
  return range.end.row - range.start.row + 1;
}

export function rangeColCount(range: CellRange): number {
  return range.end.col - range.start.col + 1;
}

export function getRangeCellCount(range: CellRange): number {
  return rangeRowCount(range) * rangeColCount(range);
}

/**
 * Parse "A1:C5". Exactly two A1 references are required.
 */
export function parseRange(text: string): CellRange | null {
  const parts = text.split(':');
  if (parts.length !== 2) return null;

  const start = parseCellRef(parts[0]);
  const end = parseCellRef(parts[1]);
  if (!start || !end) return null;

  return createRange(start, end);
}

export function rangeToString(range: CellRange): string {
  return `${toA1(range.start)}:${toA1(range.end)}`;
}

export function rangesEqual(a: CellRange, b: CellRange): boolean {
  return a.start.row === b.start.row &&
         a.start.col === b.start.col &&
         a.end.row === b.end.row &&
         a.end.col === b.end.col;
}

export function rangesOverlap(a: CellRange, b: CellRange): boolean {
  return !(a.end.row < b.start.row || b.end.row < a.start.row ||
           a.end.col < b.start.col || b.end.col < a.start.col);
}

/**
 * Bounding box of several ranges, or null for none.
 */
export function getUnionBounds(ranges: readonly CellRange[]): CellRange | null {
  if (ranges.length === 0) return null;

  let minRow = Infinity, maxRow = -Infinity;
  let minCol = Infinity, maxCol = -Infinity;

  for (const range of ranges) {
    minRow = Math.min(minRow, range.start.row);
    maxRow = Math.max(maxRow, range.end.row);
    minCol = Math.min(minCol, range.start.col);
    maxCol = Math.max(maxCol, range.end.col);
  }

  return createRange({ row: minRow, col: minCol }, { row: maxRow, col: maxCol });
}
