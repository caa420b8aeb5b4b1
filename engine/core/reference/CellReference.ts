/**
 * Grid Engine - A1 Reference Codec
 *
 * Converts between 0-based (row, col) coordinates and A1 notation.
 * Columns use bijective base-26 letters: A=1 ... Z=26, AA=27.
 */

import { CellRef } from '../types/index.js';

const A1_PATTERN = /^\$?([A-Za-z]+)\$?(\d+)$/;

/**
 * Create a cell reference. Coordinates must be non-negative integers.
 */
export function createCellRef(row: number, col: number): CellRef {
  if (!Number.isInteger(row) || row < 0) {
    throw new RangeError(`Invalid row: ${row}`);
  }
  if (!Number.isInteger(col) || col < 0) {
    throw new RangeError(`Invalid column: ${col}`);
  }
  return Object.freeze({ row, col });
}

/**
 * Convert column letters to a 0-based index ("A" → 0, "AA" → 26).
 * Returns -1 for anything that is not letters.
 */
export function lettersToColumn(letters: string): number {
  if (!/^[A-Za-z]+$/.test(letters)) return -1;

  const upper = letters.toUpperCase();
  let col = 0;
  for (let i = 0; i < upper.length; i++) {
    col = col * 26 + (upper.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * Convert a 0-based column index to letters (0 → "A", 26 → "AA").
 */
export function columnToLetters(col: number): string {
  let letters = '';
  let c = col + 1;

  while (c > 0) {
    const remainder = (c - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    c = Math.floor((c - 1) / 26);
  }

  return letters;
}

/**
 * Parse A1 notation ("B3", "aa10", "$C$7").
 * @returns the reference, or null for malformed input
 */
export function parseCellRef(text: string): CellRef | null {
  const match = A1_PATTERN.exec(text.trim());
  if (!match) return null;

  const row = parseInt(match[2], 10);
  if (row < 1 || !Number.isSafeInteger(row)) return null;

  const col = lettersToColumn(match[1]);
  if (!Number.isSafeInteger(col)) return null;

  return Object.freeze({ row: row - 1, col });
}

/**
 * Canonical uppercase A1 form.
 */
export function toA1(ref: CellRef): string {
  return columnToLetters(ref.col) + (ref.row + 1);
}

export function cellsEqual(a: CellRef, b: CellRef): boolean {
  return a.row === b.row && a.col === b.col;
}
