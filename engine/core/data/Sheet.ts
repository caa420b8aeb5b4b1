/**
 * Grid Engine - Sheet (Sparse Cell Storage)
 *
 * Only non-empty cells are stored, so memory follows the number of used
 * cells rather than the grid dimensions.
 *
 * Key features:
 * - O(1) cell access via Map
 * - O(n) iteration where n = stored cells only
 * - Row/column indexes for range and line queries
 * - Sparse column width / row height overrides
 */

import {
  Cell,
  CellKey,
  CellRef,
  CellRange,
  cellKey,
  parseKey,
  DEFAULT_ROW_HEIGHT,
  DEFAULT_COL_WIDTH,
} from '../types/index.js';
import { createRange, getRangeCellCount, rangeContains } from '../reference/CellRange.js';

export interface SheetOptions {
  defaultRowHeight?: number;
  defaultColWidth?: number;
}

export interface SheetStats {
  cellCount: number;
  formulaCount: number;
  usedRows: number;
  usedCols: number;
  customRowHeights: number;
  customColWidths: number;
}

function assertSize(kind: string, size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw new RangeError(`Invalid ${kind}: ${size}`);
  }
}

function assertCount(kind: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Invalid ${kind}: ${count}`);
  }
}

export class Sheet {
  name: string;

  /** Main cell storage: Map<"row_col", Cell> */
  private cells: Map<CellKey, Cell> = new Map();

  /** Row index: Map<row, Set<col>> for quick row iteration */
  private rowIndex: Map<number, Set<number>> = new Map();

  /** Column index: Map<col, Set<row>> for quick column iteration */
  private colIndex: Map<number, Set<number>> = new Map();

  /** Custom row heights (only stores non-default) */
  private rowHeights: Map<number, number> = new Map();

  /** Custom column widths (only stores non-default) */
  private colWidths: Map<number, number> = new Map();

  private _defaultRowHeight: number;
  private _defaultColWidth: number;
  private _frozenRows = 0;
  private _frozenCols = 0;

  constructor(name: string, options: SheetOptions = {}) {
    this.name = name;
    this._defaultRowHeight = options.defaultRowHeight ?? DEFAULT_ROW_HEIGHT;
    this._defaultColWidth = options.defaultColWidth ?? DEFAULT_COL_WIDTH;
    assertSize('default row height', this._defaultRowHeight);
    assertSize('default column width', this._defaultColWidth);
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Get a cell.
   * The stored object is returned, so in-place edits reach storage.
   * @returns Cell or null if never written or cleared
   */
  getCell(ref: CellRef): Cell | null {
    return this.cells.get(cellKey(ref)) ?? null;
  }

  /**
   * Store a cell. An empty value without a formula clears the entry.
   */
  setCell(ref: CellRef, cell: Cell): void {
    if (cell.value.type === 'empty' && cell.formula === undefined) {
      this.clearCell(ref);
      return;
    }

    const { row, col } = ref;
    this.cells.set(cellKey(ref), cell);

    let rowCols = this.rowIndex.get(row);
    if (!rowCols) {
      rowCols = new Set();
      this.rowIndex.set(row, rowCols);
    }
    rowCols.add(col);

    let colRows = this.colIndex.get(col);
    if (!colRows) {
      colRows = new Set();
      this.colIndex.set(col, colRows);
    }
    colRows.add(row);
  }

  /**
   * Remove a cell regardless of its content.
   */
  clearCell(ref: CellRef): void {
    const key = cellKey(ref);
    if (!this.cells.delete(key)) return;

    const { row, col } = ref;

    const rowCols = this.rowIndex.get(row);
    if (rowCols) {
      rowCols.delete(col);
      if (rowCols.size === 0) {
        this.rowIndex.delete(row);
      }
    }

    const colRows = this.colIndex.get(col);
    if (colRows) {
      colRows.delete(row);
      if (colRows.size === 0) {
        this.colIndex.delete(col);
      }
    }
  }

  hasCell(ref: CellRef): boolean {
    return this.cells.has(cellKey(ref));
  }

  get cellCount(): number {
    return this.cells.size;
  }

  /**
   * Iterate stored cells in insertion order.
   */
  *entries(): Generator<[CellRef, Cell], void, undefined> {
    for (const [key, cell] of this.cells) {
      yield [parseKey(key), cell];
    }
  }

  // ===========================================================================
  // Range Operations
  // ===========================================================================

  /**
   * Bounding box of all stored cells, or null for an empty sheet.
   * Linear in the number of stored cells.
   */
  getUsedRange(): CellRange | null {
    if (this.cells.size === 0) return null;

    let minRow = Infinity, minCol = Infinity;
    let maxRow = -Infinity, maxCol = -Infinity;

    for (const row of this.rowIndex.keys()) {
      if (row < minRow) minRow = row;
      if (row > maxRow) maxRow = row;
    }
    for (const col of this.colIndex.keys()) {
      if (col < minCol) minCol = col;
      if (col > maxCol) maxCol = col;
    }

    return createRange({ row: minRow, col: minCol }, { row: maxRow, col: maxCol });
  }

  /**
   * Get all stored cells in a range, keyed by cell key.
   */
  getCellsInRange(range: CellRange): Map<CellKey, Cell> {
    const result = new Map<CellKey, Cell>();

    if (getRangeCellCount(range) < this.cells.size) {
      // Small range: probe each coordinate
      for (let row = range.start.row; row <= range.end.row; row++) {
        if (!this.rowIndex.has(row)) continue;
        for (let col = range.start.col; col <= range.end.col; col++) {
          const key = cellKey({ row, col });
          const cell = this.cells.get(key);
          if (cell) {
            result.set(key, cell);
          }
        }
      }
    } else {
      // Large range: filter stored cells
      for (const [key, cell] of this.cells) {
        if (rangeContains(range, parseKey(key))) {
          result.set(key, cell);
        }
      }
    }

    return result;
  }

  /**
   * Clear all cells in a range.
   * @returns the references that were removed
   */
  clearRange(range: CellRange): CellRef[] {
    const removed: CellRef[] = [];

    for (const key of this.getCellsInRange(range).keys()) {
      const ref = parseKey(key);
      this.clearCell(ref);
      removed.push(ref);
    }

    return removed;
  }

  /**
   * Get cells in a specific row, keyed by column.
   */
  getCellsInRow(row: number): Map<number, Cell> {
    const result = new Map<number, Cell>();
    const cols = this.rowIndex.get(row);

    if (cols) {
      for (const col of cols) {
        const cell = this.cells.get(cellKey({ row, col }));
        if (cell) {
          result.set(col, cell);
        }
      }
    }

    return result;
  }

  /**
   * Get cells in a specific column, keyed by row.
   */
  getCellsInColumn(col: number): Map<number, Cell> {
    const result = new Map<number, Cell>();
    const rows = this.colIndex.get(col);

    if (rows) {
      for (const row of rows) {
        const cell = this.cells.get(cellKey({ row, col }));
        if (cell) {
          result.set(row, cell);
        }
      }
    }

    return result;
  }

  // ===========================================================================
  // Row/Column Sizing
  // ===========================================================================

  get defaultRowHeight(): number {
    return this._defaultRowHeight;
  }

  get defaultColWidth(): number {
    return this._defaultColWidth;
  }

  getRowHeight(row: number): number {
    return this.rowHeights.get(row) ?? this._defaultRowHeight;
  }

  setRowHeight(row: number, height: number): void {
    assertSize('row height', height);
    if (height === this._defaultRowHeight) {
      this.rowHeights.delete(row);
    } else {
      this.rowHeights.set(row, height);
    }
  }

  getColumnWidth(col: number): number {
    return this.colWidths.get(col) ?? this._defaultColWidth;
  }

  setColumnWidth(col: number, width: number): void {
    assertSize('column width', width);
    if (width === this._defaultColWidth) {
      this.colWidths.delete(col);
    } else {
      this.colWidths.set(col, width);
    }
  }

  /**
   * Explicit overrides, sorted by index.
   */
  getRowHeightOverrides(): Array<[number, number]> {
    return [...this.rowHeights].sort((a, b) => a[0] - b[0]);
  }

  getColumnWidthOverrides(): Array<[number, number]> {
    return [...this.colWidths].sort((a, b) => a[0] - b[0]);
  }

  // ===========================================================================
  // Frozen Panes
  // ===========================================================================

  get frozenRows(): number {
    return this._frozenRows;
  }

  set frozenRows(count: number) {
    assertCount('frozen row count', count);
    this._frozenRows = count;
  }

  get frozenCols(): number {
    return this._frozenCols;
  }

  set frozenCols(count: number) {
    assertCount('frozen column count', count);
    this._frozenCols = count;
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  getStats(): SheetStats {
    let formulaCount = 0;
    for (const cell of this.cells.values()) {
      if (cell.formula !== undefined) formulaCount++;
    }

    return {
      cellCount: this.cells.size,
      formulaCount,
      usedRows: this.rowIndex.size,
      usedCols: this.colIndex.size,
      customRowHeights: this.rowHeights.size,
      customColWidths: this.colWidths.size,
    };
  }

  /**
   * Remove every cell and size override.
   */
  clear(): void {
    this.cells.clear();
    this.rowIndex.clear();
    this.colIndex.clear();
    this.rowHeights.clear();
    this.colWidths.clear();
  }
}
