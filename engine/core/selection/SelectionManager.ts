/**
 * Grid Engine - Selection Manager
 *
 * Multi-range selection model:
 * - Click: single cell selection (`set`)
 * - Shift+Click: one range from the primary cell to the target (`extendTo`)
 * - Ctrl+Click: append an independent range (`addRange`)
 * - Arrow keys: move the primary cell, clamped to the grid (`move`)
 *
 * State is immutable; every operation produces a new frozen SelectionState
 * and notifies subscribers when something actually changed.
 */

import { CellKey, CellRef, CellRange, cellKey, MAX_ROWS, MAX_COLS } from '../types/index.js';
import {
  createRange,
  cellToRange,
  rangeContains,
  rangeCells,
  rangesEqual,
  getRangeCellCount,
} from '../reference/CellRange.js';
import { cellsEqual } from '../reference/CellReference.js';

// =============================================================================
// Core Types
// =============================================================================

export interface SelectionState {
  /**
   * Most recently set endpoint. The formula bar shows this cell.
   */
  readonly primary: CellRef;

  /**
   * Selected ranges in the order they were added. Never empty.
   */
  readonly ranges: readonly CellRange[];
}

export interface SelectionChangeEvent {
  previous: SelectionState;
  current: SelectionState;
}

// =============================================================================
// State Factories
// =============================================================================

/**
 * Clamp a cell reference to valid grid bounds.
 */
export function clampCell(cell: CellRef): CellRef {
  return {
    row: Math.max(0, Math.min(cell.row, MAX_ROWS - 1)),
    col: Math.max(0, Math.min(cell.col, MAX_COLS - 1)),
  };
}

function freezeState(primary: CellRef, ranges: readonly CellRange[]): SelectionState {
  return Object.freeze({
    primary: Object.freeze({ row: primary.row, col: primary.col }),
    ranges: Object.freeze([...ranges]),
  });
}

/**
 * Create a selection state with a single cell selected.
 */
export function createCellSelection(cell: CellRef): SelectionState {
  return freezeState(cell, [cellToRange(cell)]);
}

/**
 * Create a selection state holding one range; the primary cell is its end.
 */
export function createRangeSelection(range: CellRange): SelectionState {
  const normalized = createRange(range.start, range.end);
  return freezeState(normalized.end, [normalized]);
}

// =============================================================================
// Selection Manager Class
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const selection = new SelectionManager({ row: 0, col: 0 });
 *
 * selection.extendTo({ row: 2, col: 2 });   // A1:C3
 * selection.addRange(createRange({ row: 5, col: 5 }, { row: 7, col: 7 }));
 * selection.isSelected({ row: 6, col: 6 }); // true
 * ```
 */
export class SelectionManager {
  private state: SelectionState;
  private listeners: Set<(event: SelectionChangeEvent) => void> = new Set();

  constructor(cell: CellRef = { row: 0, col: 0 }) {
    this.state = createCellSelection(cell);
  }

  /**
   * Create a manager whose selection is a single range.
   */
  static fromRange(range: CellRange): SelectionManager {
    const manager = new SelectionManager(range.end);
    manager.state = createRangeSelection(range);
    return manager;
  }

  // ===========================================================================
  // State Access
  // ===========================================================================

  getState(): SelectionState {
    return this.state;
  }

  getPrimary(): CellRef {
    return this.state.primary;
  }

  getRanges(): readonly CellRange[] {
    return this.state.ranges;
  }

  /**
   * First selected range.
   */
  getRange(): CellRange {
    return this.state.ranges[0];
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  isSelected(cell: CellRef): boolean {
    return this.state.ranges.some(range => rangeContains(range, cell));
  }

  isMultiRange(): boolean {
    return this.state.ranges.length > 1;
  }

  /**
   * All selected cells; cells covered by several ranges appear once.
   */
  getSelectedCells(): CellRef[] {
    const cells: CellRef[] = [];
    const seen = new Set<CellKey>();

    for (const range of this.state.ranges) {
      for (const cell of rangeCells(range)) {
        const key = cellKey(cell);
        if (!seen.has(key)) {
          seen.add(key);
          cells.push(cell);
        }
      }
    }

    return cells;
  }

  getSelectedCellCount(): number {
    if (this.state.ranges.length === 1) {
      return getRangeCellCount(this.state.ranges[0]);
    }
    return this.getSelectedCells().length;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Reset to a single-cell selection.
   */
  set(cell: CellRef): SelectionState {
    return this.setState(createCellSelection(cell));
  }

  /**
   * Replace all ranges with one range from the primary cell to `end`.
   * The primary cell does not move.
   */
  extendTo(end: CellRef): SelectionState {
    const range = createRange(this.state.primary, end);
    return this.setState(freezeState(this.state.primary, [range]));
  }

  /**
   * Append a range (Ctrl+Click). Its end becomes the primary cell.
   */
  addRange(range: CellRange): SelectionState {
    const normalized = createRange(range.start, range.end);
    return this.setState(freezeState(normalized.end, [...this.state.ranges, normalized]));
  }

  /**
   * Move the primary cell by a delta and collapse to it.
   * Movement stops at the grid edges.
   */
  move(deltaRow: number, deltaCol: number): SelectionState {
    const current = this.state.primary;
    return this.set(clampCell({
      row: current.row + deltaRow,
      col: current.col + deltaCol,
    }));
  }

  // ===========================================================================
  // Event Subscription
  // ===========================================================================

  /**
   * Subscribe to selection changes.
   * Returns unsubscribe function.
   */
  subscribe(listener: (event: SelectionChangeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ===========================================================================
  // Internal State Management
  // ===========================================================================

  private setState(newState: SelectionState): SelectionState {
    const previous = this.state;

    if (statesEqual(previous, newState)) {
      return this.state;
    }

    this.state = newState;

    const event: SelectionChangeEvent = { previous, current: newState };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('Selection listener error:', error);
      }
    }

    return this.state;
  }
}

function statesEqual(a: SelectionState, b: SelectionState): boolean {
  if (a === b) return true;
  if (!cellsEqual(a.primary, b.primary)) return false;
  if (a.ranges.length !== b.ranges.length) return false;

  for (let i = 0; i < a.ranges.length; i++) {
    if (!rangesEqual(a.ranges[i], b.ranges[i])) return false;
  }

  return true;
}
