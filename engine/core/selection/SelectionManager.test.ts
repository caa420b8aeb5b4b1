/**
 * Grid Engine - SelectionManager Unit Tests
 *
 * Covers:
 * - Single-cell, extended and multi-range selections
 * - Selected cell enumeration and de-duplication
 * - Movement clamped to grid bounds
 * - Change notification
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  SelectionManager,
  clampCell,
  createCellSelection,
  createRangeSelection,
} from './SelectionManager.js';
import { createRange } from '../reference/CellRange.js';
import { MAX_ROWS, MAX_COLS } from '../types/index.js';

describe('SelectionManager', () => {
  let selection: SelectionManager;

  beforeEach(() => {
    selection = new SelectionManager();
  });

  // ===========================================================================
  // Initial State
  // ===========================================================================

  describe('initial state', () => {
    it('should select A1 by default', () => {
      expect(selection.getPrimary()).toEqual({ row: 0, col: 0 });
      expect(selection.getRanges()).toEqual([
        { start: { row: 0, col: 0 }, end: { row: 0, col: 0 } },
      ]);
      expect(selection.getSelectedCellCount()).toBe(1);
    });

    it('should build from a range with the end as primary', () => {
      const manager = SelectionManager.fromRange(
        createRange({ row: 3, col: 3 }, { row: 1, col: 1 })
      );
      expect(manager.getPrimary()).toEqual({ row: 3, col: 3 });
      expect(manager.getRange()).toEqual({ start: { row: 1, col: 1 }, end: { row: 3, col: 3 } });
    });

    it('should freeze states', () => {
      const state = selection.getState();
      expect(Object.isFrozen(state)).toBe(true);
      expect(Object.isFrozen(state.ranges)).toBe(true);
    });
  });

  // ===========================================================================
  // Operations
  // ===========================================================================

  describe('extendTo', () => {
    it('should select a 3x3 block from A1 to C3', () => {
      selection.extendTo({ row: 2, col: 2 });

      expect(selection.getSelectedCellCount()).toBe(9);
      expect(selection.isSelected({ row: 1, col: 1 })).toBe(true);
      expect(selection.isSelected({ row: 3, col: 0 })).toBe(false);
      expect(selection.getPrimary()).toEqual({ row: 0, col: 0 });
    });

    it('should replace earlier ranges', () => {
      selection.addRange(createRange({ row: 5, col: 5 }, { row: 6, col: 6 }));
      selection.extendTo({ row: 1, col: 1 });

      expect(selection.isMultiRange()).toBe(false);
      expect(selection.getRange()).toEqual({ start: { row: 1, col: 1 }, end: { row: 6, col: 6 } });
    });
  });

  describe('addRange', () => {
    it('should keep earlier ranges and move the primary cell', () => {
      selection.addRange(createRange({ row: 4, col: 2 }, { row: 2, col: 4 }));

      expect(selection.isMultiRange()).toBe(true);
      expect(selection.getRanges()).toHaveLength(2);
      expect(selection.getPrimary()).toEqual({ row: 4, col: 4 });
      expect(selection.isSelected({ row: 3, col: 3 })).toBe(true);
    });

    it('should list overlapping cells once', () => {
      selection.extendTo({ row: 0, col: 1 });
      selection.addRange(createRange({ row: 0, col: 1 }, { row: 1, col: 1 }));

      expect(selection.getSelectedCells()).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 1, col: 1 },
      ]);
      expect(selection.getSelectedCellCount()).toBe(3);
    });
  });

  describe('move', () => {
    it('should move and collapse the selection', () => {
      selection.extendTo({ row: 2, col: 2 });
      selection.move(1, 2);

      expect(selection.getPrimary()).toEqual({ row: 1, col: 2 });
      expect(selection.getSelectedCellCount()).toBe(1);
    });

    it('should stop at the grid edges', () => {
      selection.move(-1, -1);
      expect(selection.getPrimary()).toEqual({ row: 0, col: 0 });

      selection.set({ row: MAX_ROWS - 1, col: MAX_COLS - 1 });
      selection.move(5, 5);
      expect(selection.getPrimary()).toEqual({ row: MAX_ROWS - 1, col: MAX_COLS - 1 });
    });
  });

  // ===========================================================================
  // Subscription
  // ===========================================================================

  describe('subscribe', () => {
    it('should notify with previous and current states', () => {
      const listener = vi.fn();
      selection.subscribe(listener);

      selection.set({ row: 2, col: 3 });

      expect(listener).toHaveBeenCalledTimes(1);
      const event = listener.mock.calls[0][0];
      expect(event.previous.primary).toEqual({ row: 0, col: 0 });
      expect(event.current.primary).toEqual({ row: 2, col: 3 });
    });

    it('should not notify when nothing changed', () => {
      const listener = vi.fn();
      selection.subscribe(listener);

      selection.set({ row: 0, col: 0 });
      selection.move(-1, 0);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = selection.subscribe(listener);
      unsubscribe();

      selection.set({ row: 1, col: 1 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should keep notifying when a listener throws', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const second = vi.fn();
      selection.subscribe(() => {
        throw new Error('boom');
      });
      selection.subscribe(second);

      selection.set({ row: 1, col: 0 });

      expect(second).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      errorSpy.mockRestore();
    });
  });
});

describe('selection helpers', () => {
  it('should clamp cells into the grid', () => {
    expect(clampCell({ row: -3, col: MAX_COLS + 10 })).toEqual({ row: 0, col: MAX_COLS - 1 });
  });

  it('should create single-cell and range states', () => {
    expect(createCellSelection({ row: 1, col: 2 }).ranges).toEqual([
      { start: { row: 1, col: 2 }, end: { row: 1, col: 2 } },
    ]);
    expect(createRangeSelection(createRange({ row: 0, col: 0 }, { row: 2, col: 1 })).primary)
      .toEqual({ row: 2, col: 1 });
  });
});
