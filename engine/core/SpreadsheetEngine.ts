/**
 * Grid Engine - Main Spreadsheet Engine
 *
 * Central orchestrator that ties together all engine components:
 * - Spreadsheet / Sheet for workbook and cell storage
 * - One FormulaEngine per sheet for calculation with caching
 * - SelectionManager for selection state
 *
 * Cell operations apply to the active sheet.
 */

import {
  Cell,
  CellRef,
  CellRange,
  CellStyle,
  CellValue,
  DEFAULT_COL_WIDTH,
  DEFAULT_ROW_HEIGHT,
  DEFAULT_SHEET_NAME,
} from './types/index.js';
import { parseInputValue, toDisplayString } from './types/CellValue.js';
import { Sheet } from './data/Sheet.js';
import { Spreadsheet, SpreadsheetSnapshot } from './workbook/Spreadsheet.js';
import {
  CalculationResult,
  FormulaEngine,
  FormulaWriteResult,
} from './formula/FormulaEngine.js';
import { SelectionManager, SelectionChangeEvent } from './selection/SelectionManager.js';

export interface SpreadsheetEngineConfig {
  /** Default row height for new sheets */
  defaultRowHeight?: number;
  /** Default column width for new sheets */
  defaultColumnWidth?: number;
  /** Name of the sheet a new workbook starts with */
  initialSheetName?: string;
  /** Recompute inside each write; when off, reads of stale cells recompute */
  autoCalculate?: boolean;
  /** Longest dependency chain evaluated in one pass */
  maxChainDepth?: number;
  /** Clock for TODAY/NOW */
  now?: () => Date;
}

export interface SpreadsheetEngineEvents {
  /** Called with the cells a mutation wrote or whose values changed */
  onCellsChanged?: (cells: CellRef[]) => void;
  /** Called when a recompute pass completes */
  onCalculationComplete?: (result: CalculationResult) => void;
  /** Called when the selection changes */
  onSelectionChange?: (event: SelectionChangeEvent) => void;
}

export class SpreadsheetEngine {
  // Core components
  private workbook: Spreadsheet;
  private formulaEngines: Map<Sheet, FormulaEngine> = new Map();
  private selectionManager: SelectionManager;

  // Configuration
  private config: Required<SpreadsheetEngineConfig>;

  // Event callbacks
  private events: SpreadsheetEngineEvents = {};

  constructor(config: SpreadsheetEngineConfig = {}) {
    // Merge with defaults
    this.config = {
      defaultRowHeight: config.defaultRowHeight ?? DEFAULT_ROW_HEIGHT,
      defaultColumnWidth: config.defaultColumnWidth ?? DEFAULT_COL_WIDTH,
      initialSheetName: config.initialSheetName ?? DEFAULT_SHEET_NAME,
      autoCalculate: config.autoCalculate ?? true,
      maxChainDepth: config.maxChainDepth ?? 10_000,
      now: config.now ?? (() => new Date()),
    };

    this.workbook = new Spreadsheet(this.config.initialSheetName, {
      defaultRowHeight: this.config.defaultRowHeight,
      defaultColWidth: this.config.defaultColumnWidth,
    });

    this.selectionManager = new SelectionManager();
    this.selectionManager.subscribe(event => {
      this.events.onSelectionChange?.(event);
    });
  }

  /**
   * Set event handlers
   */
  setEventHandlers(events: SpreadsheetEngineEvents): void {
    this.events = { ...this.events, ...events };
  }

  getConfig(): Readonly<Required<SpreadsheetEngineConfig>> {
    return this.config;
  }

  // ===========================================================================
  // Formula Engines
  // ===========================================================================

  private engineFor(sheet: Sheet): FormulaEngine {
    let engine = this.formulaEngines.get(sheet);
    if (!engine) {
      engine = new FormulaEngine(sheet, {
        autoCalculate: this.config.autoCalculate,
        maxChainDepth: this.config.maxChainDepth,
        now: this.config.now,
      });
      this.formulaEngines.set(sheet, engine);
    }
    return engine;
  }

  private activeEngine(): FormulaEngine {
    return this.engineFor(this.workbook.active());
  }

  /**
   * Report a mutation or recompute pass to listeners.
   */
  private emit(result: CalculationResult, calculated: boolean): CalculationResult {
    if (result.changedCells.length > 0) {
      this.events.onCellsChanged?.(result.changedCells);
    }
    if (calculated) {
      this.events.onCalculationComplete?.(result);
    }
    return result;
  }

  private emitWrite(write: FormulaWriteResult): FormulaWriteResult {
    if (write.success) {
      this.emit(write.result, this.config.autoCalculate);
    }
    return write;
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Get the stored cell, or null for an empty cell.
   */
  getCell(ref: CellRef): Cell | null {
    return this.workbook.active().getCell(ref);
  }

  /**
   * Get a cell value. Stale formula cells are recomputed first.
   */
  getCellValue(ref: CellRef): CellValue {
    const read = this.activeEngine().readValue(ref);
    if (read.result) {
      this.emit(read.result, true);
    }
    return read.value;
  }

  /**
   * Get cell display value (formula result or raw value) as text
   */
  getCellDisplayValue(ref: CellRef): string {
    return toDisplayString(this.getCellValue(ref));
  }

  /**
   * Store a literal value, replacing any formula. Writing `empty` removes
   * the cell.
   */
  setCellValue(ref: CellRef, value: CellValue): CalculationResult {
    return this.emit(this.activeEngine().setValue(ref, value), this.config.autoCalculate);
  }

  /**
   * Set a formula. A rejected formula leaves the cell untouched.
   */
  setCellFormula(ref: CellRef, text: string): FormulaWriteResult {
    return this.emitWrite(this.activeEngine().setFormula(ref, text));
  }

  /**
   * Interpret raw editor input: "=..." is a formula, TRUE/FALSE a boolean,
   * numeric text a number, blank input clears the cell, anything else is text.
   */
  setCellInput(ref: CellRef, raw: string): FormulaWriteResult {
    if (raw.trim().startsWith('=')) {
      return this.setCellFormula(ref, raw);
    }

    const value = parseInputValue(raw);
    const result = value.type === 'empty' ? this.clearCell(ref) : this.setCellValue(ref, value);
    return { success: true, result, cycle: null };
  }

  clearCell(ref: CellRef): CalculationResult {
    return this.emit(this.activeEngine().clearCell(ref), this.config.autoCalculate);
  }

  clearRange(range: CellRange): CalculationResult {
    return this.emit(this.activeEngine().clearRange(range), this.config.autoCalculate);
  }

  /**
   * Merge style properties into a stored cell.
   * @returns false when there is no stored cell to style
   */
  setCellStyle(ref: CellRef, style: CellStyle): boolean {
    const cell = this.workbook.active().getCell(ref);
    if (!cell) return false;
    cell.style = { ...cell.style, ...style };
    return true;
  }

  getUsedRange(): CellRange | null {
    return this.workbook.active().getUsedRange();
  }

  /**
   * Values of a range, row by row.
   */
  getRangeValues(range: CellRange): CellValue[][] {
    const rows: CellValue[][] = [];
    for (let row = range.start.row; row <= range.end.row; row++) {
      const values: CellValue[] = [];
      for (let col = range.start.col; col <= range.end.col; col++) {
        values.push(this.getCellValue({ row, col }));
      }
      rows.push(values);
    }
    return rows;
  }

  isStale(ref: CellRef): boolean {
    return this.activeEngine().isStale(ref);
  }

  // ===========================================================================
  // Formula Operations
  // ===========================================================================

  /**
   * Recompute dirty and volatile cells of the active sheet
   */
  recalculate(): CalculationResult {
    return this.emit(this.activeEngine().recalculate(), true);
  }

  /**
   * Recompute every formula of the active sheet
   */
  recalculateAll(): CalculationResult {
    return this.emit(this.activeEngine().recalculateAll(), true);
  }

  setAutoCalculate(enabled: boolean): void {
    this.config.autoCalculate = enabled;
    for (const engine of this.formulaEngines.values()) {
      engine.autoCalculate = enabled;
    }
  }

  getFormulaEngine(): FormulaEngine {
    return this.activeEngine();
  }

  // ===========================================================================
  // Sheets
  // ===========================================================================

  getSpreadsheet(): Spreadsheet {
    return this.workbook;
  }

  getActiveSheet(): Sheet {
    return this.workbook.active();
  }

  getSheetNames(): string[] {
    return this.workbook.sheetNames();
  }

  /**
   * @returns index of the new sheet
   */
  addSheet(name?: string): number {
    return this.workbook.addSheet(name);
  }

  /**
   * Remove a sheet. The last remaining sheet cannot be removed.
   */
  removeSheet(index: number): boolean {
    const removed = this.workbook.removeSheet(index);
    if (!removed) return false;
    this.formulaEngines.delete(removed);
    return true;
  }

  renameSheet(index: number, name: string): boolean {
    return this.workbook.renameSheet(index, name);
  }

  setActiveSheet(index: number): boolean {
    return this.workbook.setActiveSheet(index);
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  getSelectionManager(): SelectionManager {
    return this.selectionManager;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Serialize the workbook to a JSON-compatible snapshot.
   */
  serialize(): SpreadsheetSnapshot {
    return this.workbook.serialize();
  }

  /**
   * Replace the workbook with a snapshot and recompute every formula.
   */
  load(snapshot: SpreadsheetSnapshot): void {
    this.workbook = Spreadsheet.deserialize(snapshot);
    this.formulaEngines.clear();

    for (let index = 0; index < this.workbook.sheetCount; index++) {
      const sheet = this.workbook.getSheet(index);
      if (sheet) this.engineFor(sheet).recalculateAll();
    }

    this.selectionManager.set({ row: 0, col: 0 });
  }
}
