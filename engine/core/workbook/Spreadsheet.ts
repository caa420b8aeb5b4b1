/**
 * Grid Engine - Spreadsheet (Workbook)
 *
 * Ordered collection of sheets with an active-sheet pointer.
 * Holds at least one sheet at all times; the active index is always valid.
 */

import { Cell, CellStyle, CellValue, DEFAULT_SHEET_NAME } from '../types/index.js';
import { Sheet, SheetOptions } from '../data/Sheet.js';
import { parseCellRef, toA1 } from '../reference/CellReference.js';

// =============================================================================
// Snapshot Types
// =============================================================================

export interface CellSnapshot {
  /** A1 address */
  ref: string;
  value: CellValue;
  formula?: string;
  style?: CellStyle;
}

export interface SheetSnapshot {
  name: string;
  defaultRowHeight: number;
  defaultColWidth: number;
  frozenRows: number;
  frozenCols: number;
  rowHeights: Array<[number, number]>;
  colWidths: Array<[number, number]>;
  cells: CellSnapshot[];
}

export interface SpreadsheetSnapshot {
  activeSheet: number;
  sheets: SheetSnapshot[];
}

// =============================================================================
// Spreadsheet
// =============================================================================

export class Spreadsheet {
  private sheets: Sheet[];
  private _activeSheet = 0;
  private sheetOptions: SheetOptions;

  constructor(initialSheetName: string = DEFAULT_SHEET_NAME, sheetOptions: SheetOptions = {}) {
    this.sheetOptions = sheetOptions;
    this.sheets = [new Sheet(initialSheetName, sheetOptions)];
  }

  get sheetCount(): number {
    return this.sheets.length;
  }

  get activeSheetIndex(): number {
    return this._activeSheet;
  }

  getSheet(index: number): Sheet | null {
    return this.sheets[index] ?? null;
  }

  /**
   * The active sheet. Always present.
   */
  active(): Sheet {
    return this.sheets[this._activeSheet];
  }

  setActiveSheet(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.sheets.length) {
      return false;
    }
    this._activeSheet = index;
    return true;
  }

  /**
   * Append a sheet.
   * Without a name, the first free "SheetN" is used.
   * @returns index of the new sheet
   */
  addSheet(name?: string): number {
    const index = this.sheets.length;
    this.sheets.push(new Sheet(name ?? this.nextSheetName(), this.sheetOptions));
    return index;
  }

  /**
   * Remove a sheet. The last remaining sheet cannot be removed.
   * @returns the removed sheet, or null when nothing was removed
   */
  removeSheet(index: number): Sheet | null {
    if (this.sheets.length <= 1 || !Number.isInteger(index) || index < 0 || index >= this.sheets.length) {
      return null;
    }

    const [removed] = this.sheets.splice(index, 1);

    if (this._activeSheet >= this.sheets.length) {
      this._activeSheet = this.sheets.length - 1;
    }

    return removed;
  }

  renameSheet(index: number, name: string): boolean {
    const sheet = this.getSheet(index);
    if (!sheet || name.trim() === '') return false;
    sheet.name = name;
    return true;
  }

  sheetNames(): string[] {
    return this.sheets.map(sheet => sheet.name);
  }

  /**
   * Case-insensitive lookup.
   * @returns sheet index or -1
   */
  findSheet(name: string): number {
    const wanted = name.toUpperCase();
    return this.sheets.findIndex(sheet => sheet.name.toUpperCase() === wanted);
  }

  private nextSheetName(): string {
    const taken = new Set(this.sheets.map(sheet => sheet.name.toUpperCase()));
    let n = this.sheets.length + 1;
    while (taken.has(`SHEET${n}`)) n++;
    return `Sheet${n}`;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  serialize(): SpreadsheetSnapshot {
    return {
      activeSheet: this._activeSheet,
      sheets: this.sheets.map(serializeSheet),
    };
  }

  /**
   * Rebuild a workbook from a snapshot.
   * Cell entries with unparsable addresses are skipped; an empty sheet list
   * yields a workbook with one default sheet.
   */
  static deserialize(snapshot: SpreadsheetSnapshot): Spreadsheet {
    const workbook = new Spreadsheet();
    if (snapshot.sheets.length === 0) return workbook;

    workbook.sheets = snapshot.sheets.map(deserializeSheet);
    workbook.setActiveSheet(snapshot.activeSheet);
    return workbook;
  }
}

function serializeSheet(sheet: Sheet): SheetSnapshot {
  const cells: CellSnapshot[] = [];

  for (const [ref, cell] of sheet.entries()) {
    const entry: CellSnapshot = { ref: toA1(ref), value: cell.value };
    if (cell.formula !== undefined) entry.formula = cell.formula;
    if (cell.style !== undefined) entry.style = cell.style;
    cells.push(entry);
  }

  return {
    name: sheet.name,
    defaultRowHeight: sheet.defaultRowHeight,
    defaultColWidth: sheet.defaultColWidth,
    frozenRows: sheet.frozenRows,
    frozenCols: sheet.frozenCols,
    rowHeights: sheet.getRowHeightOverrides(),
    colWidths: sheet.getColumnWidthOverrides(),
    cells,
  };
}

function deserializeSheet(snapshot: SheetSnapshot): Sheet {
  const sheet = new Sheet(snapshot.name, {
    defaultRowHeight: snapshot.defaultRowHeight,
    defaultColWidth: snapshot.defaultColWidth,
  });
  sheet.frozenRows = snapshot.frozenRows;
  sheet.frozenCols = snapshot.frozenCols;

  for (const [row, height] of snapshot.rowHeights) sheet.setRowHeight(row, height);
  for (const [col, width] of snapshot.colWidths) sheet.setColumnWidth(col, width);

  for (const entry of snapshot.cells) {
    const ref = parseCellRef(entry.ref);
    if (!ref) continue;

    const cell: Cell = { value: entry.value };
    if (entry.formula !== undefined) cell.formula = entry.formula;
    if (entry.style !== undefined) cell.style = entry.style;
    sheet.setCell(ref, cell);
  }

  return sheet;
}
