/**
 * Grid Engine - Core Module Exports
 *
 * This is the main entry point for the spreadsheet data engine.
 */

// Main Engine
export { SpreadsheetEngine } from './SpreadsheetEngine.js';
export type {
  SpreadsheetEngineConfig,
  SpreadsheetEngineEvents,
} from './SpreadsheetEngine.js';

// Types - export all
export * from './types/index.js';
export {
  EMPTY,
  textValue,
  numberValue,
  booleanValue,
  errorValue,
  dateValue,
  isEmptyValue,
  isErrorValue,
  parseNumber,
  asNumber,
  formatDate,
  toDisplayString,
  isTruthy,
  valuesEqual,
  parseInputValue,
  daysSinceEpoch,
} from './types/CellValue.js';

// References
export {
  createCellRef,
  lettersToColumn,
  columnToLetters,
  parseCellRef,
  toA1,
  cellsEqual,
} from './reference/CellReference.js';
export {
  createRange,
  cellToRange,
  rangeContains,
  rangeCells,
  rangeRowCount,
  rangeColCount,
  getRangeCellCount,
  parseRange,
  rangeToString,
  rangesEqual,
  rangesOverlap,
  getUnionBounds,
} from './reference/CellRange.js';

// Selection Management
export {
  SelectionManager,
  clampCell,
  createCellSelection,
  createRangeSelection,
} from './selection/SelectionManager.js';
export type { SelectionState, SelectionChangeEvent } from './selection/SelectionManager.js';

// Storage
export { Sheet } from './data/Sheet.js';
export type { SheetOptions, SheetStats } from './data/Sheet.js';
export { Spreadsheet } from './workbook/Spreadsheet.js';
export type { CellSnapshot, SheetSnapshot, SpreadsheetSnapshot } from './workbook/Spreadsheet.js';

// Formula Engine
export * from './formula/index.js';
