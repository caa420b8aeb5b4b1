/**
 * Grid Engine
 *
 * Spreadsheet data engine:
 * - Sparse cell storage with typed values
 * - A1 references, ranges and multi-range selection
 * - Formula language with dependency tracking and cached results
 *
 * @example
 * ```typescript
 * import { SpreadsheetEngine, parseCellRef, textValue } from 'grid-engine';
 *
 * const engine = new SpreadsheetEngine();
 * const a1 = parseCellRef('A1');
 * const a2 = parseCellRef('A2');
 *
 * if (a1 && a2) {
 *   engine.setCellValue(a1, textValue('Hello'));
 *   engine.setCellFormula(a2, '=A1 & " World"');
 *   console.log(engine.getCellDisplayValue(a2)); // "Hello World"
 * }
 * ```
 */

export * from './core/index.js';
