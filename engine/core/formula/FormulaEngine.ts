/**
 * Grid Engine - Formula Calculation Engine
 *
 * Owns the formulas of one sheet. Handles:
 * - Parsing formula writes and recording their dependencies
 * - Result caching on the Cell (only dirty cells are recomputed)
 * - Dependency-ordered recomputation with cycle and chain-depth limits
 * - Per-cell state: clean -> dirty -> evaluating -> clean | error
 */

import { Cell, CellKey, CellRef, CellRange, CellValue, ERROR_CODES, cellKey, parseKey } from '../types/index.js';
import { EMPTY, errorValue, valuesEqual } from '../types/CellValue.js';
import { Sheet } from '../data/Sheet.js';
import { toA1 } from '../reference/CellReference.js';
import { Formula, callsAnyFunction, collectReferences } from './ast.js';
import { DependencyGraph, CircularReferenceError } from './DependencyGraph.js';
import { EvaluationResult, evaluate } from './Evaluator.js';
import { FormulaError } from './FormulaError.js';
import { parseFormula } from './Parser.js';
import { VOLATILE_FUNCTIONS } from './functions/index.js';

export type CellState = 'clean' | 'dirty' | 'evaluating' | 'error';

export interface CalculationError {
  cell: CellRef;
  /** Error code stored in the cell */
  code: string;
  message: string;
}

export interface CalculationResult {
  success: boolean;
  /** Formula cells evaluated in this pass */
  calculatedCount: number;
  /** Written cells plus every cell whose cached value changed */
  changedCells: CellRef[];
  circularCells: CellRef[];
  errors: CalculationError[];
  duration: number;
}

/**
 * A cell read. `result` is the recompute pass the read ran, if the cell was stale.
 */
export interface CellRead {
  value: CellValue;
  result: CalculationResult | null;
}

export type FormulaWriteResult =
  | { success: true; result: CalculationResult; cycle: CircularReferenceError | null }
  | { success: false; error: FormulaError };

export interface FormulaEngineOptions {
  /** Recompute inside each write (default true) */
  autoCalculate?: boolean;
  /** Longest dependency chain evaluated in one pass */
  maxChainDepth?: number;
  /** Clock for TODAY/NOW */
  now?: () => Date;
}

const DEFAULT_OPTIONS: Required<FormulaEngineOptions> = {
  autoCalculate: true,
  maxChainDepth: 10_000,
  now: () => new Date(),
};

export class FormulaEngine {
  private sheet: Sheet;
  private dependencyGraph: DependencyGraph;
  private options: Required<FormulaEngineOptions>;

  /** Parsed formulas by cell */
  private formulas: Map<CellKey, Formula> = new Map();

  /** Last evaluation outcome of formula cells (absent means clean) */
  private states: Map<CellKey, CellState> = new Map();

  /** Written since the last pass; reported as changed */
  private pendingWrites: Map<CellKey, CellRef> = new Map();

  constructor(sheet: Sheet, options: FormulaEngineOptions = {}) {
    this.sheet = sheet;
    this.dependencyGraph = new DependencyGraph();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.registerStoredFormulas();
  }

  get autoCalculate(): boolean {
    return this.options.autoCalculate;
  }

  set autoCalculate(enabled: boolean) {
    this.options.autoCalculate = enabled;
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Set a formula for a cell.
   * A rejected formula leaves the cell untouched.
   */
  setFormula(ref: CellRef, text: string): FormulaWriteResult {
    const parsed = parseFormula(text);
    if (!parsed.success) {
      return { success: false, error: parsed.error };
    }

    const key = cellKey(ref);
    const formula = parsed.formula;
    const existing = this.sheet.getCell(ref);

    const cell: Cell = { value: existing?.value ?? EMPTY, formula: formula.text };
    if (existing?.style) cell.style = existing.style;
    this.sheet.setCell(ref, cell);

    this.formulas.set(key, formula);
    const cycle = this.dependencyGraph.setDependencies(
      key,
      collectReferences(formula.expr),
      callsAnyFunction(formula.expr, VOLATILE_FUNCTIONS)
    );

    return { success: true, result: this.afterWrite([ref]), cycle };
  }

  /**
   * Store a literal value, replacing any formula.
   */
  setValue(ref: CellRef, value: CellValue): CalculationResult {
    this.writeLiteral(ref, value);
    return this.afterWrite([ref]);
  }

  clearCell(ref: CellRef): CalculationResult {
    this.removeFormula(cellKey(ref));
    this.sheet.clearCell(ref);
    return this.afterWrite([ref]);
  }

  clearRange(range: CellRange): CalculationResult {
    const removed = this.sheet.clearRange(range);
    for (const ref of removed) {
      this.removeFormula(cellKey(ref));
    }
    return this.afterWrite(removed);
  }

  private writeLiteral(ref: CellRef, value: CellValue): void {
    this.removeFormula(cellKey(ref));

    const existing = this.sheet.getCell(ref);
    const cell: Cell = { value };
    if (existing?.style) cell.style = existing.style;
    this.sheet.setCell(ref, cell);
  }

  private removeFormula(key: CellKey): void {
    if (!this.formulas.delete(key)) return;
    this.dependencyGraph.removeDependencies(key);
    this.states.delete(key);
  }

  private afterWrite(refs: readonly CellRef[]): CalculationResult {
    for (const ref of refs) {
      const key = cellKey(ref);
      this.pendingWrites.set(key, ref);
      this.dependencyGraph.markDirty(key);
    }

    if (this.options.autoCalculate) {
      return this.runPass();
    }

    return {
      success: true,
      calculatedCount: 0,
      changedCells: [...refs],
      circularCells: [],
      errors: [],
      duration: 0,
    };
  }

  /**
   * Parse every formula already stored on the sheet (loaded snapshots).
   * Unparsable formula text is kept and its cell holds the parse error.
   */
  private registerStoredFormulas(): void {
    for (const [ref, cell] of this.sheet.entries()) {
      if (cell.formula === undefined) continue;

      const key = cellKey(ref);
      const parsed = parseFormula(cell.formula);
      if (!parsed.success) {
        cell.value = parsed.error.toValue();
        this.states.set(key, 'error');
        continue;
      }

      this.formulas.set(key, parsed.formula);
      this.dependencyGraph.setDependencies(
        key,
        collectReferences(parsed.formula.expr),
        callsAnyFunction(parsed.formula.expr, VOLATILE_FUNCTIONS)
      );
      this.dependencyGraph.markDirty(key);
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Current value of a cell. A stale cell triggers a recompute pass first.
   */
  getValue(ref: CellRef): CellValue {
    return this.readValue(ref).value;
  }

  /**
   * Like getValue, but also returns the pass a stale read ran.
   */
  readValue(ref: CellRef): CellRead {
    const result = this.dependencyGraph.isDirty(cellKey(ref)) ? this.runPass() : null;
    return { value: this.sheet.getCell(ref)?.value ?? EMPTY, result };
  }

  isStale(ref: CellRef): boolean {
    return this.dependencyGraph.isDirty(cellKey(ref));
  }

  getState(ref: CellRef): CellState {
    const key = cellKey(ref);
    if (this.dependencyGraph.isDirty(key)) return 'dirty';
    return this.states.get(key) ?? 'clean';
  }

  hasFormula(ref: CellRef): boolean {
    return this.formulas.has(cellKey(ref));
  }

  getFormula(ref: CellRef): Formula | null {
    return this.formulas.get(cellKey(ref)) ?? null;
  }

  // ===========================================================================
  // Calculation
  // ===========================================================================

  /**
   * Recompute dirty cells, plus every volatile cell.
   */
  recalculate(): CalculationResult {
    this.dependencyGraph.markVolatileDirty();
    return this.runPass();
  }

  /**
   * Recompute every formula on the sheet.
   */
  recalculateAll(): CalculationResult {
    for (const key of this.formulas.keys()) {
      this.dependencyGraph.markDirty(key);
    }
    return this.runPass();
  }

  /**
   * One recompute pass over the dirty set, run to completion.
   */
  private runPass(): CalculationResult {
    const startTime = performance.now();
    const { order, depth, circular } = this.dependencyGraph.getCalculationOrder();

    const changed = new Map<CellKey, CellRef>(this.pendingWrites);
    const errors: CalculationError[] = [];
    const circularCells: CellRef[] = [];
    let calculatedCount = 0;

    const store = (key: CellKey, value: CellValue, message: string | null): void => {
      const ref = parseKey(key);
      const cell = this.sheet.getCell(ref);
      if (!cell) return;

      if (!valuesEqual(cell.value, value)) {
        changed.set(key, ref);
      }
      cell.value = value;

      if (value.type === 'error') {
        this.states.set(key, 'error');
        errors.push({ cell: ref, code: value.code, message: message ?? `${toA1(ref)} evaluated to #${value.code}!` });
      } else {
        this.states.delete(key);
      }
    };

    try {
      for (const key of circular) {
        if (!this.formulas.has(key)) continue;
        circularCells.push(parseKey(key));
        const error = new FormulaError('CircularReference', toA1(parseKey(key)));
        store(key, error.toValue(), error.message);
      }

      for (const key of order) {
        const formula = this.formulas.get(key);
        if (!formula) continue;

        if ((depth.get(key) ?? 1) > this.options.maxChainDepth) {
          store(
            key,
            errorValue(ERROR_CODES.CHAIN_TOO_DEEP),
            `Dependency chain at ${toA1(parseKey(key))} exceeds ${this.options.maxChainDepth} cells`
          );
          continue;
        }

        calculatedCount++;
        this.states.set(key, 'evaluating');
        let result: EvaluationResult;
        try {
          result = evaluate(formula.expr, {
            getCell: ref => this.readForEvaluation(ref),
            getCellsInRange: range => this.readRangeForEvaluation(range),
            now: this.options.now,
          });
        } finally {
          this.states.delete(key);
        }

        if (result.success) {
          store(key, result.value, null);
        } else {
          store(key, result.error.toValue(), result.error.message);
        }
      }
    } finally {
      // A pass that throws still leaves no cell dirty or pending
      this.dependencyGraph.clearAllDirty();
      this.pendingWrites.clear();
    }

    return {
      success: errors.length === 0,
      calculatedCount,
      changedCells: [...changed.values()],
      circularCells,
      errors,
      duration: performance.now() - startTime,
    };
  }

  /**
   * Cell reader handed to the evaluator.
   * Reading a cell that is itself being evaluated is a circular reference.
   */
  private readForEvaluation(ref: CellRef): CellValue | null {
    if (this.states.get(cellKey(ref)) === 'evaluating') {
      throw new FormulaError('CircularReference', toA1(ref));
    }
    return this.sheet.getCell(ref)?.value ?? null;
  }

  /**
   * Range reader handed to the evaluator. Visits stored cells only.
   */
  private readRangeForEvaluation(range: CellRange): CellValue[] {
    const refs = [...this.sheet.getCellsInRange(range).keys()].map(parseKey);
    refs.sort((a, b) => a.row - b.row || a.col - b.col);
    return refs.map(ref => this.readForEvaluation(ref) ?? EMPTY);
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Get the dependency graph (for debugging/visualization)
   */
  getDependencyGraph(): DependencyGraph {
    return this.dependencyGraph;
  }

  getStats(): {
    formulaCount: number;
    errorCells: number;
    graphStats: ReturnType<DependencyGraph['getStats']>;
  } {
    let errorCells = 0;
    for (const state of this.states.values()) {
      if (state === 'error') errorCells++;
    }

    return {
      formulaCount: this.formulas.size,
      errorCells,
      graphStats: this.dependencyGraph.getStats(),
    };
  }

  /**
   * Forget all formula data (the sheet itself is not touched)
   */
  clear(): void {
    this.formulas.clear();
    this.states.clear();
    this.pendingWrites.clear();
    this.dependencyGraph.clear();
  }
}
