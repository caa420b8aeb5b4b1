/**
 * Grid Engine - Formula Dependency Graph
 *
 * Tracks which formula cells read which cells so a change only recomputes
 * the cells downstream of it.
 *
 * Key features:
 * - Direct cell edges plus range edges (ranges are not expanded)
 * - Breadth-first dirty propagation
 * - Kahn ordering; cells it cannot consume are reported as circular
 * - Volatile cells re-marked on full recalculation
 */

import { CellKey, CellRef, CellRange, cellKey, parseKey } from '../types/index.js';
import { rangeContains } from '../reference/CellRange.js';
import { toA1 } from '../reference/CellReference.js';

export interface DependencyInfo {
  /** Cells that this cell's formula references directly */
  precedents: Set<CellKey>;
  /** Ranges that this cell's formula references */
  rangePrecedents: CellRange[];
  /** Cells whose formulas reference this cell directly */
  dependents: Set<CellKey>;
}

export interface FormulaDependencies {
  cells: readonly CellRef[];
  ranges: readonly CellRange[];
}

export interface CircularReferenceError {
  type: 'circular';
  cells: CellKey[];
  message: string;
}

export interface CalculationOrder {
  /** Dirty cells, each after all of its dirty precedents */
  order: CellKey[];
  /** Length of the longest dirty chain ending at each ordered cell (roots are 1) */
  depth: Map<CellKey, number>;
  /** Dirty cells on or downstream of a cycle */
  circular: CellKey[];
}

function describe(key: CellKey): string {
  return toA1(parseKey(key));
}

export class DependencyGraph {
  /** Map of cell -> its dependency info */
  private graph: Map<CellKey, DependencyInfo> = new Map();

  /** Formula cells that reference at least one range */
  private rangeReaders: Map<CellKey, CellRange[]> = new Map();

  /** Set of cells that need recalculation */
  private dirtyCells: Set<CellKey> = new Set();

  /** Cells left unordered by the last calculation order */
  private circularCells: Set<CellKey> = new Set();

  /** Volatile function cells (always recalculate) */
  private volatileCells: Set<CellKey> = new Set();

  // ===========================================================================
  // Dependency Management
  // ===========================================================================

  /**
   * Replace the dependencies of a formula cell.
   * @returns the cycle this edit closes, if any
   */
  setDependencies(
    cell: CellKey,
    dependencies: FormulaDependencies,
    isVolatile: boolean = false
  ): CircularReferenceError | null {
    this.removeDependencies(cell);

    const info = this.ensureNode(cell);
    for (const ref of dependencies.cells) {
      const precedent = cellKey(ref);
      info.precedents.add(precedent);
      this.ensureNode(precedent).dependents.add(cell);
    }

    if (dependencies.ranges.length > 0) {
      info.rangePrecedents = [...dependencies.ranges];
      this.rangeReaders.set(cell, info.rangePrecedents);
    }

    if (isVolatile) {
      this.volatileCells.add(cell);
    }

    this.pruneNode(cell, info);

    const cycle = this.findCycle(cell);
    if (!cycle) return null;

    return {
      type: 'circular',
      cells: cycle,
      message: cycle.length === 1
        ? `Cell ${describe(cell)} refers to itself`
        : `Circular reference detected: ${[...cycle, cycle[0]].map(describe).join(' -> ')}`,
    };
  }

  /**
   * Remove the formula dependencies of a cell (its dependents stay).
   */
  removeDependencies(cell: CellKey): void {
    this.volatileCells.delete(cell);
    this.circularCells.delete(cell);

    const info = this.graph.get(cell);
    if (!info) return;

    for (const precedent of info.precedents) {
      const precedentInfo = this.graph.get(precedent);
      if (precedentInfo) {
        precedentInfo.dependents.delete(cell);
        this.pruneNode(precedent, precedentInfo);
      }
    }

    info.precedents.clear();
    info.rangePrecedents = [];
    this.rangeReaders.delete(cell);

    this.pruneNode(cell, info);
  }

  private ensureNode(cell: CellKey): DependencyInfo {
    let info = this.graph.get(cell);
    if (!info) {
      info = { precedents: new Set(), rangePrecedents: [], dependents: new Set() };
      this.graph.set(cell, info);
    }
    return info;
  }

  private pruneNode(cell: CellKey, info: DependencyInfo): void {
    if (info.precedents.size === 0 && info.rangePrecedents.length === 0 && info.dependents.size === 0) {
      this.graph.delete(cell);
    }
  }

  /**
   * Does this cell hold a formula with references?
   */
  hasDependencies(cell: CellKey): boolean {
    const info = this.graph.get(cell);
    return !!info && (info.precedents.size > 0 || info.rangePrecedents.length > 0);
  }

  /**
   * Direct precedents (cells referenced individually)
   */
  getPrecedents(cell: CellKey): CellKey[] {
    return Array.from(this.graph.get(cell)?.precedents ?? []);
  }

  getRangePrecedents(cell: CellKey): CellRange[] {
    return [...(this.graph.get(cell)?.rangePrecedents ?? [])];
  }

  /**
   * Formula cells that read this cell, directly or through a range.
   */
  getDependents(cell: CellKey): CellKey[] {
    const result = new Set(this.graph.get(cell)?.dependents ?? []);

    if (this.rangeReaders.size > 0) {
      const ref = parseKey(cell);
      for (const [reader, ranges] of this.rangeReaders) {
        if (ranges.some(range => rangeContains(range, ref))) {
          result.add(reader);
        }
      }
    }

    return Array.from(result);
  }

  /**
   * Get all dependents recursively (transitive closure, breadth-first)
   */
  getAllDependents(cell: CellKey): CellKey[] {
    const visited = new Set<CellKey>([cell]);
    const result: CellKey[] = [];
    const queue = this.getDependents(cell);

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (visited.has(current)) continue;

      visited.add(current);
      result.push(current);
      queue.push(...this.getDependents(current));
    }

    return result;
  }

  // ===========================================================================
  // Dirty Tracking & Calculation Order
  // ===========================================================================

  /**
   * Mark a cell and all its dependents as dirty
   */
  markDirty(cell: CellKey): void {
    this.dirtyCells.add(cell);
    for (const dependent of this.getAllDependents(cell)) {
      this.dirtyCells.add(dependent);
    }
  }

  /**
   * Mark all volatile cells as dirty
   */
  markVolatileDirty(): void {
    for (const cell of this.volatileCells) {
      this.markDirty(cell);
    }
  }

  isDirty(cell: CellKey): boolean {
    return this.dirtyCells.has(cell);
  }

  clearDirty(cell: CellKey): void {
    this.dirtyCells.delete(cell);
  }

  getDirtyCells(): CellKey[] {
    return Array.from(this.dirtyCells);
  }

  clearAllDirty(): void {
    this.dirtyCells.clear();
  }

  /**
   * Dirty precedents of a cell, through direct and range edges.
   */
  private dirtyPrecedentsOf(cell: CellKey, dirty: ReadonlySet<CellKey>): Set<CellKey> {
    const result = new Set<CellKey>();
    const info = this.graph.get(cell);
    if (!info) return result;

    for (const precedent of info.precedents) {
      if (dirty.has(precedent)) result.add(precedent);
    }

    if (info.rangePrecedents.length > 0) {
      for (const candidate of dirty) {
        const ref = parseKey(candidate);
        if (info.rangePrecedents.some(range => rangeContains(range, ref))) {
          result.add(candidate);
        }
      }
    }

    return result;
  }

  /**
   * Order the dirty cells with Kahn's algorithm.
   * Cells that never reach in-degree zero are cycle members or downstream
   * of one; they are returned in `circular` and remembered as circular.
   */
  getCalculationOrder(): CalculationOrder {
    const dirty = new Set(this.dirtyCells);
    const order: CellKey[] = [];
    const depth = new Map<CellKey, number>();
    const inDegree = new Map<CellKey, number>();

    for (const cell of dirty) {
      inDegree.set(cell, this.dirtyPrecedentsOf(cell, dirty).size);
    }

    const queue: CellKey[] = [];
    for (const [cell, degree] of inDegree) {
      if (degree === 0) {
        queue.push(cell);
        depth.set(cell, 1);
      }
    }

    for (let head = 0; head < queue.length; head++) {
      const cell = queue[head];
      order.push(cell);
      const cellDepth = depth.get(cell) ?? 1;

      for (const dependent of this.getDependents(cell)) {
        const degree = inDegree.get(dependent);
        if (degree === undefined) continue;

        depth.set(dependent, Math.max(depth.get(dependent) ?? 0, cellDepth + 1));
        inDegree.set(dependent, degree - 1);
        if (degree - 1 === 0) {
          queue.push(dependent);
        }
      }
    }

    const ordered = new Set(order);
    const circular: CellKey[] = [];
    for (const cell of dirty) {
      if (ordered.has(cell)) {
        this.circularCells.delete(cell);
      } else {
        circular.push(cell);
        depth.delete(cell);
        this.circularCells.add(cell);
      }
    }

    return { order, depth, circular };
  }

  // ===========================================================================
  // Circular Reference Detection
  // ===========================================================================

  /**
   * Find a cycle through the given cell by walking its precedents.
   * @returns cells on the cycle, starting at `startCell`, or null
   */
  findCycle(startCell: CellKey): CellKey[] | null {
    const visited = new Set<CellKey>();
    const path: CellKey[] = [];

    const dfs = (cell: CellKey): CellKey[] | null => {
      visited.add(cell);
      path.push(cell);

      for (const precedent of this.allPrecedents(cell)) {
        if (precedent === startCell) {
          return [...path];
        }
        if (!visited.has(precedent)) {
          const cycle = dfs(precedent);
          if (cycle) return cycle;
        }
      }

      path.pop();
      return null;
    };

    return dfs(startCell);
  }

  /**
   * Precedents that carry formulas: direct precedents plus the formula
   * cells that fall inside referenced ranges.
   */
  private allPrecedents(cell: CellKey): CellKey[] {
    const info = this.graph.get(cell);
    if (!info) return [];

    const result = new Set(info.precedents);
    if (info.rangePrecedents.length > 0) {
      for (const candidate of this.graph.keys()) {
        if (!this.hasDependencies(candidate)) continue;
        const ref = parseKey(candidate);
        if (info.rangePrecedents.some(range => rangeContains(range, ref))) {
          result.add(candidate);
        }
      }
    }
    return Array.from(result);
  }

  hasCircularReference(cell: CellKey): boolean {
    return this.circularCells.has(cell);
  }

  getCircularCells(): CellKey[] {
    return Array.from(this.circularCells);
  }

  // ===========================================================================
  // Volatile Functions
  // ===========================================================================

  isVolatile(cell: CellKey): boolean {
    return this.volatileCells.has(cell);
  }

  getVolatileCells(): CellKey[] {
    return Array.from(this.volatileCells);
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Clear the entire graph
   */
  clear(): void {
    this.graph.clear();
    this.rangeReaders.clear();
    this.dirtyCells.clear();
    this.circularCells.clear();
    this.volatileCells.clear();
  }

  getStats(): {
    totalCells: number;
    totalEdges: number;
    rangeEdges: number;
    dirtyCells: number;
    circularCells: number;
    volatileCells: number;
  } {
    let totalEdges = 0;
    let rangeEdges = 0;
    for (const info of this.graph.values()) {
      totalEdges += info.precedents.size;
      rangeEdges += info.rangePrecedents.length;
    }

    return {
      totalCells: this.graph.size,
      totalEdges,
      rangeEdges,
      dirtyCells: this.dirtyCells.size,
      circularCells: this.circularCells.size,
      volatileCells: this.volatileCells.size,
    };
  }

  /**
   * Debug: Print the graph
   */
  debug(): void {
    const list = (keys: Iterable<CellKey>): string => Array.from(keys, describe).join(', ') || 'none';

    console.log('=== Dependency Graph ===');
    for (const [cell, info] of this.graph) {
      console.log(`${describe(cell)}:`);
      console.log(`  Precedents: ${list(info.precedents)}`);
      if (info.rangePrecedents.length > 0) {
        console.log(`  Ranges: ${info.rangePrecedents.map(r => `${toA1(r.start)}:${toA1(r.end)}`).join(', ')}`);
      }
      console.log(`  Dependents: ${list(info.dependents)}`);
    }
    console.log(`Dirty cells: ${list(this.dirtyCells)}`);
    console.log(`Circular cells: ${list(this.circularCells)}`);
    console.log(`Volatile cells: ${list(this.volatileCells)}`);
  }
}
