/**
 * Tabula Engine - Grid Store
 *
 * Owns the rectangular cell matrix.
 *
 * Invariant: every row has the same length at the end of every public
 * operation. The only exception is `ensureCell()`, which the clipboard codec
 * uses while pasting and which must be followed by `normalize()`.
 *
 * Bounds policy: coordinate-taking operations are no-ops when the index is
 * out of range. Insert operations also accept the append position
 * (index === count).
 */

import {
  type GridRows,
  type ReadonlyGridRows,
  DEFAULT_COLS,
  cloneRows,
} from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export type StructureAxis = 'row' | 'column';

/**
 * Announced after every structural edit so holders of row/column indices
 * (edit session, width map, sort indicator) can re-index.
 */
export interface StructureChange {
  axis: StructureAxis;
  kind: 'insert' | 'delete';
  index: number;
}

export interface GridStoreEvents {
  /** Called after a row or column was inserted or removed */
  onStructureChange?: (change: StructureChange) => void;
}

export interface GridStoreConfig {
  /** Width of rows created in an empty grid (default: 10) */
  defaultColumns?: number;
}

// =============================================================================
// Index Re-mapping
// =============================================================================

/**
 * New position of a tracked index after inserting at `at`.
 */
export function shiftIndexOnInsert(index: number, at: number): number {
  return index >= at ? index + 1 : index;
}

/**
 * New position of a tracked index after deleting `at`.
 * Returns null when the tracked index was the deleted one.
 */
export function shiftIndexOnDelete(index: number, at: number): number | null {
  if (index === at) return null;
  return index > at ? index - 1 : index;
}

// =============================================================================
// Grid Store
// =============================================================================

export class GridStore {
  private rows: GridRows;
  private events: GridStoreEvents = {};
  private readonly defaultColumns: number;

  constructor(rows: ReadonlyGridRows = [], config: GridStoreConfig = {}) {
    this.defaultColumns = config.defaultColumns ?? DEFAULT_COLS;
    this.rows = cloneRows(rows);
    this.normalize();
  }

  /**
   * Create a grid of blank cells.
   */
  static withExtents(rowCount: number, colCount: number, config?: GridStoreConfig): GridStore {
    const store = new GridStore([], config);
    store.reset(rowCount, colCount);
    return store;
  }

  setEventHandlers(events: GridStoreEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get rowCount(): number {
    return this.rows.length;
  }

  /**
   * Widest row length. Equals every row's length while the grid is rectangular.
   */
  get columnCount(): number {
    let max = 0;
    for (const row of this.rows) {
      if (row.length > max) max = row.length;
    }
    return max;
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  hasCell(row: number, col: number): boolean {
    return row >= 0 && row < this.rows.length && col >= 0 && col < this.rows[row].length;
  }

  /**
   * Cell text, or '' when the coordinate does not exist.
   */
  getCell(row: number, col: number): string {
    if (!this.hasCell(row, col)) return '';
    return this.rows[row][col];
  }

  /**
   * Live read-only view of a row, or null when the row does not exist.
   */
  getRow(row: number): readonly string[] | null {
    if (row < 0 || row >= this.rows.length) return null;
    return this.rows[row];
  }

  /**
   * Live read-only view of all rows. Use toRows() for a copy.
   */
  getRows(): ReadonlyGridRows {
    return this.rows;
  }

  /**
   * Deep copy of the matrix.
   */
  toRows(): GridRows {
    return cloneRows(this.rows);
  }

  isRectangular(): boolean {
    if (this.rows.length === 0) return true;
    const width = this.rows[0].length;
    return this.rows.every(row => row.length === width);
  }

  // ===========================================================================
  // Cell Mutation
  // ===========================================================================

  /**
   * Overwrite an existing cell. Returns false (and does nothing) when the
   * coordinate is out of range.
   */
  setCell(row: number, col: number, value: string): boolean {
    if (!this.hasCell(row, col)) return false;
    this.rows[row][col] = value;
    return true;
  }

  /**
   * Grow the grid until (row, col) exists: rows are appended at the current
   * widest length, then cells are appended to that one row only.
   * Leaves the grid ragged; call normalize() once all writes are done.
   */
  ensureCell(row: number, col: number): void {
    if (row < 0 || col < 0) return;
    const width = this.columnCount;
    while (row >= this.rows.length) {
      this.rows.push(new Array<string>(width).fill(''));
    }
    const target = this.rows[row];
    while (col >= target.length) {
      target.push('');
    }
  }

  // ===========================================================================
  // Whole-grid Operations
  // ===========================================================================

  /**
   * Pad every row with empty cells up to the widest row. Never shrinks.
   */
  normalize(): void {
    const width = this.columnCount;
    for (const row of this.rows) {
      while (row.length < width) {
        row.push('');
      }
    }
  }

  /**
   * Replace the whole matrix with a copy of `rows`, normalized.
   */
  replaceAll(rows: ReadonlyGridRows): void {
    this.rows = cloneRows(rows);
    this.normalize();
  }

  /**
   * Replace the matrix with blank cells.
   */
  reset(rowCount: number, colCount: number): void {
    const rows: GridRows = [];
    for (let i = 0; i < rowCount; i++) {
      rows.push(new Array<string>(colCount).fill(''));
    }
    this.rows = rows;
  }

  // ===========================================================================
  // Structural Operations
  // ===========================================================================

  /**
   * Append a blank row as wide as the first row.
   */
  addRow(): void {
    this.insertRowAt(this.rows.length);
  }

  /**
   * Append a blank cell to every row.
   */
  addColumn(): void {
    this.insertColumnAt(this.columnCount);
  }

  /**
   * Insert a blank row at `row`, shifting later rows down.
   */
  insertRowAt(row: number): void {
    if (row < 0 || row > this.rows.length) return;

    const width = this.rows.length > 0 ? this.rows[0].length : this.defaultColumns;
    this.rows.splice(row, 0, new Array<string>(width).fill(''));

    this.events.onStructureChange?.({ axis: 'row', kind: 'insert', index: row });
  }

  /**
   * Insert a blank cell at `col` in every row. An empty grid gets a single
   * one-cell row.
   */
  insertColumnAt(col: number): void {
    if (col < 0 || col > this.columnCount) return;

    if (this.rows.length === 0) {
      this.rows.push(['']);
    } else {
      for (const row of this.rows) {
        row.splice(col, 0, '');
      }
    }

    this.events.onStructureChange?.({ axis: 'column', kind: 'insert', index: col });
  }

  /**
   * Remove row `row` if it exists.
   */
  deleteRow(row: number): void {
    if (row < 0 || row >= this.rows.length) return;

    this.rows.splice(row, 1);

    this.events.onStructureChange?.({ axis: 'row', kind: 'delete', index: row });
  }

  /**
   * Remove cell `col` from every row that has it.
   */
  deleteColumn(col: number): void {
    if (col < 0 || col >= this.columnCount) return;

    for (const row of this.rows) {
      if (col < row.length) {
        row.splice(col, 1);
      }
    }

    this.events.onStructureChange?.({ axis: 'column', kind: 'delete', index: col });
  }
}
