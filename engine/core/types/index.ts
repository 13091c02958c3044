/**
 * Tabula Engine - Core Type Definitions
 */

// ============================================================================
// Coordinates
// ============================================================================

export interface CellRef {
  row: number;
  col: number;
}

/**
 * Normalized rectangle (startRow <= endRow, startCol <= endCol), inclusive.
 */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Row/column deltas for each navigation direction */
export const DIRECTION_DELTAS: Readonly<Record<Direction, Readonly<CellRef>>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

// ============================================================================
// Grid Data
// ============================================================================

/** Row-major cell matrix. Every row has the same length once normalized. */
export type GridRows = string[][];

export type ReadonlyGridRows = ReadonlyArray<ReadonlyArray<string>>;

// ============================================================================
// Constants
// ============================================================================

/** Rows in a fresh document */
export const DEFAULT_ROWS = 20;

/** Columns in a fresh document; also the width of rows added to an empty grid */
export const DEFAULT_COLS = 10;

export const DEFAULT_COLUMN_WIDTH = 120;
export const MIN_COLUMN_WIDTH = 30;

/** Undo snapshots kept before the oldest is evicted */
export const MAX_HISTORY = 50;

// ============================================================================
// Utility Functions
// ============================================================================

export function cellsEqual(a: CellRef, b: CellRef): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Column header label: 0 → "A", 25 → "Z", 26 → "AA".
 */
export function columnLabel(index: number): string {
  let label = '';
  let num = index + 1;
  while (num > 0) {
    num -= 1;
    label = String.fromCharCode(65 + (num % 26)) + label;
    num = Math.floor(num / 26);
  }
  return label;
}

/**
 * Inverse of columnLabel. Returns -1 for anything that is not a run of letters.
 */
export function columnLabelToIndex(label: string): number {
  if (!/^[A-Za-z]+$/.test(label)) return -1;
  const upper = label.toUpperCase();
  let col = 0;
  for (let i = 0; i < upper.length; i++) {
    col = col * 26 + (upper.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * A1-style address for a cell.
 */
export function cellAddress(row: number, col: number): string {
  return `${columnLabel(col)}${row + 1}`;
}

/**
 * Deep copy of a grid. Rows are copied, strings are immutable.
 */
export function cloneRows(rows: ReadonlyGridRows): GridRows {
  return rows.map(row => [...row]);
}
