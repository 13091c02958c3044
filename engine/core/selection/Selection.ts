/**
 * Tabula Engine - Selection Model
 *
 * A selection is exactly one of four shapes:
 * - none: nothing addressable
 * - cellRange: rectangle between two corners given in any order
 * - column: every row's cell at one column
 * - row: every cell of one row
 *
 * A single selected cell is a cellRange whose corners are equal.
 * All geometry is pure; the grid is only read, except by clearSelectionCells().
 */

import type { CellRef, CellRange } from '../types/index.js';
import type { GridStore } from '../data/GridStore.js';

// =============================================================================
// Types
// =============================================================================

export interface NoSelection {
  readonly kind: 'none';
}

export interface CellRangeSelection {
  readonly kind: 'cellRange';
  readonly start: Readonly<CellRef>;
  readonly end: Readonly<CellRef>;
}

export interface ColumnSelection {
  readonly kind: 'column';
  readonly col: number;
}

export interface RowSelection {
  readonly kind: 'row';
  readonly row: number;
}

export type Selection = NoSelection | CellRangeSelection | ColumnSelection | RowSelection;

/** Read-side view of the grid needed for geometry */
export type GridExtent = Pick<GridStore, 'rowCount' | 'columnCount'>;

// =============================================================================
// Constructors
// =============================================================================

export const NO_SELECTION: NoSelection = Object.freeze({ kind: 'none' });

export function cellSelection(cell: CellRef): CellRangeSelection {
  return rangeSelection(cell, cell);
}

export function rangeSelection(start: CellRef, end: CellRef): CellRangeSelection {
  return Object.freeze({
    kind: 'cellRange',
    start: Object.freeze({ row: start.row, col: start.col }),
    end: Object.freeze({ row: end.row, col: end.col }),
  });
}

export function columnSelection(col: number): ColumnSelection {
  return Object.freeze({ kind: 'column', col });
}

export function rowSelection(row: number): RowSelection {
  return Object.freeze({ kind: 'row', row });
}

/**
 * Range covering the whole grid, or none when there is no cell to select.
 */
export function selectAllSelection(grid: GridExtent): Selection {
  if (grid.rowCount === 0 || grid.columnCount === 0) return NO_SELECTION;
  return rangeSelection(
    { row: 0, col: 0 },
    { row: grid.rowCount - 1, col: grid.columnCount - 1 }
  );
}

// =============================================================================
// Geometry
// =============================================================================

/**
 * Bounds of a pair of corners given in any order.
 */
export function cornersToRange(a: CellRef, b: CellRef): CellRange {
  return {
    startRow: Math.min(a.row, b.row),
    startCol: Math.min(a.col, b.col),
    endRow: Math.max(a.row, b.row),
    endCol: Math.max(a.col, b.col),
  };
}

/**
 * Inclusive bounds of the selection. Column and row selections span the
 * grid's full extent on the other axis. Returns null for none.
 */
export function normalizedBounds(selection: Selection, grid: GridExtent): CellRange | null {
  switch (selection.kind) {
    case 'none':
      return null;
    case 'cellRange':
      return cornersToRange(selection.start, selection.end);
    case 'column':
      return {
        startRow: 0,
        startCol: selection.col,
        endRow: grid.rowCount - 1,
        endCol: selection.col,
      };
    case 'row':
      return {
        startRow: selection.row,
        startCol: 0,
        endRow: selection.row,
        endCol: grid.columnCount - 1,
      };
  }
}

/**
 * Membership test. Agrees cell for cell with clipboard extraction.
 */
export function selectionContains(selection: Selection, row: number, col: number): boolean {
  switch (selection.kind) {
    case 'none':
      return false;
    case 'cellRange': {
      const range = cornersToRange(selection.start, selection.end);
      return (
        row >= range.startRow &&
        row <= range.endRow &&
        col >= range.startCol &&
        col <= range.endCol
      );
    }
    case 'column':
      return col === selection.col;
    case 'row':
      return row === selection.row;
  }
}

/**
 * Top-left cell where pasted text lands.
 */
export function pasteAnchor(selection: Selection): CellRef {
  switch (selection.kind) {
    case 'none':
      return { row: 0, col: 0 };
    case 'cellRange':
      return {
        row: Math.min(selection.start.row, selection.end.row),
        col: Math.min(selection.start.col, selection.end.col),
      };
    case 'column':
      return { row: 0, col: selection.col };
    case 'row':
      return { row: selection.row, col: 0 };
  }
}

export function isSingleCell(selection: Selection): selection is CellRangeSelection {
  return (
    selection.kind === 'cellRange' &&
    selection.start.row === selection.end.row &&
    selection.start.col === selection.end.col
  );
}

export function selectionsEqual(a: Selection, b: Selection): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none';
    case 'cellRange':
      return (
        b.kind === 'cellRange' &&
        a.start.row === b.start.row &&
        a.start.col === b.start.col &&
        a.end.row === b.end.row &&
        a.end.col === b.end.col
      );
    case 'column':
      return b.kind === 'column' && a.col === b.col;
    case 'row':
      return b.kind === 'row' && a.row === b.row;
  }
}

// =============================================================================
// Mutation
// =============================================================================

/**
 * Blank every existing cell the selection contains.
 * Returns the number of cells visited.
 */
export function clearSelectionCells(grid: GridStore, selection: Selection): number {
  let cleared = 0;

  switch (selection.kind) {
    case 'none':
      break;
    case 'cellRange': {
      const range = cornersToRange(selection.start, selection.end);
      for (let row = range.startRow; row <= range.endRow; row++) {
        for (let col = range.startCol; col <= range.endCol; col++) {
          if (grid.setCell(row, col, '')) cleared++;
        }
      }
      break;
    }
    case 'column':
      for (let row = 0; row < grid.rowCount; row++) {
        if (grid.setCell(row, selection.col, '')) cleared++;
      }
      break;
    case 'row': {
      const cells = grid.getRow(selection.row);
      if (cells) {
        for (let col = 0; col < cells.length; col++) {
          if (grid.setCell(selection.row, col, '')) cleared++;
        }
      }
      break;
    }
  }

  return cleared;
}

/**
 * Human-readable form used by the harness, e.g. "A1:B2", "C:C", "3:3".
 */
export function describeSelection(selection: Selection, label: (col: number) => string): string {
  switch (selection.kind) {
    case 'none':
      return 'none';
    case 'cellRange': {
      const start = `${label(selection.start.col)}${selection.start.row + 1}`;
      const end = `${label(selection.end.col)}${selection.end.row + 1}`;
      return start === end ? start : `${start}:${end}`;
    }
    case 'column': {
      const name = label(selection.col);
      return `${name}:${name}`;
    }
    case 'row':
      return `${selection.row + 1}:${selection.row + 1}`;
  }
}
