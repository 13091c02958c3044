/**
 * Tabula Engine - Selection Manager
 *
 * Holds the current selection and applies keyboard/mouse style transitions:
 * - Activate: single cell
 * - Arrow: move the active corner, clamped to the grid
 * - Shift+Arrow: extend from the anchor corner
 * - Drag: rectangle from the drag origin to the pointer cell
 * - Row/column header: whole row or column
 *
 * Architecture:
 * - Selection values are frozen; every change replaces the value
 * - Listeners are told about every change, with its source
 * - Grid extents are passed in, the manager never reads cell data
 */

import type { CellRef } from '../types/index.js';
import {
  type Selection,
  type GridExtent,
  NO_SELECTION,
  cellSelection,
  rangeSelection,
  rowSelection,
  columnSelection,
  selectAllSelection,
  selectionsEqual,
} from './Selection.js';

// =============================================================================
// Types
// =============================================================================

export type SelectionChangeSource = 'api' | 'keyboard' | 'mouse' | 'search';

export interface SelectionChangeEvent {
  previous: Selection;
  current: Selection;
  source: SelectionChangeSource;
}

export interface SelectionManagerState {
  readonly selection: Selection;
  /** Cell the current drag started from, null when not dragging */
  readonly dragOrigin: Readonly<CellRef> | null;
}

// =============================================================================
// Pure Utility Functions
// =============================================================================

/**
 * Clamp a cell into the grid. Returns null when the grid has no cells.
 */
export function clampToGrid(cell: CellRef, grid: GridExtent): CellRef | null {
  if (grid.rowCount === 0 || grid.columnCount === 0) return null;
  return {
    row: Math.max(0, Math.min(grid.rowCount - 1, cell.row)),
    col: Math.max(0, Math.min(grid.columnCount - 1, cell.col)),
  };
}

/**
 * Anchor and moving corner used as the base for keyboard navigation.
 * Anything other than a cell range starts from the origin.
 */
export function navigationBase(selection: Selection): { anchor: CellRef; current: CellRef } {
  if (selection.kind === 'cellRange') {
    return {
      anchor: { row: selection.start.row, col: selection.start.col },
      current: { row: selection.end.row, col: selection.end.col },
    };
  }
  const origin = { row: 0, col: 0 };
  return { anchor: origin, current: origin };
}

// =============================================================================
// Selection Manager
// =============================================================================

export class SelectionManager {
  private selection: Selection = NO_SELECTION;
  private dragOrigin: CellRef | null = null;
  private listeners: Set<(event: SelectionChangeEvent) => void> = new Set();

  // ===========================================================================
  // State Access
  // ===========================================================================

  getSelection(): Selection {
    return this.selection;
  }

  getState(): SelectionManagerState {
    return {
      selection: this.selection,
      dragOrigin: this.dragOrigin ? { ...this.dragOrigin } : null,
    };
  }

  isDragging(): boolean {
    return this.dragOrigin !== null;
  }

  // ===========================================================================
  // Direct Selection
  // ===========================================================================

  setSelection(selection: Selection, source: SelectionChangeSource = 'api'): Selection {
    const previous = this.selection;
    if (selectionsEqual(previous, selection)) return previous;

    this.selection = selection;
    for (const listener of this.listeners) {
      listener({ previous, current: selection, source });
    }
    return selection;
  }

  clear(source: SelectionChangeSource = 'api'): Selection {
    this.dragOrigin = null;
    return this.setSelection(NO_SELECTION, source);
  }

  selectCell(cell: CellRef, source: SelectionChangeSource = 'api'): Selection {
    return this.setSelection(cellSelection(cell), source);
  }

  selectRange(start: CellRef, end: CellRef, source: SelectionChangeSource = 'api'): Selection {
    return this.setSelection(rangeSelection(start, end), source);
  }

  selectRow(row: number, source: SelectionChangeSource = 'mouse'): Selection {
    return this.setSelection(rowSelection(row), source);
  }

  selectColumn(col: number, source: SelectionChangeSource = 'mouse'): Selection {
    return this.setSelection(columnSelection(col), source);
  }

  /**
   * Select every cell; leaves the selection alone when the grid has none.
   */
  selectAll(grid: GridExtent): Selection {
    const all = selectAllSelection(grid);
    if (all.kind === 'none') return this.selection;
    return this.setSelection(all, 'keyboard');
  }

  // ===========================================================================
  // Keyboard Navigation
  // ===========================================================================

  /**
   * Move the active corner by a delta, clamped to the grid.
   * With `extend` the anchor stays put and the range grows or shrinks.
   */
  move(deltaRow: number, deltaCol: number, extend: boolean, grid: GridExtent): Selection {
    const { anchor, current } = navigationBase(this.selection);
    const next = clampToGrid(
      { row: current.row + deltaRow, col: current.col + deltaCol },
      grid
    );
    if (!next) return this.selection;

    if (extend) {
      return this.setSelection(rangeSelection(anchor, next), 'keyboard');
    }
    return this.setSelection(cellSelection(next), 'keyboard');
  }

  // ===========================================================================
  // Mouse Drag
  // ===========================================================================

  /**
   * Pointer pressed on a cell: select it and remember it as the drag origin.
   */
  beginDrag(cell: CellRef): Selection {
    this.dragOrigin = { row: cell.row, col: cell.col };
    return this.setSelection(cellSelection(cell), 'mouse');
  }

  /**
   * Pointer moved over a cell while pressed.
   */
  dragTo(cell: CellRef): Selection {
    if (!this.dragOrigin) return this.selection;
    return this.setSelection(rangeSelection(this.dragOrigin, cell), 'mouse');
  }

  endDrag(): Selection {
    this.dragOrigin = null;
    return this.selection;
  }

  // ===========================================================================
  // Event Subscription
  // ===========================================================================

  /**
   * Subscribe to selection changes.
   * Returns unsubscribe function.
   */
  subscribe(listener: (event: SelectionChangeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}

export function createSelectionManager(): SelectionManager {
  return new SelectionManager();
}
