/**
 * Tabula Engine - Input Intents
 *
 * Semantic commands produced by input adapters (keyboard, pointer, menus)
 * and consumed by the intent dispatcher. Intents carry no behavior; the
 * same intent can be logged, replayed or fed in from a test.
 */

import type { CellRef, Direction } from '../types/index.js';

// =============================================================================
// Pointer Intents
// =============================================================================

/** Pointer pressed on a cell */
export interface ActivateCellIntent {
  readonly type: 'activateCell';
  readonly row: number;
  readonly col: number;
}

/** Pointer moved over a cell while pressed */
export interface DragToIntent {
  readonly type: 'dragTo';
  readonly row: number;
  readonly col: number;
}

/** Pointer released */
export interface EndDragIntent {
  readonly type: 'endDrag';
}

/** Double-click on a cell */
export interface BeginEditIntent {
  readonly type: 'beginEdit';
  readonly row: number;
  readonly col: number;
}

// =============================================================================
// Keyboard Intents
// =============================================================================

export interface NavigateIntent {
  readonly type: 'navigate';
  readonly direction: Direction;
  /** Shift held: grow the range from its anchor */
  readonly extend: boolean;
}

/** Printable text typed by the user */
export interface TextIntent {
  readonly type: 'text';
  readonly text: string;
}

/** Enter */
export interface ConfirmIntent {
  readonly type: 'confirm';
}

/** Escape */
export interface EscapeIntent {
  readonly type: 'escape';
}

/** The cell editor lost focus */
export interface BlurIntent {
  readonly type: 'blur';
}

/** Delete or Backspace */
export interface DeleteIntent {
  readonly type: 'delete';
}

export interface ClipboardIntent {
  readonly type: 'clipboard';
  readonly action: 'copy' | 'cut' | 'paste';
  /** Text delivered with a paste event; the clipboard bridge is read otherwise */
  readonly text?: string;
}

export interface HistoryIntent {
  readonly type: 'history';
  readonly action: 'undo' | 'redo';
}

// =============================================================================
// Selection Intents
// =============================================================================

export interface SelectAllIntent {
  readonly type: 'selectAll';
}

/** Row header clicked */
export interface SelectRowIntent {
  readonly type: 'selectRow';
  readonly row: number;
}

/** Column header clicked */
export interface SelectColumnIntent {
  readonly type: 'selectColumn';
  readonly col: number;
}

// =============================================================================
// Search Intents
// =============================================================================

export interface FindIntent {
  readonly type: 'find';
  readonly query: string;
  readonly caseSensitive?: boolean;
}

export interface FindStepIntent {
  readonly type: 'findStep';
  readonly direction: 'next' | 'previous';
}

// =============================================================================
// Menu Intents
// =============================================================================

export interface StructureIntent {
  readonly type: 'structure';
  readonly action: 'insertRow' | 'insertColumn' | 'deleteRow' | 'deleteColumn';
  /** Row or column index the action applies to */
  readonly index: number;
}

export interface AppendIntent {
  readonly type: 'append';
  readonly axis: 'row' | 'column';
}

export interface SortIntent {
  readonly type: 'sort';
  readonly column: number;
  readonly ascending: boolean;
}

export interface ClearCellIntent {
  readonly type: 'clearCell';
  readonly row: number;
  readonly col: number;
}

export interface ResizeColumnIntent {
  readonly type: 'resizeColumn';
  readonly col: number;
  readonly width: number;
}

export interface NewDocumentIntent {
  readonly type: 'newDocument';
}

// =============================================================================
// Union
// =============================================================================

export type TableIntent =
  | ActivateCellIntent
  | DragToIntent
  | EndDragIntent
  | BeginEditIntent
  | NavigateIntent
  | TextIntent
  | ConfirmIntent
  | EscapeIntent
  | BlurIntent
  | DeleteIntent
  | ClipboardIntent
  | HistoryIntent
  | SelectAllIntent
  | SelectRowIntent
  | SelectColumnIntent
  | FindIntent
  | FindStepIntent
  | StructureIntent
  | AppendIntent
  | SortIntent
  | ClearCellIntent
  | ResizeColumnIntent
  | NewDocumentIntent;

export type IntentType = TableIntent['type'];

// =============================================================================
// Context Menus
// =============================================================================

export interface MenuItem {
  readonly label: string;
  readonly intent: TableIntent;
}

/**
 * Right-click menu of a column header.
 */
export function columnHeaderMenu(col: number): MenuItem[] {
  return [
    { label: 'Insert Column Left', intent: { type: 'structure', action: 'insertColumn', index: col } },
    { label: 'Insert Column Right', intent: { type: 'structure', action: 'insertColumn', index: col + 1 } },
    { label: 'Delete Column', intent: { type: 'structure', action: 'deleteColumn', index: col } },
    { label: 'Sort Ascending', intent: { type: 'sort', column: col, ascending: true } },
    { label: 'Sort Descending', intent: { type: 'sort', column: col, ascending: false } },
  ];
}

/**
 * Right-click menu of a row header.
 */
export function rowHeaderMenu(row: number): MenuItem[] {
  return [
    { label: 'Insert Row Above', intent: { type: 'structure', action: 'insertRow', index: row } },
    { label: 'Insert Row Below', intent: { type: 'structure', action: 'insertRow', index: row + 1 } },
    { label: 'Delete Row', intent: { type: 'structure', action: 'deleteRow', index: row } },
  ];
}

/**
 * Right-click menu of a cell.
 */
export function cellContextMenu(cell: CellRef): MenuItem[] {
  return [{ label: 'Clear', intent: { type: 'clearCell', row: cell.row, col: cell.col } }];
}
