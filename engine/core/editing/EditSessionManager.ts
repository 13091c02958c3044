/**
 * Tabula Engine - Edit Session Manager
 *
 * State machine for the single in-place cell edit.
 *
 * States:
 * - Idle: no cell being edited
 * - Editing: one cell plus a text buffer
 *
 * Transitions:
 * - Idle → Editing: beginEdit (buffer seeded with the cell text) or
 *   beginEditWithText (buffer seeded with typed text)
 * - Editing → Idle: commit (caller writes the returned value verbatim)
 * - Editing → Idle: cancel (buffer discarded)
 *
 * The manager never touches the grid. Starting an edit while another is in
 * flight is refused; the session commits first so typed text is never lost.
 */

import type { CellRef } from '../types/index.js';
import {
  type StructureChange,
  shiftIndexOnInsert,
  shiftIndexOnDelete,
} from '../data/GridStore.js';

// =============================================================================
// Types
// =============================================================================

export interface EditSession {
  readonly cell: Readonly<CellRef>;
  /** Current text of the edit buffer */
  readonly buffer: string;
  /** Cell text when the edit began */
  readonly originalValue: string;
}

export interface EditCommit {
  cell: CellRef;
  value: string;
  /** True when the value differs from the text the edit started with */
  changed: boolean;
}

export type EditSessionSubscriber = () => void;
export type EditSessionUnsubscribe = () => void;

export interface EditSessionEvents {
  onEditStart?: (session: EditSession) => void;
  onCommit?: (commit: EditCommit) => void;
  onCancel?: (cell: CellRef) => void;
}

// =============================================================================
// Edit Session Manager
// =============================================================================

export class EditSessionManager {
  private session: EditSession | null = null;
  private events: EditSessionEvents = {};
  private listeners: Set<EditSessionSubscriber> = new Set();

  setEventHandlers(events: EditSessionEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // External Store Interface
  // ===========================================================================

  /**
   * Subscribe to session changes.
   * @returns Unsubscribe function
   */
  subscribe = (listener: EditSessionSubscriber): EditSessionUnsubscribe => {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  };

  /**
   * Current session, or null when idle.
   */
  getSnapshot = (): EditSession | null => {
    return this.session;
  };

  private notifyListeners(): void {
    this.listeners.forEach(listener => listener());
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  isEditing(): boolean {
    return this.session !== null;
  }

  isEditingCell(row: number, col: number): boolean {
    return this.session !== null && this.session.cell.row === row && this.session.cell.col === col;
  }

  getEditingCell(): CellRef | null {
    return this.session ? { ...this.session.cell } : null;
  }

  getBuffer(): string | null {
    return this.session?.buffer ?? null;
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * Start editing with the cell's current text in the buffer.
   * Returns false when an edit is already in progress.
   */
  beginEdit(cell: CellRef, currentText: string): boolean {
    return this.start(cell, currentText, currentText);
  }

  /**
   * Start editing with typed text replacing the cell's content.
   */
  beginEditWithText(cell: CellRef, typed: string, currentText: string = ''): boolean {
    return this.start(cell, typed, currentText);
  }

  private start(cell: CellRef, buffer: string, originalValue: string): boolean {
    if (this.session) return false;

    this.session = Object.freeze({
      cell: Object.freeze({ row: cell.row, col: cell.col }),
      buffer,
      originalValue,
    });
    this.events.onEditStart?.(this.session);
    this.notifyListeners();
    return true;
  }

  setBuffer(text: string): void {
    if (!this.session) return;
    this.session = Object.freeze({ ...this.session, buffer: text });
    this.notifyListeners();
  }

  appendText(text: string): void {
    if (!this.session) return;
    this.setBuffer(this.session.buffer + text);
  }

  /**
   * Remove the last character of the buffer.
   */
  backspace(): void {
    if (!this.session || this.session.buffer.length === 0) return;
    this.setBuffer(this.session.buffer.slice(0, -1));
  }

  /**
   * Finish the edit. The caller writes `value` to `cell` verbatim.
   * Returns null when idle.
   */
  commit(): EditCommit | null {
    const session = this.session;
    if (!session) return null;

    this.session = null;
    const result: EditCommit = {
      cell: { ...session.cell },
      value: session.buffer,
      changed: session.buffer !== session.originalValue,
    };
    this.events.onCommit?.(result);
    this.notifyListeners();
    return result;
  }

  /**
   * Abandon the edit without writing anything.
   */
  cancel(): boolean {
    const session = this.session;
    if (!session) return false;

    this.session = null;
    this.events.onCancel?.({ ...session.cell });
    this.notifyListeners();
    return true;
  }

  // ===========================================================================
  // Structural Changes
  // ===========================================================================

  /**
   * Keep the edited cell attached to its data across row/column
   * inserts and deletes. Deleting the edited row or column ends the edit
   * without writing.
   */
  retarget(change: StructureChange): void {
    const session = this.session;
    if (!session) return;

    const { row, col } = session.cell;
    const tracked = change.axis === 'row' ? row : col;
    const moved = change.kind === 'insert'
      ? shiftIndexOnInsert(tracked, change.index)
      : shiftIndexOnDelete(tracked, change.index);

    if (moved === null) {
      this.cancel();
      return;
    }
    if (moved === tracked) return;

    const cell = change.axis === 'row' ? { row: moved, col } : { row, col: moved };
    this.session = Object.freeze({ ...session, cell: Object.freeze(cell) });
    this.notifyListeners();
  }

  /**
   * Drop any session without events (document replaced).
   */
  reset(): void {
    if (!this.session) return;
    this.session = null;
    this.notifyListeners();
  }
}

export function createEditSessionManager(): EditSessionManager {
  return new EditSessionManager();
}
