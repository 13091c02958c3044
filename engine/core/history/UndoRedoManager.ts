/**
 * Tabula Engine - Undo/Redo Manager (Snapshot History)
 *
 * Linear undo/redo over full grid snapshots.
 *
 * Rules:
 * - record() pushes a deep copy of the grid taken BEFORE a mutation
 * - recording clears the redo stack (no branching history)
 * - the undo stack holds at most `maxHistory` entries; the oldest is evicted
 * - undo()/redo() take the current grid and hand back the one to restore
 *
 * The manager never holds a live reference to grid rows: everything going in
 * or coming out is copied.
 */

import {
  type GridRows,
  type ReadonlyGridRows,
  MAX_HISTORY,
  cloneRows,
} from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface HistoryEntry {
  /** Grid contents at the time of recording */
  readonly rows: ReadonlyGridRows;
  /** Label of the operation that followed the snapshot, e.g. "paste" */
  readonly description: string;
  readonly timestamp: number;
}

export interface UndoRedoState {
  /** Can undo */
  canUndo: boolean;
  /** Can redo */
  canRedo: boolean;
  /** Undo stack size */
  undoCount: number;
  /** Redo stack size */
  redoCount: number;
  /** Label of the entry undo would restore */
  undoDescription: string | null;
  /** Label of the entry redo would restore */
  redoDescription: string | null;
  maxHistory: number;
}

export interface UndoRedoEvents {
  /** Called when a snapshot is recorded */
  onRecord?: (entry: HistoryEntry) => void;
  /** Called when undo is performed */
  onUndo?: (entry: HistoryEntry) => void;
  /** Called when redo is performed */
  onRedo?: (entry: HistoryEntry) => void;
  /** Called when the oldest undo entry is dropped */
  onEvict?: (entry: HistoryEntry) => void;
  /** Called when state changes */
  onStateChange?: (state: UndoRedoState) => void;
}

export interface UndoRedoConfig {
  /** Maximum number of undo snapshots to keep (default: 50) */
  maxHistory?: number;
}

// =============================================================================
// Undo/Redo Manager
// =============================================================================

export class UndoRedoManager {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private config: Required<UndoRedoConfig>;
  private events: UndoRedoEvents = {};

  constructor(config: UndoRedoConfig = {}) {
    this.config = {
      maxHistory: Math.max(1, config.maxHistory ?? MAX_HISTORY),
    };
  }

  setEventHandlers(events: UndoRedoEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  /**
   * Push a copy of `rows` onto the undo stack and clear redo.
   */
  record(rows: ReadonlyGridRows, description: string = 'edit'): void {
    const entry = this.createEntry(rows, description);
    this.undoStack.push(entry);
    this.redoStack = [];

    while (this.undoStack.length > this.config.maxHistory) {
      const evicted = this.undoStack.shift();
      if (evicted) this.events.onEvict?.(evicted);
    }

    this.events.onRecord?.(entry);
    this.emitStateChange();
  }

  // ===========================================================================
  // Undo/Redo
  // ===========================================================================

  /**
   * Step back. `current` is saved for redo; the returned rows replace the grid.
   * Returns null (and changes nothing) when there is nothing to undo.
   */
  undo(current: ReadonlyGridRows): GridRows | null {
    const entry = this.undoStack.pop();
    if (!entry) return null;

    this.redoStack.push(this.createEntry(current, entry.description));
    this.events.onUndo?.(entry);
    this.emitStateChange();
    return cloneRows(entry.rows);
  }

  /**
   * Step forward again after undo. Symmetric to undo().
   */
  redo(current: ReadonlyGridRows): GridRows | null {
    const entry = this.redoStack.pop();
    if (!entry) return null;

    this.undoStack.push(this.createEntry(current, entry.description));
    this.events.onRedo?.(entry);
    this.emitStateChange();
    return cloneRows(entry.rows);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  getState(): UndoRedoState {
    const undoTop = this.undoStack[this.undoStack.length - 1];
    const redoTop = this.redoStack[this.redoStack.length - 1];
    return {
      canUndo: this.undoStack.length > 0,
      canRedo: this.redoStack.length > 0,
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
      undoDescription: undoTop?.description ?? null,
      redoDescription: redoTop?.description ?? null,
      maxHistory: this.config.maxHistory,
    };
  }

  /**
   * Drop both stacks.
   */
  clear(): void {
    if (this.undoStack.length === 0 && this.redoStack.length === 0) return;
    this.undoStack = [];
    this.redoStack = [];
    this.emitStateChange();
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private createEntry(rows: ReadonlyGridRows, description: string): HistoryEntry {
    return Object.freeze({
      rows: cloneRows(rows),
      description,
      timestamp: Date.now(),
    });
  }

  private emitStateChange(): void {
    this.events.onStateChange?.(this.getState());
  }
}

export function createUndoRedoManager(config?: UndoRedoConfig): UndoRedoManager {
  return new UndoRedoManager(config);
}
