/**
 * Tabula Engine - Table Session
 *
 * One editing session over one document. Owns the grid and every piece of
 * state that refers to it:
 * - selection (with drag and keyboard navigation)
 * - the single in-place edit
 * - undo/redo snapshots
 * - search results and the sort indicator
 * - column widths, dirty flag, document name
 * - the pending-document mailbox and the clipboard bridge
 *
 * Rules enforced here rather than in the parts:
 * - snapshot before every mutation except an edit commit
 * - commit any in-flight edit before the user moves elsewhere
 * - editing and selection are exclusive: starting an edit clears the selection
 * - structural edits re-index the edit cell and widths, and drop the sort indicator
 * - the grid is rectangular whenever control returns to the caller
 *
 * Everything is synchronous except save(), which awaits the caller's sink.
 */

import {
  type CellRef,
  type GridRows,
  type ReadonlyGridRows,
  type Direction,
  DIRECTION_DELTAS,
  DEFAULT_ROWS,
  DEFAULT_COLS,
  DEFAULT_COLUMN_WIDTH,
  MIN_COLUMN_WIDTH,
  MAX_HISTORY,
  columnLabel,
} from './types/index.js';
import { GridStore, type StructureChange } from './data/GridStore.js';
import { ColumnWidths } from './data/ColumnWidths.js';
import {
  type Selection,
  pasteAnchor,
  isSingleCell,
  clearSelectionCells,
} from './selection/Selection.js';
import { SelectionManager, clampToGrid } from './selection/SelectionManager.js';
import {
  EditSessionManager,
  type EditSession,
  type EditCommit,
} from './editing/EditSessionManager.js';
import { UndoRedoManager, type UndoRedoState } from './history/UndoRedoManager.js';
import { extractText, pasteText, type PasteResult } from './clipboard/ClipboardCodec.js';
import {
  ClipboardManager,
  type ClipboardTransport,
  type ClipboardOperation,
} from './clipboard/ClipboardManager.js';
import { SearchIndex } from './operations/SearchIndex.js';
import { sortRows, type SortIndicator, type SortResult } from './operations/Sorter.js';
import { DocumentMailbox } from './document/DocumentMailbox.js';
import { type DocumentCodec, TsvDocumentCodec } from './document/TsvDocumentCodec.js';
import { DocumentLoadError, DocumentSaveError } from './document/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface TableSessionConfig {
  /** Rows in a new document (default: 20) */
  defaultRows?: number;
  /** Columns in a new document (default: 10) */
  defaultColumns?: number;
  /** Undo snapshots kept (default: 50) */
  maxHistory?: number;
  /** Width of columns without an explicit width (default: 120) */
  defaultColumnWidth?: number;
  /** Smallest explicit column width (default: 30) */
  minColumnWidth?: number;
  /** Keep row 0 on top when sorting (default: false) */
  frozenHeader?: boolean;
  /** Name of a new document (default: "untitled") */
  untitledName?: string;
}

export interface TableSessionOptions {
  /** Platform clipboard; an in-memory one is used when omitted */
  clipboard?: ClipboardTransport;
  /** Decoder for documents deposited in the mailbox (default: TSV) */
  codec?: DocumentCodec;
}

export type ChangeReason =
  | 'edit'
  | 'clear'
  | 'cut'
  | 'paste'
  | 'undo'
  | 'redo'
  | 'insertRow'
  | 'insertColumn'
  | 'deleteRow'
  | 'deleteColumn'
  | 'sort'
  | 'load'
  | 'new';

export interface TableSessionEvents {
  /** Grid content or shape changed */
  onChange?: (reason: ChangeReason) => void;
  onSelectionChange?: (selection: Selection) => void;
  onEditStart?: (session: EditSession) => void;
  /** An edit was written to the grid */
  onCommit?: (commit: EditCommit) => void;
  onDirtyChange?: (dirty: boolean) => void;
  /** A deposited document could not be decoded */
  onLoadError?: (error: DocumentLoadError) => void;
  /** The clipboard transport failed; the operation itself went ahead */
  onTransportError?: (error: unknown, operation: ClipboardOperation) => void;
}

export type PollResult =
  | { status: 'empty' }
  | { status: 'loaded'; name: string; rowCount: number; columnCount: number }
  | { status: 'failed'; error: DocumentLoadError };

/**
 * Receives the rows to persist. May be async; a rejection fails the save.
 */
export type DocumentSink = (rows: GridRows, name: string) => Promise<void> | void;

export interface TableSessionState {
  rowCount: number;
  columnCount: number;
  selection: Selection;
  editing: EditSession | null;
  dirty: boolean;
  documentName: string;
  sortIndicator: SortIndicator | null;
  frozenHeader: boolean;
  history: UndoRedoState;
  search: { query: string; total: number; currentIndex: number };
}

// =============================================================================
// Table Session
// =============================================================================

export class TableSession {
  private readonly config: Required<TableSessionConfig>;
  private readonly grid: GridStore;
  private readonly widths: ColumnWidths;
  private readonly selection = new SelectionManager();
  private readonly edit = new EditSessionManager();
  private readonly history: UndoRedoManager;
  private readonly search = new SearchIndex();
  private readonly mailbox = new DocumentMailbox();
  private readonly clipboard: ClipboardManager;
  private readonly codec: DocumentCodec;
  private events: TableSessionEvents = {};

  private frozenHeader: boolean;
  private sortIndicator: SortIndicator | null = null;
  private dirty = false;
  private documentName: string;

  constructor(config: TableSessionConfig = {}, options: TableSessionOptions = {}) {
    this.config = {
      defaultRows: config.defaultRows ?? DEFAULT_ROWS,
      defaultColumns: config.defaultColumns ?? DEFAULT_COLS,
      maxHistory: config.maxHistory ?? MAX_HISTORY,
      defaultColumnWidth: config.defaultColumnWidth ?? DEFAULT_COLUMN_WIDTH,
      minColumnWidth: config.minColumnWidth ?? MIN_COLUMN_WIDTH,
      frozenHeader: config.frozenHeader ?? false,
      untitledName: config.untitledName ?? 'untitled',
    };

    this.frozenHeader = this.config.frozenHeader;
    this.documentName = this.config.untitledName;

    this.grid = GridStore.withExtents(this.config.defaultRows, this.config.defaultColumns, {
      defaultColumns: this.config.defaultColumns,
    });
    this.widths = new ColumnWidths({
      defaultWidth: this.config.defaultColumnWidth,
      minWidth: this.config.minColumnWidth,
    });
    this.history = new UndoRedoManager({ maxHistory: this.config.maxHistory });
    this.clipboard = new ClipboardManager(options.clipboard);
    this.codec = options.codec ?? new TsvDocumentCodec();

    this.grid.setEventHandlers({
      onStructureChange: change => this.handleStructureChange(change),
    });
    this.selection.subscribe(event => this.events.onSelectionChange?.(event.current));
    this.edit.setEventHandlers({
      onEditStart: session => this.events.onEditStart?.(session),
    });
    this.clipboard.setEventHandlers({
      onTransportError: (error, operation) => this.events.onTransportError?.(error, operation),
    });
  }

  setEventHandlers(events: TableSessionEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // State Access
  // ===========================================================================

  get rowCount(): number {
    return this.grid.rowCount;
  }

  get columnCount(): number {
    return this.grid.columnCount;
  }

  getCell(row: number, col: number): string {
    return this.grid.getCell(row, col);
  }

  /**
   * Live read-only rows for rendering.
   */
  getRows(): ReadonlyGridRows {
    return this.grid.getRows();
  }

  /**
   * Copy of the document rows, for saving.
   */
  toRows(): GridRows {
    return this.grid.toRows();
  }

  getSelection(): Selection {
    return this.selection.getSelection();
  }

  getEditSession(): EditSession | null {
    return this.edit.getSnapshot();
  }

  isEditing(): boolean {
    return this.edit.isEditing();
  }

  isDirty(): boolean {
    return this.dirty;
  }

  getDocumentName(): string {
    return this.documentName;
  }

  getSortIndicator(): SortIndicator | null {
    return this.sortIndicator ? { ...this.sortIndicator } : null;
  }

  getHistoryState(): UndoRedoState {
    return this.history.getState();
  }

  isFrozenHeader(): boolean {
    return this.frozenHeader;
  }

  setFrozenHeader(frozen: boolean): void {
    this.frozenHeader = frozen;
  }

  columnLabel(index: number): string {
    return columnLabel(index);
  }

  getState(): TableSessionState {
    const search = this.search.getState();
    return {
      rowCount: this.grid.rowCount,
      columnCount: this.grid.columnCount,
      selection: this.selection.getSelection(),
      editing: this.edit.getSnapshot(),
      dirty: this.dirty,
      documentName: this.documentName,
      sortIndicator: this.getSortIndicator(),
      frozenHeader: this.frozenHeader,
      history: this.history.getState(),
      search: {
        query: search.query,
        total: search.results.length,
        currentIndex: search.currentIndex,
      },
    };
  }

  // ===========================================================================
  // Column Widths
  // ===========================================================================

  getColumnWidth(col: number): number {
    return this.widths.getWidth(col);
  }

  /**
   * Set a display width, clamped to the configured minimum.
   */
  setColumnWidth(col: number, width: number): void {
    this.widths.setWidth(col, width);
  }

  resetColumnWidth(col: number): void {
    this.widths.resetWidth(col);
  }

  getColumnWidths(): Array<[number, number]> {
    return this.widths.entries();
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Pointer pressed on a cell: commit any edit and start a drag there.
   */
  activateCell(cell: CellRef): Selection {
    this.commitEdit();
    return this.selection.beginDrag(cell);
  }

  dragTo(cell: CellRef): Selection {
    return this.selection.dragTo(cell);
  }

  endDrag(): Selection {
    return this.selection.endDrag();
  }

  selectCell(cell: CellRef): Selection {
    this.commitEdit();
    return this.selection.selectCell(cell);
  }

  selectRange(start: CellRef, end: CellRef): Selection {
    this.commitEdit();
    return this.selection.selectRange(start, end);
  }

  selectRow(row: number): Selection {
    this.commitEdit();
    return this.selection.selectRow(row);
  }

  selectColumn(col: number): Selection {
    this.commitEdit();
    return this.selection.selectColumn(col);
  }

  /**
   * Select every cell. Does nothing while editing or when the grid has no cells.
   */
  selectAll(): Selection {
    if (this.edit.isEditing()) return this.selection.getSelection();
    return this.selection.selectAll(this.grid);
  }

  clearSelection(): Selection {
    return this.selection.clear();
  }

  /**
   * Arrow-key movement. Ignored while editing.
   */
  navigate(direction: Direction, extend: boolean = false): boolean {
    if (this.edit.isEditing()) return false;
    const delta = DIRECTION_DELTAS[direction];
    const before = this.selection.getSelection();
    return this.selection.move(delta.row, delta.col, extend, this.grid) !== before;
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  /**
   * Start editing a cell with its current text. Any edit on another cell is
   * committed first; the selection is cleared.
   */
  beginEdit(cell: CellRef): boolean {
    if (!this.grid.hasCell(cell.row, cell.col)) return false;
    if (this.edit.isEditingCell(cell.row, cell.col)) return false;

    this.commitEdit();
    this.selection.endDrag();
    this.selection.clear();
    return this.edit.beginEdit(cell, this.grid.getCell(cell.row, cell.col));
  }

  /**
   * Typed text. Goes into the edit buffer while editing; otherwise starts an
   * edit seeded with the text when exactly one cell is selected.
   */
  typeText(text: string): boolean {
    if (text.length === 0) return false;

    if (this.edit.isEditing()) {
      this.edit.appendText(text);
      return true;
    }

    const selection = this.selection.getSelection();
    if (!isSingleCell(selection)) return false;

    const { row, col } = selection.start;
    if (!this.grid.hasCell(row, col)) return false;

    this.selection.clear();
    return this.edit.beginEditWithText({ row, col }, text, this.grid.getCell(row, col));
  }

  setEditBuffer(text: string): boolean {
    if (!this.edit.isEditing()) return false;
    this.edit.setBuffer(text);
    return true;
  }

  backspace(): boolean {
    if (!this.edit.isEditing()) return false;
    this.edit.backspace();
    return true;
  }

  /**
   * Write the edit buffer to its cell verbatim. No history snapshot is taken.
   */
  commitEdit(): boolean {
    const commit = this.edit.commit();
    if (!commit) return false;

    const { row, col } = commit.cell;
    this.grid.setCell(row, col, commit.value);
    this.markDirty();

    if (commit.changed && this.sortIndicator?.column === col) {
      this.sortIndicator = null;
    }

    this.events.onCommit?.(commit);
    this.events.onChange?.('edit');
    return true;
  }

  /**
   * Enter: commit and select the cell below, clamped to the grid.
   */
  confirmEdit(): boolean {
    const cell = this.edit.getEditingCell();
    if (!cell) return false;

    this.commitEdit();
    const below = clampToGrid({ row: cell.row + 1, col: cell.col }, this.grid);
    if (below) this.selection.selectCell(below, 'keyboard');
    return true;
  }

  /**
   * Escape: drop the edit buffer and the selection.
   */
  cancelEdit(): boolean {
    const cancelled = this.edit.cancel();
    const before = this.selection.getSelection();
    this.selection.clear('keyboard');
    return cancelled || before.kind !== 'none';
  }

  /**
   * The editor lost focus.
   */
  blur(): boolean {
    return this.commitEdit();
  }

  // ===========================================================================
  // Content Mutation
  // ===========================================================================

  /**
   * Push a snapshot of the current grid onto the undo stack.
   */
  saveUndoState(description: string = 'edit'): void {
    this.history.record(this.grid.getRows(), description);
    this.markDirty();
  }

  /**
   * Delete key: blank every selected cell.
   */
  deleteSelection(): boolean {
    if (this.edit.isEditing()) return false;

    const selection = this.selection.getSelection();
    if (selection.kind === 'none') return false;

    this.saveUndoState('clear');
    clearSelectionCells(this.grid, selection);
    this.events.onChange?.('clear');
    return true;
  }

  /**
   * Blank one cell. An open edit is committed first.
   */
  clearCell(cell: CellRef): boolean {
    if (!this.grid.hasCell(cell.row, cell.col)) return false;

    this.commitEdit();
    this.saveUndoState('clear');
    const previous = this.grid.getCell(cell.row, cell.col);
    this.grid.setCell(cell.row, cell.col, '');

    if (previous !== '' && this.sortIndicator?.column === cell.col) {
      this.sortIndicator = null;
    }
    this.events.onChange?.('clear');
    return true;
  }

  // ===========================================================================
  // Clipboard
  // ===========================================================================

  /**
   * Selection as clipboard text. Non-empty text is also handed to the
   * clipboard transport.
   */
  copy(): string {
    if (this.edit.isEditing()) return '';
    const text = extractText(this.grid, this.selection.getSelection());
    this.clipboard.writeText(text);
    return text;
  }

  /**
   * Copy, then blank the selected cells. Always snapshots first.
   */
  cut(): string {
    if (this.edit.isEditing()) return '';

    this.saveUndoState('cut');
    const selection = this.selection.getSelection();
    const text = extractText(this.grid, selection);
    if (text.length > 0) {
      this.clipboard.writeText(text);
      clearSelectionCells(this.grid, selection);
      this.events.onChange?.('cut');
    }
    return text;
  }

  /**
   * Paste at the selection's top-left. Without `text`, reads the clipboard
   * transport. Returns null when there was nothing to paste.
   */
  paste(text?: string): PasteResult | null {
    if (this.edit.isEditing()) return null;

    const source = text ?? this.clipboard.readText();
    if (!source) return null;

    this.saveUndoState('paste');
    const result = pasteText(this.grid, source, pasteAnchor(this.selection.getSelection()));
    this.events.onChange?.('paste');
    return result;
  }

  /**
   * Current clipboard transport text, or null.
   */
  readClipboardText(): string | null {
    return this.clipboard.readText();
  }

  // ===========================================================================
  // History
  // ===========================================================================

  /**
   * Restore the previous snapshot. An open edit is committed first, so it is
   * undone along with everything since that snapshot.
   */
  undo(): boolean {
    this.commitEdit();
    const rows = this.history.undo(this.grid.getRows());
    if (!rows) return false;
    this.restore(rows, 'undo');
    return true;
  }

  redo(): boolean {
    this.commitEdit();
    const rows = this.history.redo(this.grid.getRows());
    if (!rows) return false;
    this.restore(rows, 'redo');
    return true;
  }

  private restore(rows: ReadonlyGridRows, reason: ChangeReason): void {
    this.grid.replaceAll(rows);
    this.search.clear();
    this.sortIndicator = null;
    this.markDirty();
    this.events.onChange?.(reason);
  }

  // ===========================================================================
  // Structure
  // ===========================================================================

  addRow(): void {
    this.insertRowAt(this.grid.rowCount);
  }

  addColumn(): void {
    this.insertColumnAt(this.grid.columnCount);
  }

  insertRowAt(row: number): boolean {
    if (row < 0 || row > this.grid.rowCount) return false;
    this.saveUndoState('insert row');
    this.grid.insertRowAt(row);
    this.events.onChange?.('insertRow');
    return true;
  }

  insertColumnAt(col: number): boolean {
    if (col < 0 || col > this.grid.columnCount) return false;
    this.saveUndoState('insert column');
    this.grid.insertColumnAt(col);
    this.events.onChange?.('insertColumn');
    return true;
  }

  deleteRow(row: number): boolean {
    if (row < 0 || row >= this.grid.rowCount) return false;
    this.saveUndoState('delete row');
    this.grid.deleteRow(row);
    this.events.onChange?.('deleteRow');
    return true;
  }

  deleteColumn(col: number): boolean {
    if (col < 0 || col >= this.grid.columnCount) return false;
    this.saveUndoState('delete column');
    this.grid.deleteColumn(col);
    this.events.onChange?.('deleteColumn');
    return true;
  }

  private handleStructureChange(change: StructureChange): void {
    this.edit.retarget(change);
    if (change.axis === 'column') {
      if (change.kind === 'insert') {
        this.widths.onColumnInserted(change.index);
      } else {
        this.widths.onColumnDeleted(change.index);
      }
    }
    this.search.clear();
    this.sortIndicator = null;
  }

  // ===========================================================================
  // Sort
  // ===========================================================================

  /**
   * Stable sort of all rows by one column (row 0 stays put under a frozen
   * header). An open edit is committed first. Returns null on an empty grid.
   */
  sortByColumn(col: number, ascending: boolean): SortResult | null {
    if (this.grid.isEmpty()) return null;

    this.commitEdit();
    this.saveUndoState('sort');
    const result = sortRows(this.grid.getRows(), {
      column: col,
      ascending,
      frozenHeader: this.frozenHeader,
    });
    this.grid.replaceAll(result.rows);
    this.search.clear();
    this.sortIndicator = { column: col, ascending };
    this.events.onChange?.('sort');
    return result;
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Search all cells and select the first match. Returns the match count.
   */
  find(query: string, caseSensitive: boolean = false): number {
    const results = this.search.performSearch(this.grid, query, { caseSensitive });
    const first = this.search.getCurrentResult();
    if (first) this.goToResult(first);
    return results.length;
  }

  findNext(): CellRef | null {
    const result = this.search.nextResult();
    if (result) this.goToResult(result);
    return result;
  }

  findPrevious(): CellRef | null {
    const result = this.search.prevResult();
    if (result) this.goToResult(result);
    return result;
  }

  getSearchResults(): CellRef[] {
    return this.search.getResults();
  }

  clearSearch(): void {
    this.search.clear();
  }

  private goToResult(cell: CellRef): void {
    this.commitEdit();
    this.selection.selectCell(cell, 'search');
  }

  // ===========================================================================
  // Document Lifecycle
  // ===========================================================================

  /**
   * Blank document with the configured extents.
   */
  newDocument(): void {
    this.grid.reset(this.config.defaultRows, this.config.defaultColumns);
    this.resetDocumentState(this.config.untitledName);
    this.events.onChange?.('new');
  }

  /**
   * Replace the document with `rows` (normalized to a rectangle).
   */
  loadRows(rows: ReadonlyGridRows, name: string = this.config.untitledName): void {
    this.grid.replaceAll(rows);
    this.resetDocumentState(name);
    this.events.onChange?.('load');
  }

  /**
   * Hand raw document bytes to the session; applied by the next pollDocument().
   */
  depositDocument(bytes: Uint8Array, name: string): void {
    this.mailbox.deposit(bytes, name);
  }

  hasPendingDocument(): boolean {
    return this.mailbox.hasPending();
  }

  /**
   * Apply a deposited document, if any. A document that cannot be decoded
   * leaves the current grid untouched.
   */
  pollDocument(): PollResult {
    const pending = this.mailbox.take();
    if (!pending) return { status: 'empty' };

    let rows: GridRows;
    try {
      rows = this.codec.decode(pending.bytes, pending.name);
    } catch (error) {
      const loadError = error instanceof DocumentLoadError
        ? error
        : new DocumentLoadError(
            error instanceof Error ? error.message : String(error),
            pending.name,
            { cause: error }
          );
      this.events.onLoadError?.(loadError);
      return { status: 'failed', error: loadError };
    }

    this.loadRows(rows, pending.name);
    return {
      status: 'loaded',
      name: pending.name,
      rowCount: this.grid.rowCount,
      columnCount: this.grid.columnCount,
    };
  }

  /**
   * Commit any in-flight edit and hand the rows to `sink`. The dirty flag is
   * cleared only when the sink succeeds; failures raise DocumentSaveError.
   */
  async save(sink: DocumentSink, name: string = this.documentName): Promise<void> {
    this.commitEdit();
    const rows = this.grid.toRows();

    try {
      await sink(rows, name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentSaveError(message, name, { cause: error });
    }

    this.documentName = name;
    this.setDirty(false);
  }

  private resetDocumentState(name: string): void {
    this.edit.reset();
    this.selection.clear();
    this.search.clear();
    this.history.clear();
    this.widths.clear();
    this.sortIndicator = null;
    this.documentName = name;
    this.setDirty(false);
  }

  // ===========================================================================
  // Dirty Flag
  // ===========================================================================

  private markDirty(): void {
    this.setDirty(true);
  }

  private setDirty(dirty: boolean): void {
    if (this.dirty === dirty) return;
    this.dirty = dirty;
    this.events.onDirtyChange?.(dirty);
  }
}

export function createTableSession(
  config?: TableSessionConfig,
  options?: TableSessionOptions
): TableSession {
  return new TableSession(config, options);
}
