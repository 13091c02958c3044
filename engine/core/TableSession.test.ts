/**
 * TableSession Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TextEncoder } from 'node:util';
import { TableSession } from './TableSession.js';
import { MemoryClipboardTransport, type ClipboardTransport } from './clipboard/ClipboardManager.js';
import { DocumentLoadError, DocumentSaveError } from './document/errors.js';

const encoder = new TextEncoder();

const cell = (row: number, col: number) => ({
  kind: 'cellRange',
  start: { row, col },
  end: { row, col },
});

function isRectangular(session: TableSession): boolean {
  return session.getRows().every(row => row.length === session.columnCount);
}

describe('TableSession', () => {
  let session: TableSession;
  let transport: MemoryClipboardTransport;

  beforeEach(() => {
    transport = new MemoryClipboardTransport();
    session = new TableSession({ defaultRows: 3, defaultColumns: 3 }, { clipboard: transport });
  });

  // ===========================================================================
  // Initial State
  // ===========================================================================

  describe('initial state', () => {
    it('should start with a blank grid of the configured size', () => {
      expect(session.rowCount).toBe(3);
      expect(session.columnCount).toBe(3);
      expect(session.toRows()).toEqual([
        ['', '', ''],
        ['', '', ''],
        ['', '', ''],
      ]);
    });

    it('should start clean with nothing selected', () => {
      const state = session.getState();
      expect(state.dirty).toBe(false);
      expect(state.documentName).toBe('untitled');
      expect(state.selection).toEqual({ kind: 'none' });
      expect(state.editing).toBeNull();
      expect(state.sortIndicator).toBeNull();
      expect(state.history.undoCount).toBe(0);
    });

    it('should use the default extents without config', () => {
      const defaults = new TableSession();
      expect(defaults.rowCount).toBe(20);
      expect(defaults.columnCount).toBe(10);
      expect(defaults.getColumnWidth(0)).toBe(120);
    });
  });

  // ===========================================================================
  // Editing
  // ===========================================================================

  describe('editing', () => {
    it('should write the buffer on commit without a history snapshot', () => {
      session.beginEdit({ row: 0, col: 0 });
      session.typeText('hi');

      expect(session.commitEdit()).toBe(true);
      expect(session.getCell(0, 0)).toBe('hi');
      expect(session.isDirty()).toBe(true);
      expect(session.getHistoryState().undoCount).toBe(0);
    });

    it('should seed the buffer with the current cell text', () => {
      session.loadRows([['abc']]);
      session.beginEdit({ row: 0, col: 0 });

      expect(session.getEditSession()?.buffer).toBe('abc');
    });

    it('should clear the selection when an edit starts', () => {
      session.selectCell({ row: 1, col: 1 });
      session.beginEdit({ row: 0, col: 0 });

      expect(session.getSelection()).toEqual({ kind: 'none' });
    });

    it('should commit the previous edit when editing another cell', () => {
      session.beginEdit({ row: 0, col: 0 });
      session.typeText('first');
      session.beginEdit({ row: 1, col: 0 });

      expect(session.getCell(0, 0)).toBe('first');
      expect(session.getEditSession()?.cell).toEqual({ row: 1, col: 0 });
    });

    it('should refuse to edit a cell outside the grid', () => {
      expect(session.beginEdit({ row: 5, col: 0 })).toBe(false);
      expect(session.isEditing()).toBe(false);
    });

    it('should start an edit from typed text on a single selected cell', () => {
      session.loadRows([['old', '']]);
      session.selectCell({ row: 0, col: 0 });

      expect(session.typeText('n')).toBe(true);
      expect(session.getEditSession()?.buffer).toBe('n');
      expect(session.getSelection()).toEqual({ kind: 'none' });

      session.commitEdit();
      expect(session.getCell(0, 0)).toBe('n');
    });

    it('should ignore typed text without a single selected cell', () => {
      expect(session.typeText('x')).toBe(false);

      session.selectRange({ row: 0, col: 0 }, { row: 1, col: 1 });
      expect(session.typeText('x')).toBe(false);
      expect(session.isEditing()).toBe(false);
    });

    it('should move down after confirming', () => {
      session.beginEdit({ row: 0, col: 2 });
      session.typeText('v');
      session.confirmEdit();

      expect(session.getCell(0, 2)).toBe('v');
      expect(session.getSelection()).toEqual(cell(1, 2));
    });

    it('should stay on the last row after confirming there', () => {
      session.beginEdit({ row: 2, col: 1 });
      session.confirmEdit();

      expect(session.getSelection()).toEqual(cell(2, 1));
    });

    it('should discard the buffer and the selection on cancel', () => {
      session.loadRows([['keep', '']]);
      session.beginEdit({ row: 0, col: 0 });
      session.setEditBuffer('lost');

      expect(session.cancelEdit()).toBe(true);
      expect(session.getCell(0, 0)).toBe('keep');
      expect(session.isEditing()).toBe(false);
      expect(session.isDirty()).toBe(false);
    });

    it('should clear the selection on cancel when not editing', () => {
      session.selectCell({ row: 1, col: 1 });

      expect(session.cancelEdit()).toBe(true);
      expect(session.getSelection()).toEqual({ kind: 'none' });
      expect(session.cancelEdit()).toBe(false);
    });

    it('should commit on blur', () => {
      session.beginEdit({ row: 1, col: 1 });
      session.typeText('z');

      expect(session.blur()).toBe(true);
      expect(session.getCell(1, 1)).toBe('z');
    });

    it('should edit the buffer with backspace', () => {
      session.beginEdit({ row: 0, col: 0 });
      session.typeText('ab');
      session.backspace();
      session.commitEdit();

      expect(session.getCell(0, 0)).toBe('a');
      expect(session.backspace()).toBe(false);
    });

    it('should report commits', () => {
      const onCommit = vi.fn();
      session.setEventHandlers({ onCommit });

      session.beginEdit({ row: 0, col: 1 });
      session.typeText('q');
      session.commitEdit();

      expect(onCommit).toHaveBeenCalledWith({ cell: { row: 0, col: 1 }, value: 'q', changed: true });
    });
  });

  // ===========================================================================
  // Selection
  // ===========================================================================

  describe('selection', () => {
    it('should navigate from the origin when nothing is selected', () => {
      expect(session.navigate('right')).toBe(true);
      expect(session.getSelection()).toEqual(cell(0, 1));
    });

    it('should extend a range with shift navigation', () => {
      session.selectCell({ row: 1, col: 1 });
      session.navigate('down', true);

      expect(session.getSelection()).toEqual({
        kind: 'cellRange',
        start: { row: 1, col: 1 },
        end: { row: 2, col: 1 },
      });
    });

    it('should report no movement at the grid edge', () => {
      session.selectCell({ row: 0, col: 0 });
      expect(session.navigate('up')).toBe(false);
    });

    it('should ignore navigation while editing', () => {
      session.beginEdit({ row: 0, col: 0 });

      expect(session.navigate('down')).toBe(false);
      expect(session.isEditing()).toBe(true);
    });

    it('should build a range while dragging', () => {
      session.activateCell({ row: 0, col: 0 });
      session.dragTo({ row: 1, col: 2 });
      session.endDrag();
      session.dragTo({ row: 2, col: 2 });

      expect(session.getSelection()).toEqual({
        kind: 'cellRange',
        start: { row: 0, col: 0 },
        end: { row: 1, col: 2 },
      });
    });

    it('should commit an edit when a cell is activated', () => {
      session.beginEdit({ row: 0, col: 0 });
      session.typeText('k');
      session.activateCell({ row: 1, col: 1 });

      expect(session.getCell(0, 0)).toBe('k');
      expect(session.getSelection()).toEqual(cell(1, 1));
    });

    it('should select the whole grid', () => {
      session.selectAll();

      expect(session.getSelection()).toEqual({
        kind: 'cellRange',
        start: { row: 0, col: 0 },
        end: { row: 2, col: 2 },
      });
    });

    it('should not select all while editing', () => {
      session.beginEdit({ row: 0, col: 0 });
      session.selectAll();

      expect(session.getSelection()).toEqual({ kind: 'none' });
    });

    it('should report selection changes', () => {
      const onSelectionChange = vi.fn();
      session.setEventHandlers({ onSelectionChange });

      session.selectRow(2);

      expect(onSelectionChange).toHaveBeenCalledWith({ kind: 'row', row: 2 });
    });
  });

  // ===========================================================================
  // Deleting Content
  // ===========================================================================

  describe('deleteSelection', () => {
    beforeEach(() => {
      session.loadRows([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    it('should blank a selected row', () => {
      session.selectRow(0);

      expect(session.deleteSelection()).toBe(true);
      expect(session.toRows()).toEqual([
        ['', ''],
        ['c', 'd'],
      ]);
      expect(session.getHistoryState().undoCount).toBe(1);
    });

    it('should do nothing without a selection', () => {
      expect(session.deleteSelection()).toBe(false);
      expect(session.getHistoryState().undoCount).toBe(0);
    });

    it('should blank a single cell', () => {
      expect(session.clearCell({ row: 1, col: 1 })).toBe(true);
      expect(session.getCell(1, 1)).toBe('');
      expect(session.clearCell({ row: 4, col: 0 })).toBe(false);
    });

    it('should commit an open edit before blanking a cell', () => {
      session.loadRows([['a', 'b']]);
      session.beginEdit({ row: 0, col: 0 });
      session.setEditBuffer('x');

      expect(session.clearCell({ row: 0, col: 1 })).toBe(true);
      expect(session.isEditing()).toBe(false);
      expect(session.toRows()).toEqual([['x', '']]);

      session.undo();
      expect(session.toRows()).toEqual([['x', 'b']]);
    });
  });

  // ===========================================================================
  // Clipboard
  // ===========================================================================

  describe('clipboard', () => {
    it('should copy a range as tab-separated lines', () => {
      session.loadRows([
        ['a', 'b'],
        ['c', 'd'],
      ]);
      session.selectRange({ row: 0, col: 0 }, { row: 1, col: 1 });

      expect(session.copy()).toBe('a\tb\nc\td');
      expect(transport.readText()).toBe('a\tb\nc\td');
      expect(session.getHistoryState().undoCount).toBe(0);
    });

    it('should cut a column and undo it', () => {
      session.loadRows([
        ['a', 'b'],
        ['c', 'd'],
      ]);
      session.selectColumn(1);

      expect(session.cut()).toBe('b\nd');
      expect(session.toRows()).toEqual([
        ['a', ''],
        ['c', ''],
      ]);
      expect(transport.readText()).toBe('b\nd');

      session.undo();
      expect(session.toRows()).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    it('should snapshot on cut even without a selection', () => {
      expect(session.cut()).toBe('');
      expect(session.getHistoryState().undoCount).toBe(1);
    });

    it('should paste at the selection and grow the grid', () => {
      session.loadRows([['a', 'b']]);
      session.selectCell({ row: 0, col: 1 });

      const result = session.paste('x\ty\nz');

      expect(session.toRows()).toEqual([
        ['a', 'x', 'y'],
        ['', 'z', ''],
      ]);
      expect(result?.rowsAdded).toBe(1);
      expect(result?.cellCount).toBe(3);
      expect(isRectangular(session)).toBe(true);
    });

    it('should paste from the clipboard transport', () => {
      transport.writeText('q');
      session.selectCell({ row: 1, col: 1 });

      expect(session.paste()?.cellCount).toBe(1);
      expect(session.getCell(1, 1)).toBe('q');
    });

    it('should paste nothing from an empty clipboard', () => {
      expect(session.paste()).toBeNull();
      expect(session.getHistoryState().undoCount).toBe(0);
    });

    it('should not paste into the grid while editing', () => {
      session.beginEdit({ row: 0, col: 0 });

      expect(session.paste('x')).toBeNull();
      expect(session.getCell(0, 0)).toBe('');
    });

    it('should still copy when the transport fails', () => {
      const failing: ClipboardTransport = {
        readText: () => null,
        writeText: () => {
          throw new Error('denied');
        },
      };
      const onTransportError = vi.fn();
      const withFailing = new TableSession({}, { clipboard: failing });
      withFailing.setEventHandlers({ onTransportError });
      withFailing.loadRows([['v']]);
      withFailing.selectCell({ row: 0, col: 0 });

      expect(withFailing.copy()).toBe('v');
      expect(onTransportError).toHaveBeenCalledWith(expect.any(Error), 'write');
    });
  });

  // ===========================================================================
  // History
  // ===========================================================================

  describe('undo and redo', () => {
    it('should step through snapshots in both directions', () => {
      session.loadRows([['a']]);
      session.paste('b');
      session.addColumn();

      expect(session.toRows()).toEqual([['b', '']]);

      session.undo();
      expect(session.toRows()).toEqual([['b']]);
      session.undo();
      expect(session.toRows()).toEqual([['a']]);
      session.redo();
      expect(session.toRows()).toEqual([['b']]);
    });

    it('should discard redo history on a new mutation', () => {
      session.loadRows([['a']]);
      session.paste('b');
      session.undo();
      session.clearCell({ row: 0, col: 0 });

      expect(session.getHistoryState().canRedo).toBe(false);
      expect(session.redo()).toBe(false);
    });

    it('should commit an open edit before undoing', () => {
      session.loadRows([['a']]);
      session.paste('b');
      session.beginEdit({ row: 0, col: 0 });
      session.setEditBuffer('c');

      expect(session.undo()).toBe(true);
      expect(session.isEditing()).toBe(false);
      expect(session.toRows()).toEqual([['a']]);

      session.redo();
      expect(session.toRows()).toEqual([['c']]);
    });

    it('should commit an open edit before redoing', () => {
      session.loadRows([['a'], ['b']]);
      session.deleteRow(0);
      session.undo();
      session.beginEdit({ row: 1, col: 0 });
      session.setEditBuffer('z');

      expect(session.redo()).toBe(true);
      expect(session.isEditing()).toBe(false);
      expect(session.toRows()).toEqual([['b']]);

      session.undo();
      expect(session.toRows()).toEqual([['a'], ['z']]);
    });

    it('should report nothing to undo', () => {
      expect(session.undo()).toBe(false);
    });

    it('should cap the history at 50 snapshots', () => {
      for (let i = 0; i < 51; i++) {
        session.saveUndoState();
      }
      expect(session.getHistoryState().undoCount).toBe(50);
    });

    it('should mark the document dirty after undo', () => {
      session.saveUndoState();
      session.loadRows([['x']]);
      session.paste('y');
      session.undo();

      expect(session.isDirty()).toBe(true);
      expect(session.toRows()).toEqual([['x']]);
    });
  });

  // ===========================================================================
  // Structure
  // ===========================================================================

  describe('structural edits', () => {
    it('should insert a column and move widths with it', () => {
      session.loadRows([
        ['a', 'b'],
        ['c', 'd'],
      ]);
      session.setColumnWidth(1, 80);
      session.insertColumnAt(1);

      expect(session.toRows()).toEqual([
        ['a', '', 'b'],
        ['c', '', 'd'],
      ]);
      expect(session.getColumnWidth(2)).toBe(80);
      expect(session.getColumnWidth(1)).toBe(120);
    });

    it('should drop the width of a deleted column', () => {
      session.setColumnWidth(0, 50);
      session.setColumnWidth(2, 70);
      session.deleteColumn(0);

      expect(session.getColumnWidths()).toEqual([[1, 70]]);
    });

    it('should keep the edit on its cell when rows move', () => {
      session.loadRows([['a'], ['b'], ['c']]);
      session.beginEdit({ row: 1, col: 0 });
      session.typeText('!');
      session.insertRowAt(0);

      expect(session.getEditSession()?.cell).toEqual({ row: 2, col: 0 });

      session.commitEdit();
      expect(session.toRows()).toEqual([[''], ['a'], ['b!'], ['c']]);
    });

    it('should end the edit when its row is deleted', () => {
      session.loadRows([['a'], ['b'], ['c']]);
      session.beginEdit({ row: 1, col: 0 });
      session.deleteRow(1);

      expect(session.isEditing()).toBe(false);
      expect(session.toRows()).toEqual([['a'], ['c']]);
    });

    it('should ignore out-of-range positions', () => {
      expect(session.insertRowAt(9)).toBe(false);
      expect(session.deleteColumn(3)).toBe(false);
      expect(session.getHistoryState().undoCount).toBe(0);
    });

    it('should append rows and columns', () => {
      session.addRow();
      session.addColumn();

      expect(session.rowCount).toBe(4);
      expect(session.columnCount).toBe(4);
      expect(isRectangular(session)).toBe(true);
      expect(session.getHistoryState().undoCount).toBe(2);
    });
  });

  // ===========================================================================
  // Sort
  // ===========================================================================

  describe('sortByColumn', () => {
    it('should commit an open edit to its row before sorting', () => {
      session.loadRows([
        ['c', '3'],
        ['a', '1'],
        ['b', '2'],
      ]);
      session.beginEdit({ row: 0, col: 1 });
      session.setEditBuffer('30');
      session.sortByColumn(0, true);
      session.commitEdit();

      expect(session.isEditing()).toBe(false);
      expect(session.toRows()).toEqual([
        ['a', '1'],
        ['b', '2'],
        ['c', '30'],
      ]);

      session.undo();
      expect(session.toRows()).toEqual([
        ['c', '30'],
        ['a', '1'],
        ['b', '2'],
      ]);
    });

    it('should sort rows and set the indicator', () => {
      session.loadRows([['3'], ['1'], ['2']]);
      session.sortByColumn(0, true);

      expect(session.toRows()).toEqual([['1'], ['2'], ['3']]);
      expect(session.getSortIndicator()).toEqual({ column: 0, ascending: true });
    });

    it('should compare mixed values pairwise', () => {
      session.loadRows([['b'], ['a'], ['10'], ['2']]);
      session.sortByColumn(0, true);

      expect(session.toRows()).toEqual([['2'], ['10'], ['a'], ['b']]);
    });

    it('should restore the order and clear the indicator on undo', () => {
      session.loadRows([['2', 'x'], ['1', 'y']]);
      session.sortByColumn(0, true);
      session.undo();

      expect(session.toRows()).toEqual([['2', 'x'], ['1', 'y']]);
      expect(session.getSortIndicator()).toBeNull();
    });

    it('should clear the indicator only when the sorted column changes', () => {
      session.loadRows([['2', 'x'], ['1', 'y']]);
      session.sortByColumn(0, true);

      session.beginEdit({ row: 0, col: 1 });
      session.setEditBuffer('z');
      session.commitEdit();
      expect(session.getSortIndicator()).not.toBeNull();

      session.beginEdit({ row: 0, col: 0 });
      session.commitEdit();
      expect(session.getSortIndicator()).not.toBeNull();

      session.beginEdit({ row: 0, col: 0 });
      session.setEditBuffer('5');
      session.commitEdit();
      expect(session.getSortIndicator()).toBeNull();
    });

    it('should clear the indicator on structural edits', () => {
      session.loadRows([['2'], ['1']]);
      session.sortByColumn(0, false);
      session.addRow();

      expect(session.getSortIndicator()).toBeNull();
    });

    it('should keep a frozen header row on top', () => {
      const withHeader = new TableSession({ frozenHeader: true });
      withHeader.loadRows([['name'], ['b'], ['a']]);
      withHeader.sortByColumn(0, true);

      expect(withHeader.toRows()).toEqual([['name'], ['a'], ['b']]);
    });

    it('should do nothing on an empty grid', () => {
      session.loadRows([]);

      expect(session.sortByColumn(0, true)).toBeNull();
      expect(session.getHistoryState().undoCount).toBe(0);
    });
  });

  // ===========================================================================
  // Search
  // ===========================================================================

  describe('search', () => {
    beforeEach(() => {
      session.loadRows([
        ['x', 'a'],
        ['x', 'x'],
      ]);
    });

    it('should select the first match', () => {
      expect(session.find('X')).toBe(3);
      expect(session.getSelection()).toEqual(cell(0, 0));
    });

    it('should cycle through matches', () => {
      session.find('x');

      expect(session.findNext()).toEqual({ row: 1, col: 0 });
      expect(session.getSelection()).toEqual(cell(1, 0));
      expect(session.findPrevious()).toEqual({ row: 0, col: 0 });
      expect(session.findPrevious()).toEqual({ row: 1, col: 1 });
    });

    it('should leave the selection alone without matches', () => {
      session.selectCell({ row: 1, col: 1 });

      expect(session.find('zzz')).toBe(0);
      expect(session.findNext()).toBeNull();
      expect(session.getSelection()).toEqual(cell(1, 1));
    });

    it('should commit an edit when moving to a match', () => {
      session.find('x');
      session.beginEdit({ row: 0, col: 1 });
      session.setEditBuffer('q');
      session.findNext();

      expect(session.getCell(0, 1)).toBe('q');
      expect(session.isEditing()).toBe(false);
    });

    it('should forget matches when rows are deleted', () => {
      session.find('x');
      session.deleteRow(1);

      expect(session.getSearchResults()).toEqual([]);
      expect(session.findNext()).toBeNull();
      expect(session.getSelection()).toEqual(cell(0, 0));
    });

    it('should forget matches after a sort or undo', () => {
      session.find('x');
      session.sortByColumn(1, true);
      expect(session.getSearchResults()).toEqual([]);

      session.find('x');
      session.undo();
      expect(session.getSearchResults()).toEqual([]);
      expect(session.findPrevious()).toBeNull();
    });

    it('should forget matches when a document is loaded', () => {
      session.find('x');
      session.loadRows([['x']]);

      expect(session.getSearchResults()).toEqual([]);
      expect(session.findNext()).toBeNull();
    });
  });

  // ===========================================================================
  // Documents
  // ===========================================================================

  describe('documents', () => {
    it('should load a deposited document on poll', () => {
      session.addRow();
      session.depositDocument(encoder.encode('a\tb\nc\n'), 'data.tsv');

      expect(session.hasPendingDocument()).toBe(true);
      expect(session.pollDocument()).toEqual({
        status: 'loaded',
        name: 'data.tsv',
        rowCount: 2,
        columnCount: 2,
      });
      expect(session.toRows()).toEqual([
        ['a', 'b'],
        ['c', ''],
      ]);
      expect(session.isDirty()).toBe(false);
      expect(session.getDocumentName()).toBe('data.tsv');
      expect(session.getHistoryState().undoCount).toBe(0);
      expect(session.pollDocument()).toEqual({ status: 'empty' });
    });

    it('should keep the grid when a deposit cannot be decoded', () => {
      const onLoadError = vi.fn();
      session.setEventHandlers({ onLoadError });
      session.loadRows([['keep']]);
      session.depositDocument(Uint8Array.of(0xff, 0xfe), 'bad.tsv');

      const result = session.pollDocument();

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(DocumentLoadError);
        expect(result.error.message).toBe('Cannot load bad.tsv: not valid UTF-8 text');
      }
      expect(onLoadError).toHaveBeenCalledTimes(1);
      expect(session.toRows()).toEqual([['keep']]);
    });

    it('should hand committed rows to the save sink', async () => {
      const sink = vi.fn();
      session.beginEdit({ row: 0, col: 0 });
      session.typeText('v');

      await session.save(sink, 'out.tsv');

      expect(sink).toHaveBeenCalledWith(
        [
          ['v', '', ''],
          ['', '', ''],
          ['', '', ''],
        ],
        'out.tsv'
      );
      expect(session.isDirty()).toBe(false);
      expect(session.isEditing()).toBe(false);
      expect(session.getDocumentName()).toBe('out.tsv');
    });

    it('should stay dirty when the save sink fails', async () => {
      session.addRow();
      const sink = async (): Promise<void> => {
        throw new Error('disk full');
      };

      const saving = session.save(sink, 'x.tsv');

      await expect(saving).rejects.toBeInstanceOf(DocumentSaveError);
      await expect(saving).rejects.toThrow('Cannot save x.tsv: disk full');
      expect(session.isDirty()).toBe(true);
      expect(session.getDocumentName()).toBe('untitled');
    });

    it('should reset everything for a new document', () => {
      session.loadRows([['a']], 'a.tsv');
      session.paste('b');
      session.setColumnWidth(0, 60);
      session.newDocument();

      const state = session.getState();
      expect(state.rowCount).toBe(3);
      expect(state.columnCount).toBe(3);
      expect(state.documentName).toBe('untitled');
      expect(state.dirty).toBe(false);
      expect(state.history.canUndo).toBe(false);
      expect(session.getColumnWidth(0)).toBe(120);
    });

    it('should report dirty transitions once each', () => {
      const onDirtyChange = vi.fn();
      session.setEventHandlers({ onDirtyChange });

      session.beginEdit({ row: 0, col: 0 });
      session.commitEdit();
      session.beginEdit({ row: 0, col: 1 });
      session.commitEdit();
      session.loadRows([['x']]);

      expect(onDirtyChange.mock.calls).toEqual([[true], [false]]);
    });
  });

  // ===========================================================================
  // Grid Shape
  // ===========================================================================

  it('should stay rectangular through a mixed sequence of operations', () => {
    session.loadRows([['a'], ['b', 'c', 'd'], []]);
    expect(isRectangular(session)).toBe(true);

    session.selectCell({ row: 2, col: 2 });
    session.paste('1\t2\t3\n4');
    expect(isRectangular(session)).toBe(true);

    session.deleteColumn(1);
    session.insertRowAt(1);
    session.sortByColumn(0, false);
    session.undo();
    expect(isRectangular(session)).toBe(true);
    expect(session.columnCount).toBe(4);
  });
});
