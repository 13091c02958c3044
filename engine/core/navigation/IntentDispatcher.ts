/**
 * Tabula Engine - Intent Dispatcher
 *
 * Applies input intents to a table session. Mode rules live here:
 * - while editing, history, copy, cut and select-all are ignored
 * - while editing, paste and typed text go into the edit buffer
 * - while editing, Delete/Backspace erase from the buffer instead of the grid
 * - Enter only acts while editing
 */

import type { TableSession } from '../TableSession.js';
import type { TableIntent, StructureIntent } from './InputIntents.js';

export interface DispatchResult {
  /** The intent changed something */
  handled: boolean;
  /** Clipboard text produced by copy or cut */
  text?: string;
}

const HANDLED: DispatchResult = Object.freeze({ handled: true });
const IGNORED: DispatchResult = Object.freeze({ handled: false });

function result(handled: boolean): DispatchResult {
  return handled ? HANDLED : IGNORED;
}

/**
 * Apply one intent to the session.
 */
export function dispatchIntent(session: TableSession, intent: TableIntent): DispatchResult {
  const editing = session.isEditing();

  switch (intent.type) {
    case 'activateCell':
      session.activateCell({ row: intent.row, col: intent.col });
      return HANDLED;

    case 'dragTo':
      session.dragTo({ row: intent.row, col: intent.col });
      return HANDLED;

    case 'endDrag':
      session.endDrag();
      return HANDLED;

    case 'beginEdit':
      return result(session.beginEdit({ row: intent.row, col: intent.col }));

    case 'navigate':
      return result(session.navigate(intent.direction, intent.extend));

    case 'text':
      return result(session.typeText(intent.text));

    case 'confirm':
      return result(session.confirmEdit());

    case 'escape':
      return result(session.cancelEdit());

    case 'blur':
      return result(session.blur());

    case 'delete':
      return result(editing ? session.backspace() : session.deleteSelection());

    case 'clipboard':
      return dispatchClipboard(session, intent.action, intent.text, editing);

    case 'history':
      if (editing) return IGNORED;
      return result(intent.action === 'undo' ? session.undo() : session.redo());

    case 'selectAll':
      if (editing) return IGNORED;
      session.selectAll();
      return HANDLED;

    case 'selectRow':
      session.selectRow(intent.row);
      return HANDLED;

    case 'selectColumn':
      session.selectColumn(intent.col);
      return HANDLED;

    case 'find':
      session.find(intent.query, intent.caseSensitive ?? false);
      return HANDLED;

    case 'findStep': {
      const found = intent.direction === 'next' ? session.findNext() : session.findPrevious();
      return result(found !== null);
    }

    case 'structure':
      return result(applyStructure(session, intent));

    case 'append':
      if (intent.axis === 'row') {
        session.addRow();
      } else {
        session.addColumn();
      }
      return HANDLED;

    case 'sort':
      return result(session.sortByColumn(intent.column, intent.ascending) !== null);

    case 'clearCell':
      return result(session.clearCell({ row: intent.row, col: intent.col }));

    case 'resizeColumn':
      session.setColumnWidth(intent.col, intent.width);
      return HANDLED;

    case 'newDocument':
      session.newDocument();
      return HANDLED;
  }
}

function applyStructure(session: TableSession, intent: StructureIntent): boolean {
  switch (intent.action) {
    case 'insertRow':
      return session.insertRowAt(intent.index);
    case 'insertColumn':
      return session.insertColumnAt(intent.index);
    case 'deleteRow':
      return session.deleteRow(intent.index);
    case 'deleteColumn':
      return session.deleteColumn(intent.index);
  }
}

function dispatchClipboard(
  session: TableSession,
  action: 'copy' | 'cut' | 'paste',
  text: string | undefined,
  editing: boolean
): DispatchResult {
  if (editing) {
    if (action !== 'paste') return IGNORED;
    const pasted = text ?? session.readClipboardText();
    return result(pasted !== null && session.typeText(pasted));
  }

  switch (action) {
    case 'copy': {
      const copied = session.copy();
      return { handled: copied.length > 0, text: copied };
    }
    case 'cut':
      return { handled: true, text: session.cut() };
    case 'paste':
      return result(session.paste(text) !== null);
  }
}

/**
 * Bind a session into an intent listener, e.g. for KeyboardHandler.subscribe().
 */
export function createIntentDispatcher(
  session: TableSession,
  onResult?: (intent: TableIntent, result: DispatchResult) => void
): (intent: TableIntent) => void {
  return (intent: TableIntent) => {
    const outcome = dispatchIntent(session, intent);
    onResult?.(intent, outcome);
  };
}
