/**
 * Tabula Headless Harness - Runner
 *
 * Executes parsed commands against a TableSession and produces structured
 * output. Only LOAD, SAVE and SLEEP do asynchronous work.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { TableSession } from '../core/TableSession.js';
import {
  DIRECTION_DELTAS,
  columnLabel,
  type CellRef,
  type Direction,
  type GridRows,
  type ReadonlyGridRows,
} from '../core/types/index.js';
import { MemoryClipboardTransport } from '../core/clipboard/ClipboardManager.js';
import { TsvDocumentCodec } from '../core/document/TsvDocumentCodec.js';
import { DocumentLoadError } from '../core/document/errors.js';
import { compareCellText } from '../core/operations/Sorter.js';
import { cornersToRange, describeSelection, normalizedBounds } from '../core/selection/Selection.js';
import { KeyboardHandler, keyEventFromDescriptor } from '../core/navigation/KeyboardHandler.js';
import { dispatchIntent, type DispatchResult } from '../core/navigation/IntentDispatcher.js';
import type { TableIntent } from '../core/navigation/InputIntents.js';
import {
  CommandParser,
  ParseError,
  parseA1Range,
  parseA1Reference,
  parseColumnRef,
  parseRowRef,
  toA1Reference,
} from './CommandParser.js';
import { formatOutput } from './OutputFormatter.js';
import {
  DEFAULT_CONFIG,
  type AssertOutput,
  type CellChange,
  type EchoOutput,
  type ErrorKind,
  type ErrorOutput,
  type HarnessConfig,
  type InfoOutput,
  type Output,
  type ParsedCommand,
  type ResultOutput,
  type SnapshotOutput,
  type StatsOutput,
  type TableOutput,
  type ValueOutput,
} from './types.js';

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Error thrown when a command exceeds its timeout.
 */
export class CommandTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// Document Storage
// =============================================================================

/**
 * Byte storage behind LOAD and SAVE.
 */
export interface DocumentStore {
  read(path: string): Promise<Uint8Array>;
  write(path: string, bytes: Uint8Array): Promise<void>;
}

/**
 * Files on disk, with relative paths resolved against `baseDir`.
 */
export function createFileDocumentStore(baseDir: string): DocumentStore {
  return {
    read: path => readFile(resolve(baseDir, path)),
    write: (path, bytes) => writeFile(resolve(baseDir, path), bytes),
  };
}

export interface HarnessRunnerOptions {
  /** Storage for LOAD and SAVE (default: files under config.baseDir) */
  documents?: DocumentStore;
}

// =============================================================================
// Helpers
// =============================================================================

function isDirection(value: string): value is Direction {
  return Object.hasOwn(DIRECTION_DELTAS, value);
}

/**
 * Cell-by-cell differences between two grids. Cells present on one side
 * only are reported with null on the other.
 */
export function diffRows(before: ReadonlyGridRows, after: ReadonlyGridRows): CellChange[] {
  const changes: CellChange[] = [];
  const rowCount = Math.max(before.length, after.length);
  const columnCount = Math.max(before[0]?.length ?? 0, after[0]?.length ?? 0);

  for (let row = 0; row < rowCount; row++) {
    for (let col = 0; col < columnCount; col++) {
      const was = before[row]?.[col] ?? null;
      const now = after[row]?.[col] ?? null;
      if (was !== now) {
        changes.push({ row, col, address: toA1Reference(row, col), before: was, after: now });
      }
    }
  }

  return changes;
}

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private session: TableSession;
  private clipboard = new MemoryClipboardTransport();
  private readonly codec = new TsvDocumentCodec();
  private readonly keyboard = new KeyboardHandler();
  private readonly parser = new CommandParser();
  private readonly documents: DocumentStore;

  // Grid as of the last SNAPSHOT or DIFF
  private lastSnapshot: GridRows = [];
  private expectError: boolean = false;

  // === Safety state ===
  /** Abort controller for cancellation */
  private abortController: AbortController | null = null;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void,
    options: HarnessRunnerOptions = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);
    this.documents = options.documents ?? createFileDocumentStore(this.config.baseDir);
    this.session = this.createSession();
    this.takeSnapshot();
  }

  private createSession(): TableSession {
    const session = new TableSession(
      { defaultRows: this.config.defaultRows, defaultColumns: this.config.defaultColumns },
      { clipboard: this.clipboard, codec: this.codec }
    );

    if (this.config.verbose) {
      session.setEventHandlers({
        onChange: reason => console.error(`[session] ${reason}`),
        onDirtyChange: dirty => console.error(`[session] dirty=${dirty}`),
      });
    }

    return session;
  }

  /**
   * The session commands run against. Replaced by RESET.
   */
  getSession(): TableSession {
    return this.session;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command with timeout protection.
   * This is the primary async entry point for command execution.
   */
  async execute(cmd: ParsedCommand): Promise<Output> {
    if (this.abortController?.signal.aborted) {
      return this.createSafetyError('Script aborted', 'ScriptAborted', cmd);
    }

    try {
      if (this.config.echoCommands) {
        this.emit(this.createEcho(cmd.raw, cmd));
      }

      const result = await this.executeWithTimeout(cmd);

      if (this.expectError && cmd.type !== 'ASSERT_ERROR') {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd);
      }

      return result;
    } catch (error) {
      if (this.expectError) {
        this.expectError = false;
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      return this.createError(err.message, cmd, err.stack);
    }
  }

  /**
   * Execute a command with timeout wrapper.
   * @internal
   */
  private async executeWithTimeout(cmd: ParsedCommand): Promise<Output> {
    const timeoutMs = this.config.commandTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CommandTimeoutError(cmd.raw, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.executeCommand(cmd), timeoutPromise]);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        return this.createSafetyError(error.message, 'CommandTimeout', cmd);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  async executeAll(commands: ParsedCommand[]): Promise<Output[]> {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.abortController = new AbortController();
    this.isExecuting = true;

    const stop = (output: Output): void => {
      outputs.push(output);
      this.emit(output);
    };

    try {
      for (const cmd of commands) {
        if (this.abortController.signal.aborted) {
          stop(this.createSafetyError('Script aborted', 'ScriptAborted', cmd));
          break;
        }

        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          stop(this.createSafetyError(
            `Step limit exceeded: ${this.stepCount} steps (max: ${this.config.maxStepsPerScript})`,
            'StepLimitExceeded',
            cmd
          ));
          break;
        }

        const output = await this.execute(cmd);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error') {
          if (output.errorType === 'CommandTimeout' && !this.config.continueOnTimeout) {
            break;
          }
          if (this.config.stopOnError) {
            break;
          }
        }

        if (cmd.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
      this.abortController = null;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private async executeCommand(cmd: ParsedCommand): Promise<Output> {
    switch (cmd.type) {
      // Document
      case 'NEW': return this.cmdNew(cmd);
      case 'LOAD': return await this.cmdLoad(cmd);
      case 'SAVE': return await this.cmdSave(cmd);

      // Cells
      case 'SET': return this.cmdSet(cmd);
      case 'GET': return this.cmdGet(cmd);
      case 'CLEAR_CELL': return this.cmdClearCell(cmd);

      // Selection
      case 'SELECT': return this.cmdSelect(cmd);
      case 'SELECT_ROW': return this.cmdSelectRow(cmd);
      case 'SELECT_COL': return this.cmdSelectCol(cmd);
      case 'SELECT_ALL':
        this.session.selectAll();
        return this.selectionResult(true, cmd);
      case 'GET_SELECTION': return this.cmdGetSelection(cmd);
      case 'MOVE': return this.cmdMove(cmd);
      case 'DRAG': return this.cmdDrag(cmd);

      // Editing
      case 'EDIT': return this.cmdEdit(cmd);
      case 'TYPE': return this.cmdType(cmd);
      case 'KEY': return this.cmdKey(cmd);
      case 'COMMIT': return this.createResult(this.session.commitEdit(), undefined, cmd);
      case 'CONFIRM': return this.dispatchWithSelection({ type: 'confirm' }, cmd);
      case 'CANCEL': return this.dispatchWithSelection({ type: 'escape' }, cmd);
      case 'DELETE': return this.dispatchWithSelection({ type: 'delete' }, cmd);

      // Clipboard
      case 'COPY': return this.cmdClipboard('copy', cmd);
      case 'CUT': return this.cmdClipboard('cut', cmd);
      case 'PASTE': return this.cmdClipboard('paste', cmd);

      // History
      case 'UNDO': return this.cmdHistory('undo', cmd);
      case 'REDO': return this.cmdHistory('redo', cmd);

      // Structure
      case 'INSERT_ROW': return this.structureResult(this.session.insertRowAt(this.requireRow(cmd)), cmd);
      case 'INSERT_COL': return this.structureResult(this.session.insertColumnAt(this.requireColumn(cmd)), cmd);
      case 'DELETE_ROW': return this.structureResult(this.session.deleteRow(this.requireRow(cmd)), cmd);
      case 'DELETE_COL': return this.structureResult(this.session.deleteColumn(this.requireColumn(cmd)), cmd);
      case 'ADD_ROW':
        this.session.addRow();
        return this.structureResult(true, cmd);
      case 'ADD_COL':
        this.session.addColumn();
        return this.structureResult(true, cmd);
      case 'WIDTH': return this.cmdWidth(cmd);
      case 'FREEZE': return this.cmdFreeze(cmd);

      // Sort / search
      case 'SORT': return this.cmdSort(cmd);
      case 'FIND': return this.cmdFind(cmd);
      case 'NEXT': return this.dispatchWithSelection({ type: 'findStep', direction: 'next' }, cmd);
      case 'PREV': return this.dispatchWithSelection({ type: 'findStep', direction: 'previous' }, cmd);

      // State inspection
      case 'SNAPSHOT': return this.cmdSnapshot(cmd);
      case 'DIFF': return this.cmdDiff(cmd);
      case 'STATS': return this.cmdStats(cmd);
      case 'DUMP': return this.cmdDump(cmd);

      // Utility
      case 'ECHO': return this.createEcho(cmd.args.join(' '), cmd);
      case 'SLEEP': return await this.cmdSleep(cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR':
        this.expectError = true;
        return this.createInfo('Expecting error on next command', cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.createInfo('Quitting', cmd);
    }
  }

  // ===========================================================================
  // Argument Helpers
  // ===========================================================================

  private requireArg(cmd: ParsedCommand, index: number, what: string): string {
    const value = cmd.args[index];
    if (value === undefined) throw new Error(`${cmd.type} requires ${what}`);
    return value;
  }

  private requireCell(cmd: ParsedCommand, index: number = 0): CellRef {
    const ref = this.requireArg(cmd, index, 'a cell reference');
    const cell = parseA1Reference(ref);
    if (!cell) throw new Error(`Invalid cell reference: ${ref}`);
    return cell;
  }

  private requireRow(cmd: ParsedCommand): number {
    const ref = this.requireArg(cmd, 0, 'a row number');
    const row = parseRowRef(ref);
    if (row === null) throw new Error(`Invalid row: ${ref}`);
    return row;
  }

  private requireColumn(cmd: ParsedCommand): number {
    const ref = this.requireArg(cmd, 0, 'a column letter');
    const col = parseColumnRef(ref);
    if (col === null) throw new Error(`Invalid column: ${ref}`);
    return col;
  }

  private describeSelection(): string {
    return describeSelection(this.session.getSelection(), columnLabel);
  }

  // ===========================================================================
  // Document Commands
  // ===========================================================================

  private cmdNew(cmd: ParsedCommand): Output {
    this.session.newDocument();
    return this.structureResult(true, cmd);
  }

  private async cmdLoad(cmd: ParsedCommand): Promise<Output> {
    const path = this.requireArg(cmd, 0, 'a path');

    let bytes: Uint8Array;
    try {
      bytes = await this.documents.read(path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentLoadError(message, path, { cause: error });
    }

    this.session.depositDocument(bytes, path);
    const poll = this.session.pollDocument();
    if (poll.status === 'failed') throw poll.error;
    if (poll.status === 'empty') throw new DocumentLoadError('nothing was deposited', path);

    return this.createResult(true, {
      name: poll.name,
      rowCount: poll.rowCount,
      columnCount: poll.columnCount,
    }, cmd);
  }

  private async cmdSave(cmd: ParsedCommand): Promise<Output> {
    const name = cmd.args[0] ?? this.session.getDocumentName();

    await this.session.save(
      (rows, target) => this.documents.write(target, this.codec.encode(rows)),
      name
    );

    return this.createResult(true, {
      name,
      rowCount: this.session.rowCount,
      columnCount: this.session.columnCount,
    }, cmd);
  }

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  /**
   * Write a cell the way a user would: begin an edit, replace the buffer,
   * commit.
   */
  private cmdSet(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd);
    const value = cmd.args.slice(1).join(' ');

    this.session.commitEdit();
    if (!this.session.beginEdit(cell)) {
      throw new Error(`Cell out of range: ${cmd.args[0]}`);
    }
    this.session.setEditBuffer(value);
    this.session.commitEdit();

    return this.createResult(true, { cell: toA1Reference(cell.row, cell.col), value }, cmd);
  }

  private cmdGet(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd);
    return this.createValue(cell, this.session.getCell(cell.row, cell.col), cmd);
  }

  private cmdClearCell(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd);
    const cleared = this.session.clearCell(cell);
    return this.createResult(cleared, { cell: toA1Reference(cell.row, cell.col) }, cmd);
  }

  // ===========================================================================
  // Selection Commands
  // ===========================================================================

  private cmdSelect(cmd: ParsedCommand): Output {
    const ref = this.requireArg(cmd, 0, 'a cell or range');
    const range = parseA1Range(ref);
    if (!range) throw new Error(`Invalid range: ${ref}`);

    this.session.selectRange(range.start, range.end);
    return this.selectionResult(true, cmd);
  }

  private cmdSelectRow(cmd: ParsedCommand): Output {
    this.session.selectRow(this.requireRow(cmd));
    return this.selectionResult(true, cmd);
  }

  private cmdSelectCol(cmd: ParsedCommand): Output {
    this.session.selectColumn(this.requireColumn(cmd));
    return this.selectionResult(true, cmd);
  }

  private cmdGetSelection(cmd: ParsedCommand): Output {
    const selection = this.session.getSelection();
    return this.createResult(true, {
      selection: this.describeSelection(),
      kind: selection.kind,
      bounds: normalizedBounds(selection, this.session),
    }, cmd);
  }

  private cmdMove(cmd: ParsedCommand): Output {
    const direction = this.requireArg(cmd, 0, 'a direction').toLowerCase();
    if (!isDirection(direction)) throw new Error(`Invalid direction: ${cmd.args[0]}`);

    const extend = cmd.args[1]?.toLowerCase() === 'extend' || cmd.options.extend === true;
    return this.selectionResult(this.session.navigate(direction, extend), cmd);
  }

  /**
   * Press on one cell, drag to another, release.
   */
  private cmdDrag(cmd: ParsedCommand): Output {
    const from = this.requireCell(cmd, 0);
    const to = this.requireCell(cmd, 1);

    this.session.activateCell(from);
    this.session.dragTo(to);
    this.session.endDrag();
    return this.selectionResult(true, cmd);
  }

  private selectionResult(success: boolean, cmd: ParsedCommand): ResultOutput {
    return this.createResult(success, { selection: this.describeSelection() }, cmd);
  }

  // ===========================================================================
  // Editing Commands
  // ===========================================================================

  private cmdEdit(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd);
    return this.bufferResult(this.session.beginEdit(cell), cmd);
  }

  private cmdType(cmd: ParsedCommand): Output {
    const text = cmd.args.join(' ');
    if (text === '') throw new Error('TYPE requires text');
    return this.bufferResult(this.session.typeText(text), cmd);
  }

  /**
   * Press a key combination, e.g. "ctrl+z", "shift+ArrowDown" or "Enter".
   */
  private cmdKey(cmd: ParsedCommand): Output {
    const descriptor = this.requireArg(cmd, 0, 'a key');

    this.keyboard.setMode(this.session.isEditing() ? 'editing' : 'navigation');
    const intent = this.keyboard.handleKeyDown(keyEventFromDescriptor(descriptor));
    if (!intent) {
      return this.createResult(false, { key: descriptor, intent: null }, cmd);
    }

    const outcome = dispatchIntent(this.session, intent);
    const data: Record<string, unknown> = { key: descriptor, intent: intent.type };
    if (outcome.text !== undefined) data.text = outcome.text;
    return this.createResult(outcome.handled, data, cmd);
  }

  private bufferResult(success: boolean, cmd: ParsedCommand): ResultOutput {
    return this.createResult(success, { buffer: this.session.getEditSession()?.buffer ?? null }, cmd);
  }

  private dispatchWithSelection(intent: TableIntent, cmd: ParsedCommand): Output {
    const outcome = dispatchIntent(this.session, intent);
    return this.selectionResult(outcome.handled, cmd);
  }

  // ===========================================================================
  // Clipboard and History
  // ===========================================================================

  private cmdClipboard(action: 'copy' | 'cut' | 'paste', cmd: ParsedCommand): Output {
    const text = action === 'paste' && cmd.args.length > 0 ? cmd.args.join(' ') : undefined;
    const outcome: DispatchResult = dispatchIntent(this.session, { type: 'clipboard', action, text });

    if (action === 'paste') {
      return this.structureResult(outcome.handled, cmd);
    }
    return this.createResult(outcome.handled, { text: outcome.text ?? '' }, cmd);
  }

  private cmdHistory(action: 'undo' | 'redo', cmd: ParsedCommand): Output {
    const outcome = dispatchIntent(this.session, { type: 'history', action });
    const history = this.session.getHistoryState();
    return this.createResult(outcome.handled, {
      undoCount: history.undoCount,
      redoCount: history.redoCount,
    }, cmd);
  }

  // ===========================================================================
  // Structure Commands
  // ===========================================================================

  private structureResult(success: boolean, cmd: ParsedCommand): ResultOutput {
    return this.createResult(success, {
      rowCount: this.session.rowCount,
      columnCount: this.session.columnCount,
    }, cmd);
  }

  private cmdWidth(cmd: ParsedCommand): Output {
    const col = this.requireColumn(cmd);
    const value = cmd.args[1];

    if (value?.toLowerCase() === 'reset') {
      this.session.resetColumnWidth(col);
    } else if (value !== undefined) {
      const width = Number(value);
      if (!Number.isFinite(width)) throw new Error(`Invalid width: ${value}`);
      this.session.setColumnWidth(col, width);
    }

    return this.createResult(true, {
      column: columnLabel(col),
      width: this.session.getColumnWidth(col),
    }, cmd);
  }

  private cmdFreeze(cmd: ParsedCommand): Output {
    const value = this.requireArg(cmd, 0, 'on or off').toLowerCase();
    if (value !== 'on' && value !== 'off') throw new Error(`Invalid FREEZE value: ${cmd.args[0]}`);

    this.session.setFrozenHeader(value === 'on');
    return this.createResult(true, { frozenHeader: this.session.isFrozenHeader() }, cmd);
  }

  // ===========================================================================
  // Sort and Search Commands
  // ===========================================================================

  private cmdSort(cmd: ParsedCommand): Output {
    const col = this.requireColumn(cmd);
    const order = (cmd.args[1] ?? 'asc').toLowerCase();
    if (order !== 'asc' && order !== 'desc') throw new Error(`Invalid sort order: ${cmd.args[1]}`);

    const ascending = order === 'asc';
    const result = this.session.sortByColumn(col, ascending);

    return this.createResult(result !== null, {
      column: columnLabel(col),
      ascending,
      rowCount: result?.rowCount ?? 0,
    }, cmd);
  }

  private cmdFind(cmd: ParsedCommand): Output {
    const query = cmd.args.join(' ');
    if (query === '') throw new Error('FIND requires a query');

    const matches = this.session.find(query, cmd.options.case === true);
    return this.createResult(matches > 0, {
      matches,
      selection: this.describeSelection(),
    }, cmd);
  }

  // ===========================================================================
  // State Inspection Commands
  // ===========================================================================

  private cmdSnapshot(cmd: ParsedCommand): Output {
    const output: SnapshotOutput = {
      type: 'snapshot',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      rows: this.takeSnapshot(),
      state: this.session.getState(),
    };

    return output;
  }

  private cmdDiff(cmd: ParsedCommand): Output {
    const before = this.lastSnapshot;
    const after = this.takeSnapshot();

    return {
      type: 'diff',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      changes: diffRows(before, after),
      resized: before.length !== after.length || (before[0]?.length ?? 0) !== (after[0]?.length ?? 0),
    };
  }

  private cmdStats(cmd: ParsedCommand): Output {
    const history = this.session.getHistoryState();
    let nonEmptyCells = 0;
    for (const row of this.session.getRows()) {
      for (const value of row) {
        if (value !== '') nonEmptyCells++;
      }
    }

    const output: StatsOutput = {
      type: 'stats',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      rowCount: this.session.rowCount,
      columnCount: this.session.columnCount,
      nonEmptyCells,
      dirty: this.session.isDirty(),
      documentName: this.session.getDocumentName(),
      undoStackSize: history.undoCount,
      redoStackSize: history.redoCount,
      searchMatches: this.session.getSearchResults().length,
    };

    return output;
  }

  /**
   * Grid as a table with column letters and row numbers. Without a range the
   * whole grid is dumped; a range is clipped to the grid.
   */
  private cmdDump(cmd: ParsedCommand): Output {
    let bounds = {
      startRow: 0,
      startCol: 0,
      endRow: this.session.rowCount - 1,
      endCol: this.session.columnCount - 1,
    };

    const ref = cmd.args[0];
    if (ref !== undefined) {
      const range = parseA1Range(ref);
      if (!range) throw new Error(`Invalid range: ${ref}`);
      const requested = cornersToRange(range.start, range.end);
      bounds = {
        startRow: requested.startRow,
        startCol: requested.startCol,
        endRow: Math.min(requested.endRow, bounds.endRow),
        endCol: Math.min(requested.endCol, bounds.endCol),
      };
    }

    const headers: string[] = [''];
    for (let col = bounds.startCol; col <= bounds.endCol; col++) {
      headers.push(columnLabel(col));
    }

    const rows: string[][] = [];
    for (let row = bounds.startRow; row <= bounds.endRow; row++) {
      const rowData: string[] = [String(row + 1)];
      for (let col = bounds.startCol; col <= bounds.endCol; col++) {
        rowData.push(this.session.getCell(row, col));
      }
      rows.push(rowData);
    }

    const output: TableOutput = {
      type: 'table',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers,
      rows,
    };

    return output;
  }

  private takeSnapshot(): GridRows {
    this.lastSnapshot = this.session.toRows();
    return this.session.toRows();
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private async cmdSleep(cmd: ParsedCommand): Promise<Output> {
    const requestedMs = parseInt(cmd.args[0] ?? '0', 10);

    if (isNaN(requestedMs) || requestedMs < 0) {
      throw new Error(`SLEEP requires a positive integer, got: ${cmd.args[0]}`);
    }

    const actualMs = Math.min(requestedMs, this.config.maxSleepMs);
    await new Promise<void>(resolveSleep => setTimeout(resolveSleep, actualMs));

    return this.createResult(true, {
      slept: actualMs,
      requested: requestedMs,
      capped: requestedMs > this.config.maxSleepMs,
    }, cmd);
  }

  /**
   * ASSERT <target> <op> <expected...>
   *
   * Targets: a cell (A1), ROWS, COLS, SELECTION, DIRTY, EDITING, BUFFER,
   * NAME, CLIPBOARD or SORT. Ordering operators compare the way SORT does.
   */
  private cmdAssert(cmd: ParsedCommand): Output {
    const [target, operator] = cmd.args;
    if (target === undefined || operator === undefined) {
      throw new Error('ASSERT requires target, operator, and expected value');
    }

    const expected = cmd.args.slice(2).join(' ');
    const actual = this.resolveAssertTarget(target);

    let passed: boolean;
    switch (operator.toLowerCase()) {
      case '==':
      case '=':
        passed = actual === expected;
        break;
      case '!=':
      case '<>':
        passed = actual !== expected;
        break;
      case '>':
        passed = compareCellText(actual, expected) > 0;
        break;
      case '<':
        passed = compareCellText(actual, expected) < 0;
        break;
      case '>=':
        passed = compareCellText(actual, expected) >= 0;
        break;
      case '<=':
        passed = compareCellText(actual, expected) <= 0;
        break;
      case 'contains':
        passed = actual.includes(expected);
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${target} ${operator} ${expected}`,
    };

    return output;
  }

  private resolveAssertTarget(target: string): string {
    switch (target.toUpperCase()) {
      case 'ROWS':
        return String(this.session.rowCount);
      case 'COLS':
        return String(this.session.columnCount);
      case 'SELECTION':
        return this.describeSelection();
      case 'DIRTY':
        return String(this.session.isDirty());
      case 'EDITING':
        return String(this.session.isEditing());
      case 'BUFFER':
        return this.session.getEditSession()?.buffer ?? '';
      case 'NAME':
        return this.session.getDocumentName();
      case 'CLIPBOARD':
        return this.clipboard.readText() ?? '';
      case 'SORT': {
        const indicator = this.session.getSortIndicator();
        if (!indicator) return 'none';
        return `${columnLabel(indicator.column)} ${indicator.ascending ? 'asc' : 'desc'}`;
      }
    }

    const cell = parseA1Reference(target);
    if (!cell) throw new Error(`Invalid assert target: ${target}`);
    return this.session.getCell(cell.row, cell.col);
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.clipboard = new MemoryClipboardTransport();
    this.session = this.createSession();
    this.keyboard.resetKeybindings();
    this.keyboard.setMode('navigation');
    this.expectError = false;
    this.takeSnapshot();

    return this.createResult(true, { reset: true }, cmd);
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success,
      data,
    };
  }

  private createValue(cell: CellRef, value: string, cmd: ParsedCommand): ValueOutput {
    return {
      type: 'value',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cell,
      address: toA1Reference(cell.row, cell.col),
      value,
    };
  }

  private createError(message: string, cmd: ParsedCommand, stack?: string): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
      stack,
    };
  }

  private createSafetyError(message: string, errorType: ErrorKind, cmd: ParsedCommand): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
      errorType,
    };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const line = formatOutput(output, this.config);
    if (output.type === 'error' && this.config.outputFormat === 'pretty') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  async executeLine(line: string, lineNumber: number = 0): Promise<boolean> {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.emit({
        type: 'error',
        timestamp: Date.now(),
        command: line.trim(),
        lineNumber,
        message: error.message,
      });
      if (this.config.stopOnError) throw error;
      return true;
    }

    if (!cmd) {
      return true;
    }

    const output = await this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }

    if (output.type === 'error' && this.config.stopOnError) {
      throw new Error(output.message);
    }

    return true;
  }

  /**
   * Execute a script (multiple lines) with timeouts, step limits and abort
   * handling. A line that does not parse raises ParseError before anything
   * runs.
   */
  async executeScript(script: string): Promise<Output[]> {
    return this.executeAll(this.parser.parseScript(script));
  }

  /**
   * Request abort of running script.
   * Can be called from signal handlers (e.g., SIGINT).
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.abortController && this.isExecuting) {
      this.abortController.abort();
      if (this.config.verbose) {
        console.error(`[Abort] ${reason}`);
      }
    }
  }

  /**
   * Check if the runner is currently executing a script.
   */
  isRunning(): boolean {
    return this.isExecuting;
  }

  /**
   * Get current step count (for monitoring/progress).
   */
  getStepCount(): number {
    return this.stepCount;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void,
  options?: HarnessRunnerOptions
): HarnessRunner {
  return new HarnessRunner(config, outputHandler, options);
}
