/**
 * Tabula Headless Harness - Types
 *
 * Command protocol and output types for stdin/stdout scripting.
 */

import type { CellRef } from '../core/types/index.js';
import type { TableSessionState } from '../core/TableSession.js';

// =============================================================================
// Command Types
// =============================================================================

export const COMMAND_TYPES = [
  // Document
  'NEW',          // NEW
  'LOAD',         // LOAD data.tsv
  'SAVE',         // SAVE [out.tsv]

  // Cells
  'SET',          // SET A1 hello world
  'GET',          // GET A1
  'CLEAR_CELL',   // CLEAR_CELL B2

  // Selection
  'SELECT',       // SELECT A1 | SELECT A1:C3
  'SELECT_ROW',   // SELECT_ROW 3
  'SELECT_COL',   // SELECT_COL B
  'SELECT_ALL',   // SELECT_ALL
  'GET_SELECTION',// GET_SELECTION
  'MOVE',         // MOVE <up|down|left|right> [extend]
  'DRAG',         // DRAG A1 C3

  // Editing
  'EDIT',         // EDIT B2
  'TYPE',         // TYPE "some text"
  'KEY',          // KEY ctrl+z | KEY Enter
  'COMMIT',       // COMMIT
  'CONFIRM',      // CONFIRM (Enter)
  'CANCEL',       // CANCEL (Escape)
  'DELETE',       // DELETE (Delete key on the selection)

  // Clipboard
  'COPY',         // COPY
  'CUT',          // CUT
  'PASTE',        // PASTE ["a\tb"]

  // History
  'UNDO',         // UNDO
  'REDO',         // REDO

  // Structure
  'INSERT_ROW',   // INSERT_ROW 2
  'INSERT_COL',   // INSERT_COL B
  'DELETE_ROW',   // DELETE_ROW 2
  'DELETE_COL',   // DELETE_COL B
  'ADD_ROW',      // ADD_ROW
  'ADD_COL',      // ADD_COL
  'WIDTH',        // WIDTH B [80|reset]
  'FREEZE',       // FREEZE <on|off>

  // Sort / search
  'SORT',         // SORT B [asc|desc]
  'FIND',         // FIND "text" [case=true]
  'NEXT',         // NEXT
  'PREV',         // PREV

  // State inspection
  'SNAPSHOT',     // SNAPSHOT (full state)
  'DIFF',         // DIFF (changes since last snapshot)
  'STATS',        // STATS
  'DUMP',         // DUMP [A1:C3]

  // Utility
  'ECHO',         // ECHO message
  'SLEEP',        // SLEEP 100
  'ASSERT',       // ASSERT A1 == hello | ASSERT ROWS == 3
  'ASSERT_ERROR', // ASSERT_ERROR (next command should fail)

  // Control
  'RESET',        // RESET
  'QUIT',         // QUIT
] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

export type OptionValue = string | boolean | number;

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  options: Record<string, OptionValue>;
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Cell value
  | 'snapshot'  // Full state snapshot
  | 'diff'      // Cell changes
  | 'error'     // Error message
  | 'info'      // Info message
  | 'stats'     // Statistics
  | 'table'     // Tabular data dump
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  cell: CellRef;
  address: string;
  value: string;
}

export interface SnapshotOutput extends OutputBase {
  type: 'snapshot';
  rows: string[][];
  state: TableSessionState;
}

export interface DiffOutput extends OutputBase {
  type: 'diff';
  changes: CellChange[];
  /** Row or column count differs from the last snapshot */
  resized: boolean;
}

export type ErrorKind = 'CommandTimeout' | 'StepLimitExceeded' | 'ScriptAborted';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  stack?: string;
  errorType?: ErrorKind;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  rowCount: number;
  columnCount: number;
  nonEmptyCells: number;
  dirty: boolean;
  documentName: string;
  undoStackSize: number;
  redoStackSize: number;
  searchMatches: number;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: string;
  actual: string;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | SnapshotOutput
  | DiffOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

export interface CellChange {
  row: number;
  col: number;
  address: string;
  /** null when the cell did not exist before */
  before: string | null;
  /** null when the cell no longer exists */
  after: string | null;
}

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;

  /** Rows of a new document */
  defaultRows: number;
  /** Columns of a new document */
  defaultColumns: number;
  /** Directory LOAD and SAVE resolve relative paths against */
  baseDir: string;

  // === Safety Configuration ===
  /** Per-command timeout in milliseconds (default: 2000ms) */
  commandTimeoutMs: number;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Maximum SLEEP duration in ms (default: 10000ms) */
  maxSleepMs: number;
  /** Continue execution on timeout (vs. abort script) */
  continueOnTimeout: boolean;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  defaultRows: 20,
  defaultColumns: 10,
  baseDir: '.',
  // Safety defaults
  commandTimeoutMs: 2000,
  maxStepsPerScript: 10000,
  maxSleepMs: 10000,
  continueOnTimeout: false,
};
