#!/usr/bin/env node
/**
 * Tabula Headless Harness - CLI Entry Point
 *
 * Usage:
 *   tabula-harness [options]                 REPL on a terminal
 *   tabula-harness [options] < script.txt    Run a script
 *   echo "SET A1 hello" | tabula-harness
 *
 * Options:
 *   --pretty        Human-readable output (default: JSON)
 *   --no-timestamps Omit timestamps from output
 *   --stop-on-error Stop execution on first error
 *   --echo          Echo commands before executing
 *   --verbose       Verbose mode with extra logging
 *   --rows <n>      Rows of a new document
 *   --cols <n>      Columns of a new document
 *   --base <dir>    Directory LOAD and SAVE resolve against
 *   --help          Show help message
 */

import * as readline from 'node:readline';
import { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';
import { ParseError } from './CommandParser.js';
import { DEFAULT_CONFIG, type HarnessConfig } from './types.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
  };

  const takeValue = (index: number, flag: string): string => {
    const value = args[index];
    if (value === undefined) throw new UsageError(`${flag} requires a value`);
    return value;
  };

  const takeCount = (index: number, flag: string): number => {
    const value = takeValue(index, flag);
    const count = parseInt(value, 10);
    if (!/^\d+$/.test(value) || count < 0) throw new UsageError(`${flag} requires a number, got: ${value}`);
    return count;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--no-line-numbers':
        result.config.includeLineNumbers = false;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--rows':
        result.config.defaultRows = takeCount(++i, arg);
        break;
      case '--cols':
        result.config.defaultColumns = takeCount(++i, arg);
        break;
      case '--base':
        result.config.baseDir = takeValue(++i, arg);
        break;
      case '--timeout':
        result.config.commandTimeoutMs = takeCount(++i, arg);
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Tabula Headless Harness

USAGE:
  tabula-harness [options]
  tabula-harness [options] < script.txt
  echo "SET A1 hello" | tabula-harness

OPTIONS:
  --pretty            Human-readable output (default: JSON)
  --json              JSON output (one object per line)
  --no-timestamps     Omit timestamps from output
  --no-line-numbers   Omit line numbers from output
  --stop-on-error     Stop execution on first error
  --echo              Echo commands before executing
  --verbose, -v       Log session events to stderr
  --rows <n>          Rows of a new document (default: 20)
  --cols <n>          Columns of a new document (default: 10)
  --base <dir>        Directory LOAD and SAVE resolve against
  --timeout <ms>      Per-command timeout (default: 2000)
  --interactive, -i   Force interactive mode
  --help, -h          Show this help message

Cells are A1 addresses, rows are 1-based numbers, columns are letters.

COMMANDS:
  Document:
    NEW                      Blank document
    LOAD <path>              Load a tab-separated file
    SAVE [path]              Save (default: the loaded name)

  Cells:
    SET <cell> <text>        Edit a cell and commit
    GET <cell>               Read a cell
    CLEAR_CELL <cell>        Blank one cell

  Selection:
    SELECT <cell|range>      Select a cell or range
    SELECT_ROW <row>         Select a row
    SELECT_COL <col>         Select a column
    SELECT_ALL               Select every cell
    GET_SELECTION            Show the selection
    MOVE <dir> [extend]      Arrow key (up, down, left, right)
    DRAG <cell> <cell>       Press, drag and release

  Editing:
    EDIT <cell>              Begin editing a cell
    TYPE <text>              Type text (starts an edit on a single cell)
    KEY <combo>              Press a key, e.g. Enter, ctrl+z, shift+ArrowUp
    COMMIT                   Commit the edit in place
    CONFIRM                  Enter: commit and move down
    CANCEL                   Escape: drop the edit and the selection
    DELETE                   Delete key

  Clipboard:
    COPY / CUT               Selection to the clipboard
    PASTE [text]             Paste text or the clipboard at the selection

  History:
    UNDO / REDO

  Structure:
    INSERT_ROW <row>         Insert a blank row before <row>
    INSERT_COL <col>         Insert a blank column before <col>
    DELETE_ROW <row>         Delete a row
    DELETE_COL <col>         Delete a column
    ADD_ROW / ADD_COL        Append a row or column
    WIDTH <col> [px|reset]   Show or set a column width
    FREEZE <on|off>          Keep row 1 on top when sorting

  Sort / Search:
    SORT <col> [asc|desc]    Sort all rows by a column
    FIND <text> [case=true]  Search and select the first match
    NEXT / PREV              Step through matches

  State Inspection:
    SNAPSHOT                 Full state snapshot
    DIFF                     Cell changes since last snapshot
    STATS                    Document statistics
    DUMP [range]             Grid or range as a table

  Utility:
    ECHO <message>           Print message
    SLEEP <ms>               Sleep for milliseconds
    ASSERT <target> <op> <v> Check a cell, ROWS, COLS, SELECTION, DIRTY,
                             EDITING, BUFFER, NAME, CLIPBOARD or SORT
                             (==, !=, <, >, <=, >=, contains)
    ASSERT_ERROR             Expect next command to fail

  Control:
    RESET                    Fresh session
    QUIT                     Exit harness

EXAMPLE:
  SET A1 apple
  SET A2 pear
  SORT A desc
  ASSERT A1 == pear
  SELECT A1:A2
  COPY
  ASSERT CLIPBOARD == "pear\\napple"
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let cliArgs: CLIArgs;
  try {
    cliArgs = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    process.exit(2);
  }

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config);
  process.on('SIGINT', () => runner.abort('Interrupted'));

  const isInteractive = cliArgs.interactive || process.stdin.isTTY;

  if (isInteractive) {
    await runInteractive(runner, config);
  } else {
    await runPiped(runner);
  }
}

async function runInteractive(runner: HarnessRunner, config: HarnessConfig): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'tabula> ',
  });

  if (config.verbose) {
    console.log('Tabula Headless Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  let lineNumber = 0;
  rl.prompt();

  for await (const line of rl) {
    lineNumber++;

    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    try {
      if (!(await runner.executeLine(line, lineNumber))) break;
    } catch {
      // executeLine already reported the failure
      process.exitCode = 1;
      break;
    }

    rl.prompt();
  }

  rl.close();
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  try {
    const outputs = await runner.executeScript(lines.join('\n'));
    const failed = outputs.some(output =>
      output.type === 'error' || (output.type === 'assert' && !output.passed)
    );
    process.exitCode = failed ? 1 : 0;
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    console.error(error.message);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
