/**
 * Tabula Headless Harness - Module Exports
 *
 * A text-based command harness for driving a TableSession from scripts or
 * a REPL over stdin/stdout.
 */

export { CommandParser, createCommandParser, ParseError } from './CommandParser.js';
export {
  parseA1Reference,
  parseA1Range,
  toA1Reference,
  parseColumnRef,
  parseRowRef,
} from './CommandParser.js';

export {
  HarnessRunner,
  createHarnessRunner,
  createFileDocumentStore,
  diffRows,
  CommandTimeoutError,
} from './HarnessRunner.js';
export type { DocumentStore, HarnessRunnerOptions } from './HarnessRunner.js';

export { formatOutput, formatTable } from './OutputFormatter.js';

export type {
  CommandType,
  OptionValue,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  SnapshotOutput,
  DiffOutput,
  ErrorKind,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  CellChange,
  HarnessConfig,
} from './types.js';

export { COMMAND_TYPES, DEFAULT_CONFIG } from './types.js';
