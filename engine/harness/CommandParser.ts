/**
 * Tabula Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Cells use A1 addresses, rows are 1-based numbers and columns are letters:
 *   SET B2 "hello world"       - Write a cell through an edit session
 *   SELECT A1:C3               - Select a range
 *   INSERT_COL B               - Insert a column before B
 *   DELETE_ROW 2               - Delete the second row
 *   SORT B desc                - Sort by column B
 *   FIND "total" case=true     - Case-sensitive search
 *   KEY ctrl+shift+z           - Press a key combination
 *
 * Quoted arguments keep spaces and accept \n, \t, \\ and escaped quotes.
 * Lines starting with # or // are comments.
 */

import { columnLabel, columnLabelToIndex, type CellRef } from '../core/types/index.js';
import { COMMAND_TYPES, type CommandType, type OptionValue, type ParsedCommand } from './types.js';

// =============================================================================
// Cell Reference Utilities
// =============================================================================

/**
 * Parse A1-style cell reference to row/col.
 */
export function parseA1Reference(ref: string): CellRef | null {
  const match = ref.match(/^([A-Z]+)(\d+)$/i);
  if (!match) return null;

  const row = parseInt(match[2], 10) - 1;
  if (row < 0) return null;

  return { row, col: columnLabelToIndex(match[1]) };
}

/**
 * Parse "A1" or "A1:B10" into its two corners, as written.
 */
export function parseA1Range(range: string): { start: CellRef; end: CellRef } | null {
  const parts = range.split(':');

  if (parts.length === 1) {
    const cell = parseA1Reference(parts[0]);
    return cell ? { start: cell, end: cell } : null;
  }

  if (parts.length === 2) {
    const start = parseA1Reference(parts[0]);
    const end = parseA1Reference(parts[1]);
    return start && end ? { start, end } : null;
  }

  return null;
}

/**
 * Convert row/col to A1-style reference.
 */
export function toA1Reference(row: number, col: number): string {
  return `${columnLabel(col)}${row + 1}`;
}

/**
 * Column letters ("B") to a zero-based index, or null.
 */
export function parseColumnRef(ref: string): number | null {
  const col = columnLabelToIndex(ref);
  return col < 0 ? null : col;
}

/**
 * One-based row number ("3") to a zero-based index, or null.
 */
export function parseRowRef(ref: string): number | null {
  if (!/^\d+$/.test(ref)) return null;
  const row = parseInt(ref, 10) - 1;
  return row < 0 ? null : row;
}

// =============================================================================
// Command Parser
// =============================================================================

const VALID_COMMANDS: ReadonlySet<string> = new Set<string>(COMMAND_TYPES);

function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.has(value);
}

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    const type = tokens[0].value.toUpperCase();
    if (!isCommandType(type)) {
      throw new ParseError(`Unknown command: ${type}`, lineNumber, trimmed);
    }

    const args: string[] = [];
    const options: Record<string, OptionValue> = {};

    for (const token of tokens.slice(1)) {
      // key=value, where key is an identifier; quoted tokens are always args
      const eqIndex = token.value.indexOf('=');
      const key = token.value.substring(0, eqIndex);
      if (!token.quoted && eqIndex > 0 && /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
        options[key] = this.parseOptionValue(token.value.substring(eqIndex + 1));
      } else {
        args.push(token.value);
      }
    }

    return {
      type,
      args,
      options,
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === quoteChar) {
          tokens.push({ value: current, quoted: true });
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          const next = line[i + 1];
          if (next === quoteChar || next === '\\' || next === 'n' || next === 't') {
            if (next === 'n') current += '\n';
            else if (next === 't') current += '\t';
            else current += next;
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        if (current !== '') {
          tokens.push({ value: current, quoted: false });
          current = '';
        }
        inQuotes = true;
        quoteChar = char;
      } else if (char === ' ' || char === '\t') {
        if (current !== '') {
          tokens.push({ value: current, quoted: false });
          current = '';
        }
      } else {
        current += char;
      }
    }

    if (inQuotes) {
      throw new ParseError('Unterminated string', lineNumber, line);
    }

    if (current !== '') {
      tokens.push({ value: current, quoted: false });
    }

    return tokens;
  }

  /**
   * Parse an option value to appropriate type.
   */
  private parseOptionValue(value: string): OptionValue {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
    if (/^-?\d+\.?\d*$/.test(value)) return parseFloat(value);
    return value;
  }
}

interface Token {
  value: string;
  quoted: boolean;
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
