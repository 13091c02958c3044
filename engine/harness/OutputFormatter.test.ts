/**
 * OutputFormatter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { formatOutput, formatTable } from './OutputFormatter.js';

const pretty = { outputFormat: 'pretty', includeTimestamps: false, includeLineNumbers: true } as const;

describe('formatOutput', () => {
  it('should drop fields the config turns off from JSON', () => {
    const line = formatOutput(
      { type: 'echo', timestamp: 5, lineNumber: 2, message: 'hi' },
      { outputFormat: 'json', includeTimestamps: false, includeLineNumbers: true }
    );

    expect(line).toBe('{"type":"echo","lineNumber":2,"message":"hi"}');
  });

  it('should prefix pretty output with the line number', () => {
    const line = formatOutput(
      {
        type: 'value',
        timestamp: 0,
        lineNumber: 3,
        cell: { row: 0, col: 0 },
        address: 'A1',
        value: 'x',
      },
      pretty
    );

    expect(line).toBe('3: A1 = "x"');
  });

  it('should list diff changes one per line', () => {
    const text = formatOutput(
      {
        type: 'diff',
        timestamp: 0,
        resized: true,
        changes: [
          { row: 0, col: 0, address: 'A1', before: 'a', after: 'b' },
          { row: 0, col: 1, address: 'B1', before: null, after: '' },
        ],
      },
      pretty
    );

    expect(text).toBe('DIFF: 2 changes, resized\n  A1: "a" -> "b"\n  B1: null -> ""');
  });

  it('should report results with their data', () => {
    expect(formatOutput({ type: 'result', timestamp: 0, success: false, data: { n: 1 } }, pretty)).toBe(
      'NOOP {"n":1}'
    );
    expect(formatOutput({ type: 'result', timestamp: 0, success: true }, pretty)).toBe('OK');
  });
});

describe('formatTable', () => {
  it('should pad columns and rule off the header', () => {
    expect(formatTable([['', 'A'], ['10', 'x']], true)).toBe(
      '    | A \n----+---\n 10 | x '
    );
  });

  it('should return nothing for no rows', () => {
    expect(formatTable([])).toBe('');
  });
});
