/**
 * Tabula Headless Harness - Output Formatting
 *
 * JSON lines for machines, aligned text for people.
 */

import type { HarnessConfig, Output } from './types.js';

type FormatConfig = Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps' | 'includeLineNumbers'>;

export function formatOutput(output: Output, config: FormatConfig): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output, (key, value: unknown) => {
      if (key === 'timestamp' && !config.includeTimestamps) return undefined;
      if (key === 'lineNumber' && !config.includeLineNumbers) return undefined;
      return value;
    });
  }

  let prefix = '';
  if (config.includeTimestamps) {
    prefix += `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `;
  }
  if (config.includeLineNumbers && output.lineNumber) {
    prefix += `${output.lineNumber}: `;
  }

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'NOOP'}${output.data !== undefined ? ` ${JSON.stringify(output.data)}` : ''}`;

    case 'value':
      return `${prefix}${output.address} = ${JSON.stringify(output.value)}`;

    case 'snapshot':
      return `${prefix}SNAPSHOT ${output.state.documentName}${output.state.dirty ? '*' : ''} ` +
        `${output.state.rowCount}x${output.state.columnCount}\n${formatTable(output.rows)}`;

    case 'diff':
      return [
        `${prefix}DIFF: ${output.changes.length} changes${output.resized ? ', resized' : ''}`,
        ...output.changes.map(change =>
          `  ${change.address}: ${JSON.stringify(change.before)} -> ${JSON.stringify(change.after)}`
        ),
      ].join('\n');

    case 'error':
      return `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'stats':
      return `${prefix}STATS: ${output.documentName}${output.dirty ? '*' : ''} ` +
        `${output.rowCount}x${output.columnCount}, ${output.nonEmptyCells} filled, ` +
        `undo ${output.undoStackSize}, redo ${output.redoStackSize}, ${output.searchMatches} matches`;

    case 'table':
      return `${prefix}TABLE:\n${formatTable([output.headers, ...output.rows], true)}`;

    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}`;

    case 'echo':
      return `${prefix}${output.message}`;
  }
}

/**
 * Pad every column to its widest cell. With `header`, a rule follows row 0.
 */
export function formatTable(rows: string[][], header: boolean = false): string {
  if (rows.length === 0) return '';

  const columnCount = Math.max(...rows.map(row => row.length));
  const widths: number[] = [];
  for (let col = 0; col < columnCount; col++) {
    widths.push(Math.max(...rows.map(row => (row[col] ?? '').length)));
  }

  const formatRow = (row: string[]): string =>
    widths.map((width, col) => ` ${(row[col] ?? '').padEnd(width)} `).join('|');

  const lines = rows.map(formatRow);
  if (header) {
    lines.splice(1, 0, widths.map(width => '-'.repeat(width + 2)).join('+'));
  }
  return lines.join('\n');
}
