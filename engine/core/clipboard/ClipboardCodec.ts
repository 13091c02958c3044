/**
 * Tabula Engine - Clipboard Codec
 *
 * Spreadsheet-compatible plain text: cells joined by '\t', rows by '\n'.
 * Embedded tabs and newlines inside a cell are not escaped, so such a cell
 * re-pastes as several cells. Other spreadsheets read and write the same
 * unescaped form.
 *
 * Round trip: pasteText(extractText(S), pasteAnchor(S)) reproduces the cells
 * covered by a cell range S whose cells contain no tab or newline.
 */

import type { CellRef, CellRange } from '../types/index.js';
import type { GridStore } from '../data/GridStore.js';
import { type Selection, cornersToRange } from '../selection/Selection.js';

export const CELL_SEPARATOR = '\t';
export const ROW_SEPARATOR = '\n';

export interface PasteResult {
  /** Rectangle written, anchored at the paste target */
  range: CellRange;
  /** Number of cells written */
  cellCount: number;
  /** Rows appended to fit the pasted block */
  rowsAdded: number;
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Serialize the selected cells. Cells outside the grid are written as ''
 * so a cell range always yields a full rectangle.
 */
export function extractText(grid: GridStore, selection: Selection): string {
  switch (selection.kind) {
    case 'none':
      return '';

    case 'cellRange': {
      const range = cornersToRange(selection.start, selection.end);
      const lines: string[] = [];
      for (let row = range.startRow; row <= range.endRow; row++) {
        const cells: string[] = [];
        for (let col = range.startCol; col <= range.endCol; col++) {
          cells.push(grid.getCell(row, col));
        }
        lines.push(cells.join(CELL_SEPARATOR));
      }
      return lines.join(ROW_SEPARATOR);
    }

    case 'column': {
      const cells: string[] = [];
      for (let row = 0; row < grid.rowCount; row++) {
        cells.push(grid.getCell(row, selection.col));
      }
      return cells.join(ROW_SEPARATOR);
    }

    case 'row': {
      const cells = grid.getRow(selection.row);
      return cells ? cells.join(CELL_SEPARATOR) : '';
    }
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Split clipboard text into lines of cells. One trailing line terminator is
 * ignored and '\r\n' is accepted. Empty text yields no lines.
 */
export function splitClipboardText(text: string): string[][] {
  if (text.length === 0) return [];

  const lines = text.split(ROW_SEPARATOR);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map(line => {
    const clean = line.endsWith('\r') ? line.slice(0, -1) : line;
    return clean.split(CELL_SEPARATOR);
  });
}

// =============================================================================
// Paste
// =============================================================================

/**
 * Write clipboard text into the grid starting at `anchor`, growing the grid
 * as needed. Rows are appended at the current widest length and cells are
 * appended to the target row only; the grid is normalized once at the end.
 * Returns null when the text holds nothing to paste.
 */
export function pasteText(grid: GridStore, text: string, anchor: CellRef): PasteResult | null {
  const lines = splitClipboardText(text);
  if (lines.length === 0 || anchor.row < 0 || anchor.col < 0) return null;

  const rowsBefore = grid.rowCount;
  let cellCount = 0;
  let widest = 0;

  for (let i = 0; i < lines.length; i++) {
    const cells = lines[i];
    widest = Math.max(widest, cells.length);
    for (let j = 0; j < cells.length; j++) {
      const row = anchor.row + i;
      const col = anchor.col + j;
      grid.ensureCell(row, col);
      grid.setCell(row, col, cells[j]);
      cellCount++;
    }
  }

  grid.normalize();

  return {
    range: {
      startRow: anchor.row,
      startCol: anchor.col,
      endRow: anchor.row + lines.length - 1,
      endCol: anchor.col + widest - 1,
    },
    cellCount,
    rowsAdded: grid.rowCount - rowsBefore,
  };
}
