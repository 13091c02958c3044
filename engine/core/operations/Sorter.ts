/**
 * Tabula Engine - Column Sorter
 *
 * Stable row sort keyed on one column.
 *
 * Comparator, per pair of cells:
 * - both parse as numbers: numeric comparison
 * - otherwise: ordinal text comparison (UTF-16 code units)
 * Missing cells compare as ''. Descending negates the comparator, so rows
 * with equal keys keep their original order in both directions.
 */

import type { GridRows, ReadonlyGridRows } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface SortOptions {
  /** Column to sort by */
  column: number;
  ascending: boolean;
  /** Keep row 0 on top (default: false) */
  frozenHeader?: boolean;
}

export interface SortResult {
  /** Sort was performed */
  success: boolean;
  /** Rows that took part in the sort */
  rowCount: number;
  /** Row indices before sorting */
  originalOrder: number[];
  /** Original index of each row after sorting */
  newOrder: number[];
  /** Sorted copy of the input */
  rows: GridRows;
}

export interface SortIndicator {
  column: number;
  ascending: boolean;
}

// =============================================================================
// Comparison
// =============================================================================

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_LITERAL = /^[+-]?(?:inf|infinity|nan)$/i;

/**
 * Parse a complete decimal floating-point literal. Surrounding whitespace is
 * ignored; anything else in the text makes it non-numeric.
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (DECIMAL_LITERAL.test(trimmed)) {
    return Number(trimmed);
  }
  if (SPECIAL_LITERAL.test(trimmed)) {
    const negative = trimmed.startsWith('-');
    if (/nan$/i.test(trimmed)) return NaN;
    return negative ? -Infinity : Infinity;
  }
  return null;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ascending comparison of two cell texts.
 */
export function compareCellText(a: string, b: string): number {
  const numA = parseNumber(a);
  const numB = parseNumber(b);

  if (numA !== null && numB !== null) {
    if (numA < numB) return -1;
    if (numA > numB) return 1;
    return 0;
  }

  return compareOrdinal(a, b);
}

// =============================================================================
// Sorting
// =============================================================================

/**
 * Sort a copy of `rows` by one column. The input is not modified.
 */
export function sortRows(rows: ReadonlyGridRows, options: SortOptions): SortResult {
  const { column, ascending } = options;
  const headerCount = options.frozenHeader && rows.length > 0 ? 1 : 0;

  const originalOrder: number[] = [];
  for (let i = headerCount; i < rows.length; i++) {
    originalOrder.push(i);
  }

  const cellAt = (index: number): string => rows[index][column] ?? '';

  const newOrder = [...originalOrder].sort((a, b) => {
    const result = compareCellText(cellAt(a), cellAt(b));
    const directed = ascending ? result : -result;
    // Index tiebreak keeps equal keys in input order
    return directed !== 0 ? directed : a - b;
  });

  const sorted: GridRows = [];
  for (let i = 0; i < headerCount; i++) {
    sorted.push([...rows[i]]);
  }
  for (const index of newOrder) {
    sorted.push([...rows[index]]);
  }

  return {
    success: true,
    rowCount: newOrder.length,
    originalOrder,
    newOrder,
    rows: sorted,
  };
}
