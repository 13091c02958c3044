/**
 * Tabula Engine - Search Index
 *
 * Linear substring search over the grid with cyclic navigation.
 *
 * - Results are in row-major order of the scan
 * - An empty query yields no results
 * - Case-insensitive search lower-cases both sides
 * - next/previous wrap in both directions
 */

import type { CellRef } from '../types/index.js';
import type { GridStore } from '../data/GridStore.js';

// =============================================================================
// Types
// =============================================================================

export interface SearchOptions {
  /** Match case exactly (default: false) */
  caseSensitive?: boolean;
}

export interface SearchState {
  query: string;
  caseSensitive: boolean;
  results: CellRef[];
  /** Index into results, -1 when there are none */
  currentIndex: number;
}

export interface SearchIndexEvents {
  /** Called when the current result changes */
  onResultChange?: (result: CellRef | null, index: number, total: number) => void;
}

// =============================================================================
// Matching
// =============================================================================

/**
 * Every cell containing `query`, row by row.
 */
export function findMatches(grid: GridStore, query: string, caseSensitive: boolean): CellRef[] {
  if (query.length === 0) return [];

  const needle = caseSensitive ? query : query.toLowerCase();
  const matches: CellRef[] = [];
  const rows = grid.getRows();

  for (let row = 0; row < rows.length; row++) {
    const cells = rows[row];
    for (let col = 0; col < cells.length; col++) {
      const haystack = caseSensitive ? cells[col] : cells[col].toLowerCase();
      if (haystack.includes(needle)) {
        matches.push({ row, col });
      }
    }
  }

  return matches;
}

// =============================================================================
// Search Index
// =============================================================================

export class SearchIndex {
  private state: SearchState = {
    query: '',
    caseSensitive: false,
    results: [],
    currentIndex: -1,
  };
  private events: SearchIndexEvents = {};

  setEventHandlers(events: SearchIndexEvents): void {
    this.events = { ...this.events, ...events };
  }

  /**
   * Scan the grid and reset the pointer to the first result.
   */
  performSearch(grid: GridStore, query: string, options: SearchOptions = {}): CellRef[] {
    const caseSensitive = options.caseSensitive ?? false;
    const results = findMatches(grid, query, caseSensitive);

    this.state = {
      query,
      caseSensitive,
      results,
      currentIndex: results.length > 0 ? 0 : -1,
    };
    this.emitResultChange();
    return results.map(cell => ({ ...cell }));
  }

  /**
   * Advance to the next result, wrapping after the last.
   */
  nextResult(): CellRef | null {
    const total = this.state.results.length;
    if (total === 0) return null;

    this.state.currentIndex = (this.state.currentIndex + 1) % total;
    this.emitResultChange();
    return this.getCurrentResult();
  }

  /**
   * Step back to the previous result, wrapping before the first.
   */
  prevResult(): CellRef | null {
    const total = this.state.results.length;
    if (total === 0) return null;

    this.state.currentIndex = (this.state.currentIndex - 1 + total) % total;
    this.emitResultChange();
    return this.getCurrentResult();
  }

  getCurrentResult(): CellRef | null {
    const result = this.state.results[this.state.currentIndex];
    return result ? { ...result } : null;
  }

  getResults(): CellRef[] {
    return this.state.results.map(cell => ({ ...cell }));
  }

  getState(): SearchState {
    return {
      ...this.state,
      results: this.getResults(),
    };
  }

  hasResults(): boolean {
    return this.state.results.length > 0;
  }

  clear(): void {
    if (this.state.query === '' && this.state.results.length === 0) return;
    this.state = { query: '', caseSensitive: false, results: [], currentIndex: -1 };
    this.emitResultChange();
  }

  private emitResultChange(): void {
    this.events.onResultChange?.(
      this.getCurrentResult(),
      this.state.currentIndex,
      this.state.results.length
    );
  }
}

export function createSearchIndex(): SearchIndex {
  return new SearchIndex();
}
