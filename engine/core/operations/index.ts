/**
 * Tabula Engine - Operations Module Exports
 */

export { SearchIndex, createSearchIndex, findMatches } from './SearchIndex.js';
export type { SearchOptions, SearchState, SearchIndexEvents } from './SearchIndex.js';

export { sortRows, compareCellText, parseNumber } from './Sorter.js';
export type { SortOptions, SortResult, SortIndicator } from './Sorter.js';
