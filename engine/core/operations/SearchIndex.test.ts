/**
 * SearchIndex Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SearchIndex, findMatches } from './SearchIndex.js';
import { GridStore } from '../data/GridStore.js';

describe('findMatches', () => {
  const grid = new GridStore([
    ['Apple', 'banana', 'apricot'],
    ['cherry', 'APPLE pie', ''],
  ]);

  it('should scan row by row, ignoring case by default', () => {
    expect(findMatches(grid, 'ap', false)).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 2 },
      { row: 1, col: 1 },
    ]);
  });

  it('should respect case when asked', () => {
    expect(findMatches(grid, 'APPLE', true)).toEqual([{ row: 1, col: 1 }]);
  });

  it('should find nothing for an empty query', () => {
    expect(findMatches(grid, '', false)).toEqual([]);
  });
});

describe('SearchIndex', () => {
  let grid: GridStore;
  let index: SearchIndex;

  beforeEach(() => {
    grid = new GridStore([
      ['x', 'a'],
      ['x', 'x'],
    ]);
    index = new SearchIndex();
  });

  it('should point at the first result after a search', () => {
    index.performSearch(grid, 'x');

    expect(index.getState().currentIndex).toBe(0);
    expect(index.getCurrentResult()).toEqual({ row: 0, col: 0 });
  });

  it('should rotate forward and wrap', () => {
    index.performSearch(grid, 'x');

    expect(index.nextResult()).toEqual({ row: 1, col: 0 });
    expect(index.nextResult()).toEqual({ row: 1, col: 1 });
    expect(index.nextResult()).toEqual({ row: 0, col: 0 });
  });

  it('should rotate backward and wrap', () => {
    index.performSearch(grid, 'x');

    expect(index.prevResult()).toEqual({ row: 1, col: 1 });
    expect(index.prevResult()).toEqual({ row: 1, col: 0 });
  });

  it('should make navigation a no-op without results', () => {
    index.performSearch(grid, 'zzz');

    expect(index.nextResult()).toBeNull();
    expect(index.prevResult()).toBeNull();
    expect(index.getState().currentIndex).toBe(-1);
  });

  it('should reset the pointer on a new search', () => {
    index.performSearch(grid, 'x');
    index.nextResult();
    index.performSearch(grid, 'a');

    expect(index.getState()).toEqual({
      query: 'a',
      caseSensitive: false,
      results: [{ row: 0, col: 1 }],
      currentIndex: 0,
    });
  });

  it('should report result changes', () => {
    const onResultChange = vi.fn();
    index.setEventHandlers({ onResultChange });

    index.performSearch(grid, 'x');
    index.nextResult();

    expect(onResultChange).toHaveBeenLastCalledWith({ row: 1, col: 0 }, 1, 3);
  });

  it('should forget results on clear', () => {
    index.performSearch(grid, 'x');
    index.clear();

    expect(index.hasResults()).toBe(false);
    expect(index.getCurrentResult()).toBeNull();
  });
});
