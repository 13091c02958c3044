/**
 * Tabula Engine - SelectionManager Unit Tests
 *
 * Covers:
 * - Direct selection
 * - Keyboard navigation (move and extend, clamping)
 * - Mouse drag
 * - Event subscriptions
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  SelectionManager,
  clampToGrid,
  navigationBase,
} from './SelectionManager.js';
import type { SelectionChangeEvent } from './SelectionManager.js';
import {
  NO_SELECTION,
  cellSelection,
  rangeSelection,
  rowSelection,
  columnSelection,
} from './Selection.js';

const extent = { rowCount: 5, columnCount: 4 };

// =============================================================================
// Utility Functions
// =============================================================================

describe('Selection navigation helpers', () => {
  it('should clamp cells into the grid', () => {
    expect(clampToGrid({ row: -3, col: 9 }, extent)).toEqual({ row: 0, col: 3 });
    expect(clampToGrid({ row: 2, col: 1 }, extent)).toEqual({ row: 2, col: 1 });
  });

  it('should refuse to clamp into a grid without cells', () => {
    expect(clampToGrid({ row: 0, col: 0 }, { rowCount: 0, columnCount: 0 })).toBeNull();
  });

  it('should navigate from the start and end corners of a range', () => {
    const base = navigationBase(rangeSelection({ row: 1, col: 1 }, { row: 3, col: 2 }));

    expect(base.anchor).toEqual({ row: 1, col: 1 });
    expect(base.current).toEqual({ row: 3, col: 2 });
  });

  it('should navigate from the origin for other shapes', () => {
    expect(navigationBase(rowSelection(4)).current).toEqual({ row: 0, col: 0 });
    expect(navigationBase(NO_SELECTION).anchor).toEqual({ row: 0, col: 0 });
  });
});

// =============================================================================
// SelectionManager
// =============================================================================

describe('SelectionManager', () => {
  let manager: SelectionManager;

  beforeEach(() => {
    manager = new SelectionManager();
  });

  describe('initial state', () => {
    it('should start with no selection and no drag', () => {
      expect(manager.getSelection()).toBe(NO_SELECTION);
      expect(manager.getState().dragOrigin).toBeNull();
      expect(manager.isDragging()).toBe(false);
    });
  });

  describe('direct selection', () => {
    it('should select a single cell', () => {
      manager.selectCell({ row: 2, col: 1 });
      expect(manager.getSelection()).toEqual(cellSelection({ row: 2, col: 1 }));
    });

    it('should select rows and columns', () => {
      manager.selectRow(3);
      expect(manager.getSelection()).toEqual(rowSelection(3));

      manager.selectColumn(1);
      expect(manager.getSelection()).toEqual(columnSelection(1));
    });

    it('should select everything', () => {
      manager.selectAll(extent);
      expect(manager.getSelection()).toEqual(
        rangeSelection({ row: 0, col: 0 }, { row: 4, col: 3 })
      );
    });

    it('should keep the selection when select-all has nothing to select', () => {
      manager.selectRow(1);
      manager.selectAll({ rowCount: 0, columnCount: 0 });

      expect(manager.getSelection()).toEqual(rowSelection(1));
    });

    it('should clear', () => {
      manager.selectCell({ row: 0, col: 0 });
      manager.clear();

      expect(manager.getSelection()).toBe(NO_SELECTION);
    });
  });

  // ===========================================================================
  // Keyboard Navigation
  // ===========================================================================

  describe('move', () => {
    it('should move a single cell', () => {
      manager.selectCell({ row: 1, col: 1 });
      manager.move(1, 0, false, extent);

      expect(manager.getSelection()).toEqual(cellSelection({ row: 2, col: 1 }));
    });

    it('should clamp at the grid edges', () => {
      manager.selectCell({ row: 0, col: 3 });
      manager.move(-1, 0, false, extent);
      manager.move(0, 1, false, extent);

      expect(manager.getSelection()).toEqual(cellSelection({ row: 0, col: 3 }));
    });

    it('should start from the origin when nothing is selected', () => {
      manager.move(0, 1, false, extent);
      expect(manager.getSelection()).toEqual(cellSelection({ row: 0, col: 1 }));
    });

    it('should extend from the anchor', () => {
      manager.selectCell({ row: 1, col: 1 });
      manager.move(1, 0, true, extent);
      manager.move(0, 1, true, extent);

      expect(manager.getSelection()).toEqual(
        rangeSelection({ row: 1, col: 1 }, { row: 2, col: 2 })
      );
    });

    it('should collapse a range to the moved corner without extend', () => {
      manager.selectRange({ row: 0, col: 0 }, { row: 2, col: 2 });
      manager.move(0, -1, false, extent);

      expect(manager.getSelection()).toEqual(cellSelection({ row: 2, col: 1 }));
    });

    it('should ignore moves in a grid without cells', () => {
      manager.selectCell({ row: 0, col: 0 });
      manager.move(1, 0, false, { rowCount: 0, columnCount: 0 });

      expect(manager.getSelection()).toEqual(cellSelection({ row: 0, col: 0 }));
    });
  });

  // ===========================================================================
  // Mouse Drag
  // ===========================================================================

  describe('drag', () => {
    it('should grow a range from the drag origin', () => {
      manager.beginDrag({ row: 3, col: 2 });
      expect(manager.isDragging()).toBe(true);

      manager.dragTo({ row: 1, col: 0 });

      expect(manager.getSelection()).toEqual(
        rangeSelection({ row: 3, col: 2 }, { row: 1, col: 0 })
      );
    });

    it('should ignore drag movement after the drag ended', () => {
      manager.beginDrag({ row: 0, col: 0 });
      manager.endDrag();
      manager.dragTo({ row: 2, col: 2 });

      expect(manager.isDragging()).toBe(false);
      expect(manager.getSelection()).toEqual(cellSelection({ row: 0, col: 0 }));
    });
  });

  // ===========================================================================
  // Event Subscription
  // ===========================================================================

  describe('subscribe', () => {
    it('should report previous and current selection with the source', () => {
      const events: SelectionChangeEvent[] = [];
      manager.subscribe(event => events.push(event));

      manager.selectCell({ row: 0, col: 0 });
      manager.move(1, 0, false, extent);

      expect(events).toHaveLength(2);
      expect(events[0].previous).toBe(NO_SELECTION);
      expect(events[0].source).toBe('api');
      expect(events[1].current).toEqual(cellSelection({ row: 1, col: 0 }));
      expect(events[1].source).toBe('keyboard');
    });

    it('should not notify when the selection does not change', () => {
      const listener = vi.fn();
      manager.selectCell({ row: 0, col: 0 });
      manager.subscribe(listener);

      manager.selectCell({ row: 0, col: 0 });

      expect(listener).not.toHaveBeenCalled();
    });

    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = manager.subscribe(listener);
      unsubscribe();

      manager.selectRow(1);

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
