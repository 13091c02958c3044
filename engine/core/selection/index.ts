/**
 * Tabula Engine - Selection Module Exports
 */

export {
  NO_SELECTION,
  cellSelection,
  rangeSelection,
  rowSelection,
  columnSelection,
  selectAllSelection,
  cornersToRange,
  normalizedBounds,
  selectionContains,
  pasteAnchor,
  isSingleCell,
  selectionsEqual,
  clearSelectionCells,
  describeSelection,
} from './Selection.js';
export type {
  Selection,
  NoSelection,
  CellRangeSelection,
  ColumnSelection,
  RowSelection,
  GridExtent,
} from './Selection.js';

export {
  SelectionManager,
  createSelectionManager,
  clampToGrid,
  navigationBase,
} from './SelectionManager.js';
export type {
  SelectionChangeSource,
  SelectionChangeEvent,
  SelectionManagerState,
} from './SelectionManager.js';
