/**
 * Tabula Engine - Data Module Exports
 */

export { GridStore, shiftIndexOnInsert, shiftIndexOnDelete } from './GridStore.js';
export type {
  StructureAxis,
  StructureChange,
  GridStoreEvents,
  GridStoreConfig,
} from './GridStore.js';

export { ColumnWidths } from './ColumnWidths.js';
export type { ColumnWidthsConfig } from './ColumnWidths.js';
