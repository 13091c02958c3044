/**
 * Tabula Engine - History Module Exports
 */

export { UndoRedoManager, createUndoRedoManager } from './UndoRedoManager.js';
export type {
  HistoryEntry,
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
} from './UndoRedoManager.js';
