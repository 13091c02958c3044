/**
 * Tabula Engine - Editing Module Exports
 */

export { EditSessionManager, createEditSessionManager } from './EditSessionManager.js';
export type {
  EditSession,
  EditCommit,
  EditSessionEvents,
  EditSessionSubscriber,
  EditSessionUnsubscribe,
} from './EditSessionManager.js';
