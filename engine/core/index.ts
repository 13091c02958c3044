/**
 * Tabula Engine - Core Module Exports
 */

// Session
export { TableSession, createTableSession } from './TableSession.js';
export type {
  TableSessionConfig,
  TableSessionOptions,
  TableSessionEvents,
  TableSessionState,
  ChangeReason,
  PollResult,
  DocumentSink,
} from './TableSession.js';

// Types
export * from './types/index.js';

// Modules
export * from './data/index.js';
export * from './selection/index.js';
export * from './editing/index.js';
export * from './history/index.js';
export * from './clipboard/index.js';
export * from './operations/index.js';
export * from './navigation/index.js';
export * from './document/index.js';
