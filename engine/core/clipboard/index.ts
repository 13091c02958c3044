/**
 * Tabula Engine - Clipboard Module Exports
 */

export {
  ClipboardManager,
  MemoryClipboardTransport,
  createClipboardManager,
} from './ClipboardManager.js';
export type {
  ClipboardTransport,
  ClipboardOperation,
  ClipboardManagerEvents,
} from './ClipboardManager.js';

export {
  CELL_SEPARATOR,
  ROW_SEPARATOR,
  extractText,
  splitClipboardText,
  pasteText,
} from './ClipboardCodec.js';
export type { PasteResult } from './ClipboardCodec.js';
