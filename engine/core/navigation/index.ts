/**
 * Tabula Engine - Navigation Module Exports
 */

export { columnHeaderMenu, rowHeaderMenu, cellContextMenu } from './InputIntents.js';
export type {
  TableIntent,
  IntentType,
  MenuItem,
  ActivateCellIntent,
  DragToIntent,
  EndDragIntent,
  BeginEditIntent,
  NavigateIntent,
  TextIntent,
  ConfirmIntent,
  EscapeIntent,
  BlurIntent,
  DeleteIntent,
  ClipboardIntent,
  HistoryIntent,
  SelectAllIntent,
  SelectRowIntent,
  SelectColumnIntent,
  FindIntent,
  FindStepIntent,
  StructureIntent,
  AppendIntent,
  SortIntent,
  ClearCellIntent,
  ResizeColumnIntent,
  NewDocumentIntent,
} from './InputIntents.js';

export { dispatchIntent, createIntentDispatcher } from './IntentDispatcher.js';
export type { DispatchResult } from './IntentDispatcher.js';

export {
  KeyboardHandler,
  createKeyboardHandler,
  keyEventFromDescriptor,
} from './KeyboardHandler.js';
export type {
  KeyboardEvent,
  InputMode,
  KeyCombo,
  Keybinding,
  IntentListener,
  KeyboardHandlerConfig,
} from './KeyboardHandler.js';
