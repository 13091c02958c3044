/**
 * Tabula Engine - Keyboard Handler
 *
 * Thin translation layer between raw key events and table intents. It maps
 * key combinations to intents without touching any state; a dispatcher
 * applies them.
 *
 * Architecture:
 * - Raw key event → KeyboardHandler → TableIntent → listeners
 * - Keybindings are a table keyed by combo, replaceable per instance
 * - Mode ('navigation' | 'editing') decides which bindings apply
 */

import type { Direction } from '../types/index.js';
import type { TableIntent } from './InputIntents.js';

// =============================================================================
// Keyboard Event Interface (Framework-Agnostic)
// =============================================================================

/**
 * Compatible with a DOM KeyboardEvent but doesn't require one.
 */
export interface KeyboardEvent {
  /** The key value (e.g., 'a', 'Enter', 'ArrowUp') */
  readonly key: string;
  readonly ctrlKey: boolean;
  readonly shiftKey: boolean;
  readonly altKey: boolean;
  /** Cmd on Mac */
  readonly metaKey: boolean;
  preventDefault?(): void;
  stopPropagation?(): void;
}

export type InputMode = 'navigation' | 'editing';

// =============================================================================
// Keybinding Configuration
// =============================================================================

export interface KeyCombo {
  readonly key: string;
  readonly ctrl?: boolean;
  readonly shift?: boolean;
  readonly alt?: boolean;
}

export interface Keybinding {
  readonly combo: KeyCombo;
  readonly intent: TableIntent;
  readonly when?: InputMode | 'always';
}

const ARROWS: ReadonlyArray<[string, Direction]> = [
  ['ArrowUp', 'up'],
  ['ArrowDown', 'down'],
  ['ArrowLeft', 'left'],
  ['ArrowRight', 'right'],
];

const DEFAULT_KEYBINDINGS: readonly Keybinding[] = [
  // Navigation
  ...ARROWS.map(([key, direction]): Keybinding => ({
    combo: { key },
    intent: { type: 'navigate', direction, extend: false },
    when: 'navigation',
  })),
  ...ARROWS.map(([key, direction]): Keybinding => ({
    combo: { key, shift: true },
    intent: { type: 'navigate', direction, extend: true },
    when: 'navigation',
  })),

  // Editing
  { combo: { key: 'Enter' }, intent: { type: 'confirm' }, when: 'editing' },
  { combo: { key: 'Escape' }, intent: { type: 'escape' }, when: 'always' },
  { combo: { key: 'Delete' }, intent: { type: 'delete' }, when: 'always' },
  { combo: { key: 'Backspace' }, intent: { type: 'delete' }, when: 'always' },

  // Selection
  { combo: { key: 'a', ctrl: true }, intent: { type: 'selectAll' }, when: 'navigation' },

  // Clipboard
  { combo: { key: 'c', ctrl: true }, intent: { type: 'clipboard', action: 'copy' }, when: 'navigation' },
  { combo: { key: 'x', ctrl: true }, intent: { type: 'clipboard', action: 'cut' }, when: 'navigation' },
  { combo: { key: 'v', ctrl: true }, intent: { type: 'clipboard', action: 'paste' }, when: 'always' },

  // History
  { combo: { key: 'z', ctrl: true }, intent: { type: 'history', action: 'undo' }, when: 'navigation' },
  { combo: { key: 'y', ctrl: true }, intent: { type: 'history', action: 'redo' }, when: 'navigation' },
  { combo: { key: 'z', ctrl: true, shift: true }, intent: { type: 'history', action: 'redo' }, when: 'navigation' },

  // Search
  { combo: { key: 'F3' }, intent: { type: 'findStep', direction: 'next' }, when: 'navigation' },
  { combo: { key: 'F3', shift: true }, intent: { type: 'findStep', direction: 'previous' }, when: 'navigation' },
];

export type IntentListener = (intent: TableIntent) => void;

export interface KeyboardHandlerConfig {
  /** Custom keybindings (merged with defaults) */
  keybindings?: readonly Keybinding[];
  /** Replace default keybindings entirely */
  replaceDefaults?: boolean;
  /** Keys that count as typed text (default: any single printable character) */
  textChars?: RegExp;
  /** Treat meta (Cmd) as ctrl */
  metaAsCtrl?: boolean;
}

// =============================================================================
// Key Descriptors
// =============================================================================

/**
 * Parse a descriptor such as "ctrl+shift+z" or "ArrowDown" into an event.
 * Modifier names are case-insensitive; the last segment is the key.
 */
export function keyEventFromDescriptor(descriptor: string): KeyboardEvent {
  const parts = descriptor.split('+');
  // "ctrl++" names the plus key itself
  const key = descriptor.endsWith('++') ? '+' : parts[parts.length - 1];
  const modifiers = new Set(
    parts.slice(0, descriptor.endsWith('++') ? -2 : -1).map(part => part.toLowerCase())
  );

  return {
    key,
    ctrlKey: modifiers.has('ctrl') || modifiers.has('control'),
    shiftKey: modifiers.has('shift'),
    altKey: modifiers.has('alt'),
    metaKey: modifiers.has('meta') || modifiers.has('cmd'),
  };
}

// =============================================================================
// Keyboard Handler Class
// =============================================================================

export class KeyboardHandler {
  private readonly config: Required<KeyboardHandlerConfig>;
  private readonly keybindings: Map<string, Keybinding> = new Map();
  private readonly listeners: Set<IntentListener> = new Set();

  private mode: InputMode = 'navigation';

  constructor(config: KeyboardHandlerConfig = {}) {
    this.config = {
      keybindings: config.keybindings ?? [],
      replaceDefaults: config.replaceDefaults ?? false,
      textChars: config.textChars ?? /^\P{C}$/u,
      metaAsCtrl: config.metaAsCtrl ?? true,
    };
    this.initializeKeybindings();
  }

  private initializeKeybindings(): void {
    if (!this.config.replaceDefaults) {
      for (const binding of DEFAULT_KEYBINDINGS) {
        this.keybindings.set(this.comboToKey(binding.combo), binding);
      }
    }

    for (const binding of this.config.keybindings) {
      this.keybindings.set(this.comboToKey(binding.combo), binding);
    }
  }

  private comboToKey(combo: KeyCombo): string {
    const parts: string[] = [];
    if (combo.ctrl) parts.push('ctrl');
    if (combo.shift) parts.push('shift');
    if (combo.alt) parts.push('alt');
    parts.push(combo.key.toLowerCase());
    return parts.join('+');
  }

  private eventToKey(event: KeyboardEvent): string {
    return this.comboToKey({
      key: event.key,
      ctrl: this.isCtrl(event),
      shift: event.shiftKey,
      alt: event.altKey,
    });
  }

  private isCtrl(event: KeyboardEvent): boolean {
    return event.ctrlKey || (this.config.metaAsCtrl && event.metaKey);
  }

  // ===========================================================================
  // Mode Control
  // ===========================================================================

  /**
   * In 'editing' mode navigation bindings are off and Enter confirms.
   */
  setMode(mode: InputMode): void {
    this.mode = mode;
  }

  getMode(): InputMode {
    return this.mode;
  }

  // ===========================================================================
  // Event Handling
  // ===========================================================================

  /**
   * Translate a key event and emit the resulting intent.
   * Returns the intent, or null when the key is not bound.
   */
  handleKeyDown(event: KeyboardEvent): TableIntent | null {
    const binding = this.keybindings.get(this.eventToKey(event));
    if (binding && this.shouldApplyBinding(binding)) {
      return this.accept(event, binding.intent);
    }

    if (this.isTextKey(event)) {
      return this.accept(event, { type: 'text', text: event.key });
    }

    return null;
  }

  private accept(event: KeyboardEvent, intent: TableIntent): TableIntent {
    event.preventDefault?.();
    event.stopPropagation?.();
    this.emit(intent);
    return intent;
  }

  private shouldApplyBinding(binding: Keybinding): boolean {
    const when = binding.when ?? 'always';
    return when === 'always' || when === this.mode;
  }

  private isTextKey(event: KeyboardEvent): boolean {
    if (this.isCtrl(event) || event.altKey) return false;
    return this.config.textChars.test(event.key);
  }

  // ===========================================================================
  // Event Emission
  // ===========================================================================

  private emit(intent: TableIntent): void {
    for (const listener of this.listeners) {
      try {
        listener(intent);
      } catch (error) {
        console.error('Intent listener error:', error);
      }
    }
  }

  /**
   * Subscribe to intents.
   * Returns unsubscribe function.
   */
  subscribe(listener: IntentListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ===========================================================================
  // Keybinding Management
  // ===========================================================================

  addKeybinding(binding: Keybinding): void {
    this.keybindings.set(this.comboToKey(binding.combo), binding);
  }

  removeKeybinding(combo: KeyCombo): boolean {
    return this.keybindings.delete(this.comboToKey(combo));
  }

  getKeybindings(): readonly Keybinding[] {
    return Array.from(this.keybindings.values());
  }

  resetKeybindings(): void {
    this.keybindings.clear();
    this.initializeKeybindings();
  }
}

export function createKeyboardHandler(config?: KeyboardHandlerConfig): KeyboardHandler {
  return new KeyboardHandler(config);
}
