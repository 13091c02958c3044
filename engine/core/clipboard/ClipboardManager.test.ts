/**
 * ClipboardManager Unit Tests
 *
 * Tests the transport bridge:
 * - Writes and reads through the transport
 * - Empty text never reaches the transport
 * - Transport failures are reported, never thrown
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ClipboardManager,
  MemoryClipboardTransport,
  createClipboardManager,
} from './ClipboardManager.js';
import type { ClipboardTransport } from './ClipboardManager.js';

class FailingTransport implements ClipboardTransport {
  readText(): string | null {
    throw new Error('clipboard unavailable');
  }

  writeText(_text: string): void {
    throw new Error('clipboard unavailable');
  }
}

class RecordingTransport implements ClipboardTransport {
  writes: string[] = [];

  readText(): string | null {
    return this.writes[this.writes.length - 1] ?? null;
  }

  writeText(text: string): void {
    this.writes.push(text);
  }
}

describe('ClipboardManager', () => {
  let transport: RecordingTransport;
  let manager: ClipboardManager;

  beforeEach(() => {
    transport = new RecordingTransport();
    manager = new ClipboardManager(transport);
  });

  // ===========================================================================
  // Writing
  // ===========================================================================

  describe('writeText', () => {
    it('should hand text to the transport', () => {
      const onCopy = vi.fn();
      manager.setEventHandlers({ onCopy });

      expect(manager.writeText('a\tb')).toBe(true);

      expect(transport.writes).toEqual(['a\tb']);
      expect(onCopy).toHaveBeenCalledWith('a\tb');
    });

    it('should not touch the transport for empty text', () => {
      expect(manager.writeText('')).toBe(false);
      expect(transport.writes).toEqual([]);
    });

    it('should report transport failures instead of throwing', () => {
      const onTransportError = vi.fn();
      const failing = createClipboardManager(new FailingTransport());
      failing.setEventHandlers({ onTransportError });

      expect(failing.writeText('x')).toBe(false);
      expect(onTransportError).toHaveBeenCalledTimes(1);
      expect(onTransportError.mock.calls[0][1]).toBe('write');
    });
  });

  // ===========================================================================
  // Reading
  // ===========================================================================

  describe('readText', () => {
    it('should read what was written', () => {
      manager.writeText('hello');
      expect(manager.readText()).toBe('hello');
    });

    it('should read null from a failing transport', () => {
      const onTransportError = vi.fn();
      const failing = new ClipboardManager(new FailingTransport());
      failing.setEventHandlers({ onTransportError });

      expect(failing.readText()).toBeNull();
      expect(onTransportError.mock.calls[0][1]).toBe('read');
    });
  });

  describe('transport swap', () => {
    it('should use the in-memory transport by default and accept a new one', () => {
      const defaults = new ClipboardManager();
      defaults.writeText('local');
      expect(defaults.readText()).toBe('local');

      defaults.setTransport(new MemoryClipboardTransport());
      expect(defaults.readText()).toBeNull();
    });
  });
});
