/**
 * Tabula Engine - Clipboard Manager
 *
 * Bridge between the session and a platform clipboard.
 *
 * - The platform side is an injected ClipboardTransport
 * - Empty text is never written (nothing to copy)
 * - Transport failures never propagate: the text was already computed, so the
 *   failure is reported through onTransportError and the operation carries on
 */

// =============================================================================
// Types
// =============================================================================

export interface ClipboardTransport {
  readText(): string | null;
  writeText(text: string): void;
}

export type ClipboardOperation = 'read' | 'write';

export interface ClipboardManagerEvents {
  /** Called after text was handed to the transport */
  onCopy?: (text: string) => void;
  /** Called when the transport threw */
  onTransportError?: (error: unknown, operation: ClipboardOperation) => void;
}

// =============================================================================
// In-memory Transport
// =============================================================================

/**
 * Process-local clipboard, used when no platform clipboard is attached.
 */
export class MemoryClipboardTransport implements ClipboardTransport {
  private text: string | null = null;

  readText(): string | null {
    return this.text;
  }

  writeText(text: string): void {
    this.text = text;
  }
}

// =============================================================================
// Clipboard Manager
// =============================================================================

export class ClipboardManager {
  private transport: ClipboardTransport;
  private events: ClipboardManagerEvents = {};

  constructor(transport: ClipboardTransport = new MemoryClipboardTransport()) {
    this.transport = transport;
  }

  setEventHandlers(events: ClipboardManagerEvents): void {
    this.events = { ...this.events, ...events };
  }

  setTransport(transport: ClipboardTransport): void {
    this.transport = transport;
  }

  /**
   * Hand text to the transport. Returns true when it was written.
   */
  writeText(text: string): boolean {
    if (text.length === 0) return false;

    try {
      this.transport.writeText(text);
    } catch (error) {
      this.events.onTransportError?.(error, 'write');
      return false;
    }

    this.events.onCopy?.(text);
    return true;
  }

  /**
   * Current transport text, or null when empty or unavailable.
   */
  readText(): string | null {
    try {
      return this.transport.readText();
    } catch (error) {
      this.events.onTransportError?.(error, 'read');
      return null;
    }
  }
}

export function createClipboardManager(transport?: ClipboardTransport): ClipboardManager {
  return new ClipboardManager(transport);
}
