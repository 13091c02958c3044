/**
 * Tabula Engine - Document Mailbox
 *
 * Single-slot hand-off between asynchronous file reading and the
 * synchronous session. A new deposit replaces anything still pending;
 * take() empties the slot.
 */

export interface PendingDocument {
  bytes: Uint8Array;
  name: string;
}

export class DocumentMailbox {
  private pending: PendingDocument | null = null;

  deposit(bytes: Uint8Array, name: string): void {
    this.pending = { bytes, name };
  }

  take(): PendingDocument | null {
    const pending = this.pending;
    this.pending = null;
    return pending;
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  clear(): void {
    this.pending = null;
  }
}
