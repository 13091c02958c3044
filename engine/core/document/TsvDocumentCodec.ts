/**
 * Tabula Engine - TSV Document Codec
 *
 * Tab-separated text with one row per line. Fields are not quoted; hosts
 * that need CSV quoting plug in their own DocumentCodec.
 */

import { TextDecoder, TextEncoder } from 'node:util';
import type { GridRows, ReadonlyGridRows } from '../types/index.js';
import { DocumentLoadError } from './errors.js';

export interface DocumentCodec {
  /** Short format name, e.g. "tsv" */
  readonly format: string;
  /**
   * Bytes to rows. Throws DocumentLoadError when the bytes are not a table.
   */
  decode(bytes: Uint8Array, name: string): GridRows;
  encode(rows: ReadonlyGridRows): Uint8Array;
}

export class TsvDocumentCodec implements DocumentCodec {
  readonly format = 'tsv';
  private decoder = new TextDecoder('utf-8', { fatal: true });
  private encoder = new TextEncoder();

  decode(bytes: Uint8Array, name: string = 'document'): GridRows {
    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch (error) {
      throw new DocumentLoadError('not valid UTF-8 text', name, { cause: error });
    }

    if (text.length === 0) return [];

    const lines = text.split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines.map(line => line.split('\t'));
  }

  encode(rows: ReadonlyGridRows): Uint8Array {
    if (rows.length === 0) return new Uint8Array(0);
    const text = rows.map(row => row.join('\t')).join('\n') + '\n';
    return this.encoder.encode(text);
  }
}

export function createTsvDocumentCodec(): TsvDocumentCodec {
  return new TsvDocumentCodec();
}
