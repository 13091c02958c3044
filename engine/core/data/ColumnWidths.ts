/**
 * Tabula Engine - Column Width Map
 *
 * Sparse column → display width map. Only non-default widths are stored.
 * Keys are re-indexed on column insert/delete so a width stays with the
 * column it was set on.
 */

import { DEFAULT_COLUMN_WIDTH, MIN_COLUMN_WIDTH } from '../types/index.js';

export interface ColumnWidthsConfig {
  /** Width reported for columns without an entry (default: 120) */
  defaultWidth?: number;
  /** Smallest width accepted by setWidth (default: 30) */
  minWidth?: number;
}

export class ColumnWidths {
  private widths: Map<number, number> = new Map();
  private config: Required<ColumnWidthsConfig>;

  constructor(config: ColumnWidthsConfig = {}) {
    this.config = {
      defaultWidth: config.defaultWidth ?? DEFAULT_COLUMN_WIDTH,
      minWidth: config.minWidth ?? MIN_COLUMN_WIDTH,
    };
  }

  getWidth(col: number): number {
    return this.widths.get(col) ?? this.config.defaultWidth;
  }

  hasWidth(col: number): boolean {
    return this.widths.has(col);
  }

  /**
   * Set an explicit width, clamped to the configured minimum.
   */
  setWidth(col: number, width: number): void {
    if (col < 0 || !Number.isFinite(width)) return;
    this.widths.set(col, Math.max(this.config.minWidth, width));
  }

  resetWidth(col: number): void {
    this.widths.delete(col);
  }

  clear(): void {
    this.widths.clear();
  }

  /**
   * Explicit entries, ordered by column.
   */
  entries(): Array<[number, number]> {
    return [...this.widths.entries()].sort((a, b) => a[0] - b[0]);
  }

  /**
   * A column was inserted at `col`: entries at or after it move right.
   */
  onColumnInserted(col: number): void {
    const next = new Map<number, number>();
    for (const [index, width] of this.widths) {
      next.set(index >= col ? index + 1 : index, width);
    }
    this.widths = next;
  }

  /**
   * Column `col` was removed: its entry is dropped, later entries move left.
   */
  onColumnDeleted(col: number): void {
    const next = new Map<number, number>();
    for (const [index, width] of this.widths) {
      if (index === col) continue;
      next.set(index > col ? index - 1 : index, width);
    }
    this.widths = next;
  }
}
