/**
 * Tabula Engine
 *
 * Editing core for a single rectangular table of text cells:
 * - Rectangular grid with row/column insert and delete
 * - Cell, range, row and column selection with keyboard and drag
 * - In-place cell editing with commit and cancel
 * - Tab-separated clipboard, snapshot undo/redo, search and stable sort
 *
 * @example
 * ```typescript
 * import { TableSession } from 'tabula-engine';
 *
 * const session = new TableSession({ defaultRows: 5, defaultColumns: 3 });
 *
 * session.selectCell({ row: 0, col: 0 });
 * session.typeText('42');
 * session.confirmEdit();
 *
 * session.selectAll();
 * console.log(session.copy()); // "42\t\t\n\t\t\n..."
 * ```
 */

export * from './core/index.js';
