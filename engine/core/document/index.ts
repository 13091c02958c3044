/**
 * Document boundary - exports
 */

export { DocumentMailbox } from './DocumentMailbox.js';
export type { PendingDocument } from './DocumentMailbox.js';

export { TsvDocumentCodec, createTsvDocumentCodec } from './TsvDocumentCodec.js';
export type { DocumentCodec } from './TsvDocumentCodec.js';

export { DocumentLoadError, DocumentSaveError } from './errors.js';
