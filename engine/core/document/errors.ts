/**
 * Tabula Engine - Document Errors
 */

/**
 * Source bytes could not be read as a table. The grid is left untouched.
 */
export class DocumentLoadError extends Error {
  documentName: string;

  constructor(message: string, documentName: string, options?: { cause?: unknown }) {
    super(`Cannot load ${documentName}: ${message}`, options);
    this.name = 'DocumentLoadError';
    this.documentName = documentName;
  }
}

/**
 * The save target rejected the document. Grid and dirty flag are unchanged.
 */
export class DocumentSaveError extends Error {
  documentName: string;

  constructor(message: string, documentName: string, options?: { cause?: unknown }) {
    super(`Cannot save ${documentName}: ${message}`, options);
    this.name = 'DocumentSaveError';
    this.documentName = documentName;
  }
}
