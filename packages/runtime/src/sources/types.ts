// Document storage abstractions.
// Allows testing and different storage backends (filesystem, in-memory).

import type { DocumentMapping, TableKind } from '@station-locale/protocol';

/**
 * Abstraction for reading locale documents.
 */
export interface DocumentReader {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}

/**
 * A document as returned by a DocumentSource.
 * Missing documents come back with empty content rather than an error.
 */
export type LoadedDocument = {
  kind: TableKind;
  language?: string;
  path: string;
  status: 'found' | 'missing';
  content: DocumentMapping;
};

/**
 * Reads locale documents keyed by (kind, language).
 */
export interface DocumentSource {
  load(kind: TableKind, language?: string): Promise<LoadedDocument>;
}
