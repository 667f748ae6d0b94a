// Locale document naming
// Defines how (kind, language) pairs map onto document file names

import type { TableKind } from '../types/tables.js';

/**
 * File extension of every locale document
 */
export const DOCUMENT_EXTENSION = 'yaml';

/**
 * Language codes the runtime accepts: `cs`, `de`, `pt_BR`, `zh-Hant`.
 * Restricting the alphabet keeps a language code from escaping the
 * locales directory once it becomes part of a file name.
 */
const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(?:[_-][A-Za-z]{2,4})?$/;

export function isValidLanguageCode(language: string): boolean {
  return LANGUAGE_CODE_PATTERN.test(language);
}

/**
 * Build the document file name for a table kind.
 *
 * @example
 * documentFileName('sensors')       // 'sensors.yaml'
 * documentFileName('sensors', 'cs') // 'sensors_cs.yaml'
 */
export function documentFileName(kind: TableKind, language?: string): string {
  const suffix = language ? `_${language}` : '';
  return `${kind}${suffix}.${DOCUMENT_EXTENSION}`;
}

/**
 * Build the path of a document inside a locales directory
 */
export function documentPath(directory: string, kind: TableKind, language?: string): string {
  const trimmed = directory.endsWith('/') ? directory.slice(0, -1) : directory;
  return `${trimmed}/${documentFileName(kind, language)}`;
}
