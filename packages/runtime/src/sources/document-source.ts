// Locale document source
//
// Reads `<kind>.yaml` / `<kind>_<lang>.yaml` documents and parses them into
// plain mappings. A missing document is not an error here; whether it is
// fatal is up to the resolver.

import { fileURLToPath } from 'node:url';
import { parse, YAMLError } from 'yaml';
import { documentPath, type DocumentMapping, type DocumentValue, type TableKind } from '@station-locale/protocol';
import { MalformedSourceError } from '../errors.js';
import { describeShape, isMapping, joinPath, setEntry } from '../merge/deep-merge.js';
import { createFilesystemReader } from './fs.js';
import type { DocumentReader, DocumentSource, LoadedDocument } from './types.js';

/**
 * The locale documents shipped with this package
 */
export const DEFAULT_LOCALES_DIRECTORY = fileURLToPath(new URL('../../locales', import.meta.url));

export type DocumentSourceOptions = {
  reader: DocumentReader;
  directory: string;
};

/**
 * Convert parsed YAML into the document data model.
 */
function toDocumentValue(value: unknown, filePath: string, path: string): DocumentValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toDocumentValue(item, filePath, `${path}[${index}]`));
  }
  if (isMapping(value)) {
    const mapping: DocumentMapping = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(mapping, key, toDocumentValue(item, filePath, joinPath(path, key)));
    }
    return mapping;
  }
  throw new MalformedSourceError(filePath, `unsupported value (${describeShape(value)}) at "${path}"`);
}

/**
 * Parse the text of a locale document.
 *
 * @param text - YAML source
 * @param filePath - Path used in error messages
 * @returns The document as a mapping; an empty document yields `{}`
 * @throws MalformedSourceError if the text is not YAML or not a mapping
 */
export function parseDocument(text: string, filePath: string): DocumentMapping {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    if (error instanceof YAMLError) {
      throw new MalformedSourceError(filePath, error.message, error);
    }
    throw error;
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new MalformedSourceError(filePath, `top level is ${describeShape(parsed)}, expected a mapping`);
  }

  const mapping: DocumentMapping = {};
  for (const [key, value] of Object.entries(parsed)) {
    setEntry(mapping, key, toDocumentValue(value, filePath, key));
  }
  return mapping;
}

/**
 * Create a DocumentSource over a directory of YAML documents.
 */
export function createDocumentSource(options: DocumentSourceOptions): DocumentSource {
  const { reader, directory } = options;

  return {
    async load(kind: TableKind, language?: string): Promise<LoadedDocument> {
      const path = documentPath(directory, kind, language);

      if (!(await reader.exists(path))) {
        return { kind, language, path, status: 'missing', content: {} };
      }

      const text = await reader.readFile(path);
      return { kind, language, path, status: 'found', content: parseDocument(text, path) };
    },
  };
}

/**
 * Create a DocumentSource over the documents shipped with this package.
 */
export function createBundledDocumentSource(directory = DEFAULT_LOCALES_DIRECTORY): DocumentSource {
  return createDocumentSource({ reader: createFilesystemReader(), directory });
}
