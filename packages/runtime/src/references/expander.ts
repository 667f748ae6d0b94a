// Reference expansion
//
// Replaces "@name" leaves with the ordered display values of the named
// enumeration. Runs on fully merged tables only, so a reference from any
// tier resolves against the enumeration table of the same language.

import type {
  DocumentMapping,
  DocumentValue,
  ReadonlyDocumentMapping,
  ReadonlyDocumentValue,
  Scalar,
} from '@station-locale/protocol';
import { cloneValue, isMapping, joinPath, setEntry } from '../merge/deep-merge.js';

const REFERENCE_PATTERN = /^@([A-Za-z_][A-Za-z0-9_]*)$/;

/**
 * A reference whose enumeration could not be found
 */
export type UnresolvedReference = {
  /** The literal leaf, e.g. "@cardinal_directions" */
  reference: string;
  /** Enumeration name without the marker */
  name: string;
  /** Dotted path of the leaf, starting with the entity key */
  path: string;
};

export type ExpandReferencesOptions = {
  onUnresolved?: (reference: UnresolvedReference) => void;
};

/**
 * Extract the enumeration name from a reference leaf.
 *
 * @returns The name, or null if the value is not a reference
 */
export function parseReference(value: string): string | null {
  const match = REFERENCE_PATTERN.exec(value);
  return match ? match[1] : null;
}

function isScalar(value: ReadonlyDocumentValue): value is Scalar {
  return value === null || typeof value !== 'object';
}

function compareEnumerationKeys(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  const aNumeric = a.trim() !== '' && Number.isFinite(na);
  const bNumeric = b.trim() !== '' && Number.isFinite(nb);

  if (aNumeric && bNumeric) return na - nb;
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Display values of an enumeration, ordered by key ascending.
 *
 * @returns The values, or null if the enumeration is not a mapping of scalars
 */
export function enumerationValues(enumeration: ReadonlyDocumentValue | undefined): Scalar[] | null {
  if (!isMapping(enumeration)) {
    return null;
  }

  const keys = Object.keys(enumeration).sort(compareEnumerationKeys);
  const values: Scalar[] = [];
  for (const key of keys) {
    const value = enumeration[key];
    if (!isScalar(value)) {
      return null;
    }
    values.push(value);
  }
  return values;
}

function expandValue(
  value: DocumentValue,
  enums: ReadonlyDocumentMapping,
  path: string,
  options: ExpandReferencesOptions
): DocumentValue {
  if (typeof value === 'string') {
    const name = parseReference(value);
    if (name === null) {
      return value;
    }

    const values = Object.hasOwn(enums, name) ? enumerationValues(enums[name]) : null;
    if (values === null) {
      options.onUnresolved?.({ reference: value, name, path });
      return value;
    }
    return values;
  }

  if (isMapping(value)) {
    const result: DocumentMapping = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(result, key, expandValue(item, enums, joinPath(path, key), options));
    }
    return result;
  }

  // Lists hold scalars only, so their elements are never expanded.
  return cloneValue(value);
}

/**
 * Expand every reference leaf in a table or record.
 *
 * Unresolved references stay as literal strings and are reported through
 * `options.onUnresolved`; they never throw.
 *
 * @param mapping - A merged definition table (or a single record)
 * @param enums - The resolved enumeration table
 * @returns A new mapping; the input is not modified
 */
export function expandReferences(
  mapping: DocumentMapping,
  enums: ReadonlyDocumentMapping,
  options: ExpandReferencesOptions = {}
): DocumentMapping {
  const result: DocumentMapping = {};
  for (const [key, value] of Object.entries(mapping)) {
    setEntry(result, key, expandValue(value, enums, key, options));
  }
  return result;
}
