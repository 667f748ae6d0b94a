// Deep merge of layered locale documents
//
// Overlays are always the higher-priority argument. Mappings merge
// recursively; anything else (scalars, lists, type mismatches) is replaced
// outright by the overlay value. Results never share containers with the
// inputs.

import type {
  DocumentMapping,
  DocumentValue,
  ReadonlyDocumentMapping,
  ReadonlyDocumentValue,
} from '@station-locale/protocol';
import { ShapeMismatchError } from '../errors.js';

export function isMapping(value: unknown): value is DocumentMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Describe a value's shape for error messages
 */
export function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (isMapping(value)) return 'a mapping';
  return `a ${typeof value}`;
}

export function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

/**
 * Set an own entry on a mapping. Keys such as `__proto__` become ordinary
 * entries instead of touching the prototype.
 */
export function setEntry<T>(mapping: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(mapping, key, { value, writable: true, enumerable: true, configurable: true });
}

function isList(value: ReadonlyDocumentValue): value is readonly ReadonlyDocumentValue[] {
  return Array.isArray(value);
}

/**
 * Deep copy a document value.
 * Accepts frozen values; the copy is always mutable.
 */
export function cloneValue(value: ReadonlyDocumentValue): DocumentValue {
  if (isList(value)) {
    return value.map(cloneValue);
  }
  if (value !== null && typeof value === 'object') {
    return cloneMapping(value);
  }
  return value;
}

export function cloneMapping(mapping: ReadonlyDocumentMapping): DocumentMapping {
  const result: DocumentMapping = {};
  for (const [key, value] of Object.entries(mapping)) {
    setEntry(result, key, cloneValue(value));
  }
  return result;
}

function mergeMappings(
  base: ReadonlyDocumentMapping,
  overlay: ReadonlyDocumentMapping,
  path: string
): DocumentMapping {
  const result: DocumentMapping = {};

  for (const [key, baseValue] of Object.entries(base)) {
    if (!Object.hasOwn(overlay, key)) {
      setEntry(result, key, cloneValue(baseValue));
      continue;
    }

    const overlayValue = overlay[key];
    setEntry(
      result,
      key,
      isMapping(baseValue) && isMapping(overlayValue)
        ? mergeMappings(baseValue, overlayValue, joinPath(path, key))
        : cloneValue(overlayValue)
    );
  }

  for (const [key, overlayValue] of Object.entries(overlay)) {
    if (!Object.hasOwn(base, key)) {
      setEntry(result, key, cloneValue(overlayValue));
    }
  }

  return result;
}

/**
 * Merge an overlay onto a base.
 *
 * Neither input is mutated and the result shares no nested containers
 * with them.
 *
 * @param base - Lower-priority mapping
 * @param overlay - Higher-priority mapping; may be empty
 * @param path - Dotted path of the arguments, used in error messages
 * @throws ShapeMismatchError if either argument is not a mapping
 */
export function merge(
  base: ReadonlyDocumentValue,
  overlay: ReadonlyDocumentValue,
  path = ''
): DocumentMapping {
  if (!isMapping(base)) {
    throw new ShapeMismatchError(path, `base is ${describeShape(base)}, expected a mapping`);
  }
  if (!isMapping(overlay)) {
    throw new ShapeMismatchError(path, `overlay is ${describeShape(overlay)}, expected a mapping`);
  }
  return mergeMappings(base, overlay, path);
}

/**
 * Fold any number of overlays onto a base, left to right.
 * Each overlay has higher priority than everything before it.
 */
export function mergeAll(base: ReadonlyDocumentValue, ...overlays: ReadonlyDocumentValue[]): DocumentMapping {
  return overlays.reduce<DocumentMapping>((acc, overlay) => merge(acc, overlay), merge(base, {}));
}

/**
 * Merge definition tables.
 *
 * Like `merge`, but every entity in the overlay must itself be a mapping:
 * a table entry is an entity record, so a stray scalar or list at entity
 * level cannot be merged without dropping the base record's fields.
 *
 * @param label - Path prefix for errors, usually the table kind
 */
export function mergeTables(
  base: ReadonlyDocumentValue,
  overlay: ReadonlyDocumentValue,
  label = ''
): DocumentMapping {
  if (isMapping(overlay)) {
    for (const [entityKey, record] of Object.entries(overlay)) {
      if (!isMapping(record)) {
        throw new ShapeMismatchError(
          joinPath(label, entityKey),
          `entity record is ${describeShape(record)}, expected a mapping`
        );
      }
    }
  }
  return merge(base, overlay, label);
}

/**
 * Recursively freeze a mapping and everything in it.
 */
export function deepFreeze(mapping: DocumentMapping): ReadonlyDocumentMapping {
  freezeValue(mapping);
  return mapping;
}

function freezeValue(value: ReadonlyDocumentValue): void {
  if (isList(value)) {
    value.forEach(freezeValue);
    Object.freeze(value);
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(freezeValue);
    Object.freeze(value);
  }
}
