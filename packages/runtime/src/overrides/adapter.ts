// Override adapter
//
// Turns the host's own override structure (string leaves, arbitrary depth)
// into definition tables shaped like parsed locale documents, so they merge
// with the same engine.

import {
  isTableKind,
  type DefinitionTable,
  type DocumentMapping,
  type DocumentValue,
  type RuntimeOverrides,
  type Scalar,
} from '@station-locale/protocol';
import { ShapeMismatchError } from '../errors.js';
import { describeShape, isMapping, joinPath, setEntry } from '../merge/deep-merge.js';

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Best-effort conversion of a host string leaf.
 *
 * Numeric strings within the range of a finite number become numbers and
 * "true"/"false" (any case) become booleans; everything else stays a string.
 */
export function coerceScalar(value: string): Scalar {
  if (NUMERIC_PATTERN.test(value)) {
    const number = Number(value);
    if (Number.isFinite(number)) {
      return number;
    }
  }
  const lowered = value.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return value;
}

function adaptLeaf(value: unknown, path: string): Scalar | undefined {
  if (typeof value === 'string') {
    return coerceScalar(value);
  }
  if (value === null || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'number') {
    throw new ShapeMismatchError(path, `non-finite number ${value}`);
  }
  return undefined;
}

function adaptMapping(value: Record<string, unknown>, path: string): DocumentMapping {
  const mapping: DocumentMapping = {};
  for (const [key, item] of Object.entries(value)) {
    setEntry(mapping, key, adaptNode(item, joinPath(path, key)));
  }
  return mapping;
}

function adaptNode(value: unknown, path: string): DocumentValue {
  const leaf = adaptLeaf(value, path);
  if (leaf !== undefined) {
    return leaf;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => {
      const element = adaptLeaf(item, `${path}[${index}]`);
      if (element === undefined) {
        throw new ShapeMismatchError(
          `${path}[${index}]`,
          `list element is ${describeShape(item)}; lists may only hold scalars`
        );
      }
      return element;
    });
  }

  if (isMapping(value)) {
    return adaptMapping(value, path);
  }

  throw new ShapeMismatchError(path, `unsupported value (${describeShape(value)})`);
}

/**
 * Adapt one host override table (entity key → nested record).
 *
 * @param native - The host structure for one namespace
 * @param label - Path prefix for errors, usually the namespace
 * @throws ShapeMismatchError if a list or scalar appears where a mapping is
 *   expected, or a list holds anything but scalars
 */
export function adaptOverrideTable(native: unknown, label = ''): DefinitionTable {
  if (!isMapping(native)) {
    throw new ShapeMismatchError(label, `override table is ${describeShape(native)}, expected a mapping`);
  }

  const table: DefinitionTable = {};
  for (const [entityKey, record] of Object.entries(native)) {
    const path = joinPath(label, entityKey);
    if (!isMapping(record)) {
      throw new ShapeMismatchError(path, `entity record is ${describeShape(record)}, expected a mapping`);
    }
    setEntry(table, entityKey, adaptMapping(record, path));
  }
  return table;
}

export type AdaptOverridesResult = {
  overrides: RuntimeOverrides;
  /** Top-level keys that are not an override namespace */
  ignored: string[];
};

/**
 * Adapt the host's override structure with its `sensors`, `units` and
 * `enums` namespaces.
 *
 * @throws ShapeMismatchError if the structure or a namespace is malformed
 */
export function adaptOverrides(native: unknown): AdaptOverridesResult {
  if (native === undefined || native === null) {
    return { overrides: {}, ignored: [] };
  }
  if (!isMapping(native)) {
    throw new ShapeMismatchError('', `overrides are ${describeShape(native)}, expected a mapping`);
  }

  const overrides: RuntimeOverrides = {};
  const ignored: string[] = [];

  for (const [namespace, table] of Object.entries(native)) {
    if (!isTableKind(namespace)) {
      ignored.push(namespace);
      continue;
    }
    if (table === undefined || table === null) {
      continue;
    }
    overrides[namespace] = adaptOverrideTable(table, namespace);
  }

  return { overrides, ignored };
}
