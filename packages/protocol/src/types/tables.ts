// Definition tables

import type { DocumentMapping, ReadonlyDocumentMapping } from './common.js';

/**
 * The kinds of table the resolver produces.
 * Each kind is backed by one base document and its localized variants.
 */
export type TableKind = 'sensors' | 'units' | 'enums';

export const TABLE_KINDS: readonly TableKind[] = ['sensors', 'units', 'enums'];

/**
 * A nested mapping describing one entity (a sensor, a unit, an enumeration).
 * No schema is enforced; conformance is the consumer's concern.
 *
 * Enumerations are entity records too: integer-like key → display string.
 */
export type EntityRecord = DocumentMapping;

/**
 * Entity key → entity record.
 */
export type DefinitionTable = { [entityKey: string]: EntityRecord };

/**
 * A resolved table: merged, references expanded, deeply frozen.
 */
export type ResolvedTable = ReadonlyDocumentMapping;

export function isTableKind(value: string): value is TableKind {
  return TABLE_KINDS.some((kind) => kind === value);
}
