// Common types used across the protocol

/**
 * A leaf value as it appears in a locale document.
 */
export type Scalar = string | number | boolean | null;

/**
 * Any value that can appear in a parsed locale document.
 */
export type DocumentValue = Scalar | DocumentValue[] | DocumentMapping;

/**
 * A nested mapping of arbitrary depth.
 *
 * Keys are always strings. Integer-like keys from YAML (enumeration
 * indexes such as `0`, `1`) are carried as their decimal string form.
 */
export type DocumentMapping = { [key: string]: DocumentValue };

/**
 * Deeply read-only view of a document value.
 * Resolved tables are handed out through this type.
 */
export type ReadonlyDocumentValue =
  | Scalar
  | readonly ReadonlyDocumentValue[]
  | ReadonlyDocumentMapping;

export type ReadonlyDocumentMapping = {
  readonly [key: string]: ReadonlyDocumentValue;
};
