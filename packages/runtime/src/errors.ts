// Runtime error types

import type { TableKind } from '@station-locale/protocol';

/**
 * Base class for all locale resolution errors.
 * Provides structured error information for debugging and logging.
 */
export class LocaleError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocaleError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends LocaleError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a required document does not exist.
 * Only raised for the base (tier 1) document of a table kind.
 */
export class SourceUnavailableError extends LocaleError {
  readonly kind: TableKind;
  readonly path: string;

  constructor(kind: TableKind, path: string) {
    super('SOURCE_UNAVAILABLE', `Base document for "${kind}" not found: ${path}`);
    this.name = 'SourceUnavailableError';
    this.kind = kind;
    this.path = path;
  }
}

/**
 * Error when a document exists but does not parse into a mapping.
 */
export class MalformedSourceError extends LocaleError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('MALFORMED_SOURCE', `Malformed document ${path}: ${reason}`, { cause });
    this.name = 'MalformedSourceError';
    this.path = path;
  }
}

/**
 * Error when merge or adaptation meets incompatible shapes at a path.
 */
export class ShapeMismatchError extends LocaleError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('SHAPE_MISMATCH', `Shape mismatch at "${path || '<root>'}": ${reason}`);
    this.name = 'ShapeMismatchError';
    this.path = path;
  }
}

/**
 * Error when a transform name has no registered implementation.
 */
export class UnknownTransformError extends LocaleError {
  readonly transformName: string;

  constructor(transformName: string) {
    super('UNKNOWN_TRANSFORM', `No transform registered under "${transformName}"`);
    this.name = 'UnknownTransformError';
    this.transformName = transformName;
  }
}

/**
 * Check whether an error carries a locale error code
 */
export function isLocaleError(error: unknown): error is LocaleError {
  return error instanceof LocaleError;
}
