// Diagnostic events emitted during resolution

import type { TableKind } from './tables.js';

export type DiagnosticSeverity = 'info' | 'warn' | 'error';

export type DiagnosticCode =
  | 'LOCALIZED_SOURCE_MISSING'
  | 'LOCALIZED_SOURCE_MALFORMED'
  | 'LOCALIZED_SOURCE_UNREADABLE'
  | 'UNRESOLVED_REFERENCE'
  | 'SHAPE_MISMATCH'
  | 'RESOLUTION_FAILED';

/**
 * A non-fatal (or already surfaced) condition observed while resolving a table.
 */
export type Diagnostic = {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  kind?: TableKind;
  language?: string;
  /** Dotted path of the value concerned, when there is one */
  path?: string;
  details?: Record<string, unknown>;
};

export type DiagnosticListener = (diagnostic: Diagnostic) => void;
