// Locale resolution
//
// Resolves a table kind for a language by layering base, localized and
// override definitions, then expanding enumeration references in sensors.
// Each (kind, language) pair is loaded at most once at a time and cached
// for the life of the resolver.

import {
  TABLE_KINDS,
  isTableKind,
  isValidLanguageCode,
  type Diagnostic,
  type DiagnosticListener,
  type DocumentMapping,
  type ReadonlyDocumentMapping,
  type ResolvedTable,
  type RuntimeOverrides,
  type TableKind,
} from '@station-locale/protocol';
import {
  MalformedSourceError,
  ShapeMismatchError,
  SourceUnavailableError,
  ValidationError,
  isLocaleError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import { cloneMapping, deepFreeze, mergeTables } from '../merge/deep-merge.js';
import { expandReferences } from '../references/expander.js';
import type { DocumentSource } from '../sources/types.js';

export const DEFAULT_LANGUAGE = 'en';

export type ResolutionState = 'unresolved' | 'loading' | 'resolved';

export type LocaleResolverOptions = {
  source: DocumentSource;
  /** Tier 3 tables; copied and frozen at construction */
  overrides?: RuntimeOverrides;
  /** Language whose definitions are the base documents themselves */
  defaultLanguage?: string;
  /** Language used when a call does not name one */
  language?: string;
  logger?: Logger;
};

function cacheKey(kind: TableKind, language: string | undefined): string {
  return `${kind}:${language ?? ''}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves and caches locale tables.
 *
 * @example
 * const resolver = new LocaleResolver({ source: createBundledDocumentSource() });
 * const sensors = await resolver.resolve('sensors', 'cs');
 */
export class LocaleResolver {
  readonly defaultLanguage: string;
  /** Preferred language; unset when it is the default language */
  readonly language: string | undefined;

  private readonly source: DocumentSource;
  private readonly overrides: Readonly<Partial<Record<TableKind, ReadonlyDocumentMapping>>>;
  private readonly logger: Logger;

  private readonly cache = new Map<string, ResolvedTable>();
  private readonly inflight = new Map<string, Promise<ResolvedTable>>();
  private readonly listeners = new Set<DiagnosticListener>();

  /**
   * @throws ValidationError if either language is not a valid language code
   */
  constructor(options: LocaleResolverOptions) {
    this.source = options.source;
    this.logger = options.logger ?? silentLogger;

    const defaultLanguage = options.defaultLanguage ?? DEFAULT_LANGUAGE;
    if (!isValidLanguageCode(defaultLanguage)) {
      throw new ValidationError(`Invalid default language: ${defaultLanguage}`, {
        field: 'defaultLanguage',
      });
    }
    this.defaultLanguage = defaultLanguage;
    this.language = this.normalizeLanguage(options.language);

    const overrides: Partial<Record<TableKind, ReadonlyDocumentMapping>> = {};
    for (const kind of TABLE_KINDS) {
      const table = options.overrides?.[kind];
      if (table) {
        overrides[kind] = deepFreeze(cloneMapping(table));
      }
    }
    this.overrides = Object.freeze(overrides);
  }

  /**
   * Resolve a table kind for a language.
   *
   * Concurrent calls for the same pair share one load; once resolved, every
   * call returns the same frozen object.
   *
   * @param language - Language code; unset or the default language means
   *   base definitions only
   * @throws SourceUnavailableError if the base document is missing
   * @throws MalformedSourceError if the base document does not parse
   * @throws ShapeMismatchError if a tier cannot be merged onto the one below
   * @throws ValidationError if the language code is invalid
   */
  async resolve(kind: TableKind, language: string | undefined = this.language): Promise<ResolvedTable> {
    this.assertKind(kind);
    return this.resolvePair(kind, this.normalizeLanguage(language));
  }

  resolveSensors(language?: string): Promise<ResolvedTable> {
    return this.resolve('sensors', language);
  }

  resolveUnits(language?: string): Promise<ResolvedTable> {
    return this.resolve('units', language);
  }

  resolveEnums(language?: string): Promise<ResolvedTable> {
    return this.resolve('enums', language);
  }

  /**
   * Load a pair again, bypassing the cache.
   *
   * The cached table is replaced only when the new load succeeds. A call
   * made while the pair is loading joins that load.
   */
  async reresolve(kind: TableKind, language: string | undefined = this.language): Promise<ResolvedTable> {
    this.assertKind(kind);
    const normalized = this.normalizeLanguage(language);
    return this.load(kind, normalized, cacheKey(kind, normalized));
  }

  /**
   * The cached table for a pair, without loading it.
   */
  peek(kind: TableKind, language: string | undefined = this.language): ResolvedTable | undefined {
    return this.cache.get(cacheKey(kind, this.normalizeLanguage(language)));
  }

  getState(kind: TableKind, language: string | undefined = this.language): ResolutionState {
    const key = cacheKey(kind, this.normalizeLanguage(language));
    if (this.cache.has(key)) return 'resolved';
    if (this.inflight.has(key)) return 'loading';
    return 'unresolved';
  }

  /**
   * Subscribe to diagnostics.
   *
   * @returns Unsubscribe function
   */
  onDiagnostic(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Internals ---

  private assertKind(kind: string): void {
    if (!isTableKind(kind)) {
      throw new ValidationError(`Unknown table kind: ${kind}`, { field: 'kind' });
    }
  }

  /**
   * Map a language to the one used for loading and caching: unset for the
   * default language, so both share one cache entry.
   */
  private normalizeLanguage(language: string | undefined): string | undefined {
    if (language === undefined || language === '') {
      return undefined;
    }
    if (!isValidLanguageCode(language)) {
      throw new ValidationError(`Invalid language code: ${language}`, { field: 'language' });
    }
    return language === this.defaultLanguage ? undefined : language;
  }

  private async resolvePair(kind: TableKind, language: string | undefined): Promise<ResolvedTable> {
    const key = cacheKey(kind, language);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    return this.load(kind, language, key);
  }

  private load(kind: TableKind, language: string | undefined, key: string): Promise<ResolvedTable> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const promise = this.build(kind, language)
      .then((table) => {
        this.cache.set(key, table);
        return table;
      })
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, promise);
    return promise;
  }

  private async build(kind: TableKind, language: string | undefined): Promise<ResolvedTable> {
    try {
      const base = await this.source.load(kind);
      if (base.status === 'missing') {
        throw new SourceUnavailableError(kind, base.path);
      }

      const localized = language === undefined ? {} : await this.loadLocalized(kind, language);
      let table = mergeTables(base.content, localized, kind);

      const overrides = this.overrides[kind];
      if (overrides) {
        table = mergeTables(table, overrides, kind);
      }

      if (kind === 'sensors') {
        const enums = await this.enumsFor(language);
        table = expandReferences(table, enums, {
          onUnresolved: (reference) =>
            this.emit({
              code: 'UNRESOLVED_REFERENCE',
              severity: 'warn',
              message: `Unresolved reference ${reference.reference} at "${reference.path}"`,
              kind,
              language,
              path: reference.path,
              details: { enumeration: reference.name },
            }),
        });
      }

      const resolved = deepFreeze(table);
      this.logger.debug('Resolved locale table', {
        kind,
        language: language ?? this.defaultLanguage,
        entities: Object.keys(resolved).length,
      });
      return resolved;
    } catch (error) {
      this.reportFailure(kind, language, error);
      throw error;
    }
  }

  /**
   * Tier 2 content for a pair. A localized document that is missing, does
   * not parse or cannot be read contributes nothing.
   */
  private async loadLocalized(kind: TableKind, language: string): Promise<DocumentMapping> {
    try {
      const document = await this.source.load(kind, language);
      if (document.status === 'missing') {
        this.emit({
          code: 'LOCALIZED_SOURCE_MISSING',
          severity: 'info',
          message: `No "${language}" document for ${kind}; using base definitions`,
          kind,
          language,
          details: { file: document.path },
        });
      }
      return document.content;
    } catch (error) {
      if (error instanceof MalformedSourceError) {
        this.emit({
          code: 'LOCALIZED_SOURCE_MALFORMED',
          severity: 'error',
          message: error.message,
          kind,
          language,
          details: { file: error.path },
        });
      } else {
        this.emit({
          code: 'LOCALIZED_SOURCE_UNREADABLE',
          severity: 'error',
          message: `Cannot read "${language}" document for ${kind}: ${errorMessage(error)}`,
          kind,
          language,
        });
      }
      return {};
    }
  }

  /**
   * The enumeration table sensors expand against. When enumerations cannot
   * be resolved, sensors still resolve with their references unexpanded.
   */
  private async enumsFor(language: string | undefined): Promise<ResolvedTable> {
    try {
      return await this.resolvePair('enums', language);
    } catch (error) {
      this.emit({
        code: 'RESOLUTION_FAILED',
        severity: 'warn',
        message: `Enumerations unavailable, sensor references left unexpanded: ${errorMessage(error)}`,
        kind: 'sensors',
        language,
      });
      return {};
    }
  }

  private reportFailure(kind: TableKind, language: string | undefined, error: unknown): void {
    if (error instanceof ShapeMismatchError) {
      this.emit({
        code: 'SHAPE_MISMATCH',
        severity: 'error',
        message: error.message,
        kind,
        language,
        path: error.path,
      });
      return;
    }
    this.emit({
      code: 'RESOLUTION_FAILED',
      severity: 'error',
      message: `Failed to resolve ${kind}: ${errorMessage(error)}`,
      kind,
      language,
      details: isLocaleError(error) ? { errorCode: error.code } : undefined,
    });
  }

  private emit(diagnostic: Diagnostic): void {
    this.logger[diagnostic.severity](diagnostic.message, {
      code: diagnostic.code,
      kind: diagnostic.kind,
      language: diagnostic.language,
      path: diagnostic.path,
      ...diagnostic.details,
    });

    for (const listener of [...this.listeners]) {
      try {
        listener(diagnostic);
      } catch (error) {
        this.logger.error('Diagnostic listener failed', { error: errorMessage(error) });
      }
    }
  }
}
