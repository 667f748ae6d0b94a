// Resolver construction from host settings

import { validateLocaleSettings } from '@station-locale/protocol';
import { ValidationError } from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import { adaptOverrides } from '../overrides/adapter.js';
import { createBundledDocumentSource } from '../sources/document-source.js';
import type { DocumentSource } from '../sources/types.js';
import { LocaleResolver } from './resolver.js';

export type ResolverFromSettingsOptions = {
  /** Defaults to the documents shipped with this package */
  source?: DocumentSource;
  logger?: Logger;
  defaultLanguage?: string;
};

/**
 * Build a resolver from the locale section of the host configuration.
 *
 * `lang` becomes the resolver's preferred language; the `sensors`, `units`
 * and `enums` namespaces become its override tables.
 *
 * @throws ValidationError if the settings do not validate
 * @throws ShapeMismatchError if an override namespace is not a table of records
 */
export function createLocaleResolverFromSettings(
  input: unknown,
  options: ResolverFromSettingsOptions = {}
): LocaleResolver {
  const result = validateLocaleSettings(input);
  if (!result.valid) {
    const summary = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid locale settings: ${summary}`, {
      details: { errors: result.errors },
    });
  }

  const { lang, ...namespaces } = result.settings;
  const logger = options.logger ?? silentLogger;
  const { overrides } = adaptOverrides(namespaces);

  logger.info('Creating locale resolver', {
    language: lang ?? null,
    overrides: Object.keys(overrides),
  });

  return new LocaleResolver({
    source: options.source ?? createBundledDocumentSource(),
    overrides,
    language: lang,
    defaultLanguage: options.defaultLanguage,
    logger,
  });
}
