// Host locale settings validation
//
// Validates the locale section of the host configuration before the
// runtime builds a resolver from it.

import { z } from 'zod';
import { isValidLanguageCode } from '../documents/paths.js';

const overrideNamespaceSchema = z.record(z.string(), z.unknown());

/**
 * Schema for the locale section of the host configuration.
 *
 * `lang` selects the localized documents; an empty string means "unset".
 * `sensors`, `units` and `enums` hold override tables in the host's own
 * (string-leaved) structure; the runtime adapts them before merging.
 */
export const localeSettingsSchema = z
  .object({
    lang: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z
        .string()
        .refine(isValidLanguageCode, { message: 'Invalid language code' })
        .optional()
    ),
    sensors: overrideNamespaceSchema.optional(),
    units: overrideNamespaceSchema.optional(),
    enums: overrideNamespaceSchema.optional(),
  })
  .strict();

export type LocaleSettings = z.infer<typeof localeSettingsSchema>;

/**
 * A single settings problem, addressed by dotted path
 */
export type SettingsValidationError = {
  path: string;
  message: string;
};

export type SettingsValidationResult =
  | { valid: true; settings: LocaleSettings; errors: [] }
  | { valid: false; errors: SettingsValidationError[] };

/**
 * Validate the locale section of the host configuration.
 *
 * @param input - Raw settings as read by the host
 * @returns The parsed settings, or the list of problems found
 */
export function validateLocaleSettings(input: unknown): SettingsValidationResult {
  const parsed = localeSettingsSchema.safeParse(input ?? {});

  if (parsed.success) {
    return { valid: true, settings: parsed.data, errors: [] };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: ['settings', ...issue.path].join('.'),
      message: issue.message,
    })),
  };
}
