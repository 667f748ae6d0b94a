// @station-locale/protocol
// Shared types, document naming and settings validation

export * from './types/index.js';

export {
  DOCUMENT_EXTENSION,
  documentFileName,
  documentPath,
  isValidLanguageCode,
} from './documents/paths.js';

export {
  localeSettingsSchema,
  validateLocaleSettings,
  type LocaleSettings,
  type SettingsValidationError,
  type SettingsValidationResult,
} from './validation/settings.js';
