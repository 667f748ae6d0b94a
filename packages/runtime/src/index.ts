// @station-locale/runtime
// Layered resolution of sensor, unit and enumeration tables

// Engine (resolver + transforms)
export {
  createLocaleEngine,
  type LocaleEngine,
  type LocaleEngineOptions,
  type ConvertOptions,
} from './engine.js';

// Error types
export {
  LocaleError,
  ValidationError,
  SourceUnavailableError,
  MalformedSourceError,
  ShapeMismatchError,
  UnknownTransformError,
  isLocaleError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type CapturingLogger,
} from './logging.js';

// Document source
export {
  DEFAULT_LOCALES_DIRECTORY,
  createDocumentSource,
  createBundledDocumentSource,
  parseDocument,
  type DocumentSourceOptions,
} from './sources/document-source.js';
export { createFilesystemReader, createInMemoryReader } from './sources/fs.js';
export type { DocumentReader, DocumentSource, LoadedDocument } from './sources/types.js';

// Deep merge
export {
  merge,
  mergeAll,
  mergeTables,
  cloneValue,
  cloneMapping,
  deepFreeze,
  isMapping,
  setEntry,
} from './merge/deep-merge.js';

// Reference expansion
export {
  expandReferences,
  enumerationValues,
  parseReference,
  type UnresolvedReference,
  type ExpandReferencesOptions,
} from './references/expander.js';

// Transforms
export {
  TransformRegistry,
  createTransformRegistry,
  builtInTransforms,
  beaufortScaleMap,
  degreesToCardinal,
  localtimeToUtcTimestamp,
  unitSystemToString,
  unitSystemFromCode,
  convertValue,
  convertMeasurement,
  findDerivedSensors,
  UNIT_SYSTEM_CODES,
  type Transform,
  type TransformContext,
  type TransformEntries,
  type UnitSystem,
  type ConvertedValue,
  type ConvertMeasurementResult,
} from './transforms/index.js';

// Overrides
export {
  adaptOverrides,
  adaptOverrideTable,
  coerceScalar,
  type AdaptOverridesResult,
} from './overrides/adapter.js';

// Resolution
export {
  LocaleResolver,
  DEFAULT_LANGUAGE,
  type LocaleResolverOptions,
  type ResolutionState,
} from './resolution/resolver.js';
export {
  createLocaleResolverFromSettings,
  type ResolverFromSettingsOptions,
} from './resolution/settings.js';

// Lookup
export {
  friendlyName,
  lookupSensor,
  lookupUnit,
  type SensorLookupResult,
  type SensorMatch,
} from './lookup/sensors.js';
