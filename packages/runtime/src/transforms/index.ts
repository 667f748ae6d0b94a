// Transform module
// Named conversions from raw measurements to display values

import { builtInTransforms } from './builtins.js';
import { TransformRegistry, type TransformEntries } from './registry.js';

export type { Transform, TransformContext, UnitSystem } from './types.js';
export { UNIT_SYSTEM_CODES } from './types.js';

export { TransformRegistry, type TransformEntries } from './registry.js';

export {
  builtInTransforms,
  beaufortScaleMap,
  degreesToCardinal,
  localtimeToUtcTimestamp,
  unitSystemToString,
  unitSystemFromCode,
} from './builtins.js';

export {
  convertValue,
  convertMeasurement,
  findDerivedSensors,
  type ConvertedValue,
  type ConvertMeasurementResult,
} from './dispatch.js';

/**
 * Build the registry a host starts with.
 * Defaults to the built-in transforms; pass a table to replace them.
 */
export function createTransformRegistry(entries: TransformEntries = builtInTransforms): TransformRegistry {
  return new TransformRegistry(entries);
}
