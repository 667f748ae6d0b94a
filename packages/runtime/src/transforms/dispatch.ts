// Conversion dispatch
//
// Applies a sensor's named transform to a raw value. Names are resolved
// against the registry only here, at conversion time.

import type { ReadonlyDocumentMapping, ReadonlyDocumentValue, Scalar } from '@station-locale/protocol';
import { ValidationError } from '../errors.js';
import { isMapping } from '../merge/deep-merge.js';
import type { TransformRegistry } from './registry.js';
import type { TransformContext } from './types.js';

/**
 * A value ready to publish for one sensor
 */
export type ConvertedValue = {
  key: string;
  value: Scalar;
};

export type ConvertMeasurementResult = {
  values: ConvertedValue[];
  /** Derived sensors naming the measurement as source but no transform */
  skipped: string[];
};

function transformName(record: ReadonlyDocumentMapping, sensorKey?: string): string | undefined {
  const name = record.convert_lambda;
  if (name === undefined || name === null) {
    return undefined;
  }
  if (typeof name !== 'string') {
    throw new ValidationError(`convert_lambda of "${sensorKey ?? 'sensor'}" must be a string`, {
      field: 'convert_lambda',
      details: { sensorKey },
    });
  }
  return name;
}

/**
 * Convert a raw value with the record's `convert_lambda`, if it has one.
 *
 * @returns The transformed value, or the raw value for records without a transform
 * @throws UnknownTransformError if the named transform is not registered
 */
export function convertValue(
  record: ReadonlyDocumentMapping,
  value: number,
  context: TransformContext,
  registry: TransformRegistry
): Scalar {
  const name = transformName(record);
  if (name === undefined) {
    return value;
  }
  return registry.resolve(name)(value, context);
}

/**
 * Keys of the sensors derived from a measurement (records whose `source`
 * names it), in table order.
 */
export function findDerivedSensors(
  sensors: ReadonlyDocumentMapping,
  sourceKey: string
): string[] {
  return Object.entries(sensors)
    .filter(([, record]) => isSensorRecord(record) && record.source === sourceKey)
    .map(([key]) => key);
}

function isSensorRecord(value: ReadonlyDocumentValue): value is ReadonlyDocumentMapping {
  return isMapping(value);
}

/**
 * Convert one raw measurement into every value published for it: the
 * measurement itself (converted when its record names a transform) and
 * each sensor derived from it. Derived sensors always start from the raw
 * value.
 *
 * @throws UnknownTransformError if a named transform is not registered
 */
export function convertMeasurement(
  sensors: ReadonlyDocumentMapping,
  key: string,
  value: number,
  context: TransformContext,
  registry: TransformRegistry
): ConvertMeasurementResult {
  const values: ConvertedValue[] = [];
  const skipped: string[] = [];

  const own = sensors[key];
  values.push({
    key,
    value: isSensorRecord(own) ? convertValue(own, value, context, registry) : value,
  });

  for (const derivedKey of findDerivedSensors(sensors, key)) {
    const record = sensors[derivedKey];
    const name = isSensorRecord(record) ? transformName(record, derivedKey) : undefined;
    if (name === undefined) {
      skipped.push(derivedKey);
      continue;
    }
    values.push({ key: derivedKey, value: registry.resolve(name)(value, context) });
  }

  return { values, skipped };
}
