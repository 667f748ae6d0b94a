// Locale engine
// The consumer-facing pairing of a resolver and a transform registry

import type { ResolvedTable, TableKind } from '@station-locale/protocol';
import type { LocaleResolver } from './resolution/resolver.js';
import {
  convertMeasurement,
  createTransformRegistry,
  type ConvertMeasurementResult,
  type Transform,
  type TransformRegistry,
  type UnitSystem,
} from './transforms/index.js';

export type LocaleEngineOptions = {
  resolver: LocaleResolver;
  /** Defaults to a registry of the built-in transforms */
  registry?: TransformRegistry;
};

export type ConvertOptions = {
  language?: string;
  unitSystem: UnitSystem;
  utcOffsetMinutes?: number;
};

export type LocaleEngine = {
  readonly resolver: LocaleResolver;
  readonly registry: TransformRegistry;
  resolve(kind: TableKind, language?: string): Promise<ResolvedTable>;
  resolveTransform(name: string): Transform;
  /**
   * Convert a raw measurement into the values published for it, using the
   * sensor and enumeration tables of the requested language.
   */
  convert(key: string, value: number, options: ConvertOptions): Promise<ConvertMeasurementResult>;
};

export function createLocaleEngine(options: LocaleEngineOptions): LocaleEngine {
  const { resolver } = options;
  const registry = options.registry ?? createTransformRegistry();

  return {
    resolver,
    registry,

    resolve(kind, language) {
      return resolver.resolve(kind, language);
    },

    resolveTransform(name) {
      return registry.resolve(name);
    },

    async convert(key, value, convertOptions) {
      const [sensors, enums] = await Promise.all([
        resolver.resolve('sensors', convertOptions.language),
        resolver.resolve('enums', convertOptions.language),
      ]);
      return convertMeasurement(
        sensors,
        key,
        value,
        {
          unitSystem: convertOptions.unitSystem,
          utcOffsetMinutes: convertOptions.utcOffsetMinutes ?? 0,
          enums,
        },
        registry
      );
    },
  };
}
