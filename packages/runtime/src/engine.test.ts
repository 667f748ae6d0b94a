// Tests for the locale engine over the bundled documents

import { describe, it, expect, vi } from 'vitest';
import type { Diagnostic } from '@station-locale/protocol';
import { createLocaleEngine } from './engine.js';
import { LocaleResolver } from './resolution/resolver.js';
import { createBundledDocumentSource } from './sources/document-source.js';
import { TransformRegistry } from './transforms/registry.js';
import { UnknownTransformError } from './errors.js';

// --- Test Fixtures ---

function createEngine() {
  const resolver = new LocaleResolver({ source: createBundledDocumentSource() });
  const diagnostics: Diagnostic[] = [];
  resolver.onDiagnostic((diagnostic) => {
    diagnostics.push(diagnostic);
  });
  return { engine: createLocaleEngine({ resolver }), diagnostics };
}

// --- Tests ---

describe('createLocaleEngine', () => {
  describe('resolve', () => {
    it('should localize names and keep base metadata', async () => {
      const { engine } = createEngine();

      const sensors = await engine.resolve('sensors', 'cs');

      expect(sensors.outTemp).toEqual({
        metadata: {
          name: 'Venkovní teplota',
          device_class: 'temperature',
          state_class: 'measurement',
          icon: 'mdi:thermometer',
        },
      });
      expect(sensors.ET).toEqual({
        metadata: { name: 'Evapotranspiration', state_class: 'measurement', icon: 'mdi:water-percent' },
      });
    });

    it('should expand compass options in the requested language', async () => {
      const { engine } = createEngine();

      const english = await engine.resolve('sensors');
      const czech = await engine.resolve('sensors', 'cs');

      expect(english.windDir_cardinal).toMatchObject({
        metadata: {
          options: ['N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE', 'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'],
        },
      });
      expect(czech.windDir_cardinal).toMatchObject({
        metadata: {
          options: ['S', 'SSV', 'SV', 'VSV', 'V', 'VJV', 'JV', 'JJV', 'J', 'JJZ', 'JZ', 'ZJZ', 'Z', 'ZSZ', 'SZ', 'SSZ'],
        },
      });
    });

    it('should report units without a Czech document', async () => {
      const { engine, diagnostics } = createEngine();

      const units = await engine.resolve('units', 'cs');

      expect(units.degree_C).toEqual({ unit_of_measurement: '°C', value_template: '{{ value | round(1) }}' });
      expect(diagnostics.map((d) => [d.code, d.kind, d.language])).toEqual([
        ['LOCALIZED_SOURCE_MISSING', 'units', 'cs'],
      ]);
    });

    it('should leave no unresolved references in the bundled sensors', async () => {
      const { engine, diagnostics } = createEngine();

      await engine.resolve('sensors');
      await engine.resolve('sensors', 'cs');

      expect(diagnostics.filter((d) => d.code === 'UNRESOLVED_REFERENCE')).toEqual([]);
    });
  });

  describe('convert', () => {
    it('should publish a derived compass point with the raw direction', async () => {
      const { engine } = createEngine();

      const result = await engine.convert('windDir', 90, { unitSystem: 'METRIC' });

      expect(result).toEqual({
        values: [
          { key: 'windDir', value: 90 },
          { key: 'windDir_cardinal', value: 'E' },
        ],
        skipped: [],
      });
    });

    it('should use the enumerations of the requested language', async () => {
      const { engine } = createEngine();

      const result = await engine.convert('windDir', 90, { language: 'cs', unitSystem: 'METRIC' });

      expect(result.values).toEqual([
        { key: 'windDir', value: 90 },
        { key: 'windDir_cardinal', value: 'V' },
      ]);
    });

    it('should describe wind force on the Beaufort scale', async () => {
      const { engine } = createEngine();

      const result = await engine.convert('windSpeed', 4, { unitSystem: 'METRIC' });

      expect(result.values).toEqual([
        { key: 'windSpeed', value: 4 },
        { key: 'windSpeed_beaufort', value: '4 - Moderate breeze' },
      ]);
    });

    it('should convert values with their own transform', async () => {
      const { engine } = createEngine();

      const units = await engine.convert('usUnits', 16, { unitSystem: 'METRIC' });
      const sunrise = await engine.convert('sunrise', 1700000000, { unitSystem: 'METRIC', utcOffsetMinutes: 60 });

      expect(units.values).toEqual([{ key: 'usUnits', value: 'METRIC' }]);
      expect(sunrise.values).toEqual([{ key: 'sunrise', value: 1699996400 }]);
    });

    it('should pass measurements without a record through unchanged', async () => {
      const { engine } = createEngine();

      const result = await engine.convert('soilMoist1', 42, { unitSystem: 'US' });

      expect(result).toEqual({ values: [{ key: 'soilMoist1', value: 42 }], skipped: [] });
    });

    it('should use a supplied registry', async () => {
      const resolver = new LocaleResolver({ source: createBundledDocumentSource() });
      const compass = vi.fn(() => 'compass');
      const engine = createLocaleEngine({
        resolver,
        registry: new TransformRegistry({ degrees_to_cardinal: compass }),
      });

      const result = await engine.convert('windDir', 180, { unitSystem: 'US' });

      expect(result.values[1]).toEqual({ key: 'windDir_cardinal', value: 'compass' });
      expect(compass).toHaveBeenCalledTimes(1);
    });
  });

  describe('resolveTransform', () => {
    it('should return registered transforms', () => {
      const { engine } = createEngine();

      expect(engine.resolveTransform('unit_system_to_string')(17, {
        unitSystem: 'METRICWX',
        utcOffsetMinutes: 0,
        enums: {},
      })).toBe('METRICWX');
    });

    it('should throw UnknownTransformError for unknown names', () => {
      const { engine } = createEngine();

      expect(() => engine.resolveTransform('celsius_to_kelvin')).toThrow(UnknownTransformError);
    });
  });
});
