// Tests for building a resolver from host settings

import { describe, it, expect } from 'vitest';
import { createLocaleResolverFromSettings } from './settings.js';
import { createDocumentSource } from '../sources/document-source.js';
import { createInMemoryReader } from '../sources/fs.js';
import { createCapturingLogger } from '../logging.js';
import { ShapeMismatchError, ValidationError } from '../errors.js';

// --- Test Fixtures ---

function createSource() {
  const reader = createInMemoryReader({
    'locales/sensors.yaml': 'outTemp:\n  metadata:\n    name: Outdoor Temperature\n    device_class: temperature\n',
    'locales/sensors_cs.yaml': 'outTemp:\n  metadata:\n    name: Venkovní teplota\n',
    'locales/units.yaml': 'degree_C:\n  unit_of_measurement: "°C"\n',
    'locales/enums.yaml': 'cardinal_directions:\n  0: N\n',
  });
  return createDocumentSource({ reader, directory: 'locales' });
}

// --- Tests ---

describe('createLocaleResolverFromSettings', () => {
  it('should select the configured language', async () => {
    const resolver = createLocaleResolverFromSettings({ lang: 'cs' }, { source: createSource() });

    const sensors = await resolver.resolve('sensors');

    expect(resolver.language).toBe('cs');
    expect(sensors.outTemp).toEqual({ metadata: { name: 'Venkovní teplota', device_class: 'temperature' } });
  });

  it('should treat an empty language as unset', () => {
    const resolver = createLocaleResolverFromSettings({ lang: '' }, { source: createSource() });

    expect(resolver.language).toBeUndefined();
  });

  it('should apply override namespaces with coerced leaves', async () => {
    const resolver = createLocaleResolverFromSettings(
      {
        lang: 'cs',
        sensors: { outTemp: { metadata: { name: 'Custom' } } },
        units: { degree_C: { precision: '1', visible: 'TRUE' } },
      },
      { source: createSource() }
    );

    const sensors = await resolver.resolve('sensors');
    const units = await resolver.resolve('units');

    expect(sensors.outTemp).toEqual({ metadata: { name: 'Custom', device_class: 'temperature' } });
    expect(units.degree_C).toEqual({ unit_of_measurement: '°C', precision: 1, visible: true });
  });

  it('should log the resolver it creates', () => {
    const logger = createCapturingLogger();

    createLocaleResolverFromSettings(
      { lang: 'cs', enums: { cardinal_directions: { '0': 'Sever' } } },
      { source: createSource(), logger }
    );

    expect(logger.entries).toEqual([
      {
        level: 'info',
        message: 'Creating locale resolver',
        data: { language: 'cs', overrides: ['enums'] },
      },
    ]);
  });

  it('should throw ValidationError for an invalid language', () => {
    expect(() => createLocaleResolverFromSettings({ lang: '../cs' }, { source: createSource() })).toThrow(
      'Invalid locale settings: settings.lang: Invalid language code'
    );
  });

  it('should throw ValidationError for unknown settings', () => {
    expect(() =>
      createLocaleResolverFromSettings({ language: 'cs' }, { source: createSource() })
    ).toThrow(ValidationError);
  });

  it('should throw ShapeMismatchError for an entity that is not a mapping', () => {
    expect(() =>
      createLocaleResolverFromSettings({ sensors: { outTemp: 'hidden' } }, { source: createSource() })
    ).toThrow(ShapeMismatchError);
  });

  it('should default to the bundled documents', async () => {
    const resolver = createLocaleResolverFromSettings({ lang: 'cs' });

    const sensors = await resolver.resolve('sensors');

    expect(sensors.outTemp).toMatchObject({ metadata: { name: 'Venkovní teplota' } });
  });
});
