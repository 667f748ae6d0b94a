// Tests for locale document naming

import { describe, it, expect } from 'vitest';
import { documentFileName, documentPath, isValidLanguageCode } from './paths.js';

describe('documentFileName', () => {
  it('should name the base document after the kind', () => {
    expect(documentFileName('sensors')).toBe('sensors.yaml');
    expect(documentFileName('enums')).toBe('enums.yaml');
  });

  it('should append the language suffix for localized documents', () => {
    expect(documentFileName('units', 'cs')).toBe('units_cs.yaml');
    expect(documentFileName('sensors', 'pt_BR')).toBe('sensors_pt_BR.yaml');
  });

  it('should treat an empty language as the base document', () => {
    expect(documentFileName('sensors', '')).toBe('sensors.yaml');
  });
});

describe('documentPath', () => {
  it('should join directory and file name', () => {
    expect(documentPath('/srv/locales', 'sensors', 'cs')).toBe('/srv/locales/sensors_cs.yaml');
  });

  it('should not double a trailing slash', () => {
    expect(documentPath('/srv/locales/', 'enums')).toBe('/srv/locales/enums.yaml');
  });
});

describe('isValidLanguageCode', () => {
  it('should accept short codes and regional variants', () => {
    expect(isValidLanguageCode('cs')).toBe(true);
    expect(isValidLanguageCode('fil')).toBe(true);
    expect(isValidLanguageCode('pt_BR')).toBe(true);
    expect(isValidLanguageCode('zh-Hant')).toBe(true);
  });

  it('should reject codes that could escape the locales directory', () => {
    expect(isValidLanguageCode('../etc')).toBe(false);
    expect(isValidLanguageCode('cs/x')).toBe(false);
    expect(isValidLanguageCode('')).toBe(false);
    expect(isValidLanguageCode('CS')).toBe(false);
  });
});
