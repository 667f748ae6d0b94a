// Sensor and unit lookup over resolved tables
//
// Stations report measurements the tables do not always list by name
// (numbered extras, vendor-specific fields). Lookup falls back from an
// exact match to the numbered base sensor, then to a guess built from the
// key itself.

import type { DocumentMapping, ReadonlyDocumentMapping } from '@station-locale/protocol';
import { cloneMapping, isMapping } from '../merge/deep-merge.js';

export type SensorMatch = 'exact' | 'suffix' | 'guessed';

export type SensorLookupResult = {
  /** A mutable copy; changing it does not touch the resolved table */
  record: DocumentMapping;
  match: SensorMatch;
};

const NUMBERED_KEY = /^(.*?)(\d+)$/;

const PREFIX_NAMES: ReadonlyArray<readonly [string, string]> = [
  ['In ', 'Indoor '],
  ['Out ', 'Outdoor '],
  ['Tx ', 'Transmit '],
  ['Rx ', 'Receive '],
];

/**
 * Template sensors used for keys that match nothing, checked in order
 * against the friendly name.
 */
const GUESS_TEMPLATES: ReadonlyArray<readonly [string, string]> = [
  ['alarm', 'extraAlarm'],
  ['humidity', 'outHumidity'],
  ['pressure', 'pressure'],
  ['temperature', 'outTemp'],
];

function recordFor(table: ReadonlyDocumentMapping, key: string): DocumentMapping | undefined {
  if (!Object.hasOwn(table, key)) {
    return undefined;
  }
  const record = table[key];
  return isMapping(record) ? cloneMapping(record) : undefined;
}

function metadataOf(record: DocumentMapping): DocumentMapping {
  const metadata = record.metadata;
  if (isMapping(metadata)) {
    return metadata;
  }
  const created: DocumentMapping = {};
  record.metadata = created;
  return created;
}

function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Build a display name from a measurement key.
 *
 * @example
 * friendlyName('extraAlarm5') // 'Extra Alarm 5'
 * friendlyName('inTempBatteryStatus') // 'Indoor Temp Battery Status'
 */
export function friendlyName(key: string): string {
  const spaced = key.replace(/(\d+)/g, ' $1').replace(/(?<!^)(?=[A-Z])/g, ' ');
  const name = titleCase(spaced);

  for (const [prefix, replacement] of PREFIX_NAMES) {
    if (name.startsWith(prefix)) {
      return replacement + name.slice(prefix.length);
    }
  }
  return name;
}

/**
 * Look up the configuration of a measurement key.
 *
 * 1. An exact entry.
 * 2. For a numbered key (`extraTemp3`), the entry of its base key with the
 *    number appended to `metadata.name`.
 * 3. A guessed entry: metadata copied from a template sensor chosen by the
 *    key's wording, named after the key.
 */
export function lookupSensor(sensors: ReadonlyDocumentMapping, key: string): SensorLookupResult {
  const exact = recordFor(sensors, key);
  if (exact) {
    return { record: exact, match: 'exact' };
  }

  const numbered = NUMBERED_KEY.exec(key);
  if (numbered) {
    const [, baseKey, suffix] = numbered;
    const record = recordFor(sensors, baseKey);
    if (record) {
      const metadata = metadataOf(record);
      const baseName = typeof metadata.name === 'string' ? metadata.name : friendlyName(baseKey);
      metadata.name = `${baseName} ${suffix}`;
      return { record, match: 'suffix' };
    }
  }

  const name = friendlyName(key);
  const lowered = name.toLowerCase();
  const template = GUESS_TEMPLATES.find(([word]) => lowered.includes(word));
  const record = (template && recordFor(sensors, template[1])) ?? { metadata: {} };
  metadataOf(record).name = name;

  return { record, match: 'guessed' };
}

/**
 * Look up unit metadata, falling back to the unit name as the displayed unit.
 */
export function lookupUnit(units: ReadonlyDocumentMapping, unitName: string | null): DocumentMapping {
  if (unitName !== null) {
    const record = recordFor(units, unitName);
    if (record) {
      return record;
    }
  }
  return { unit_of_measurement: unitName };
}
