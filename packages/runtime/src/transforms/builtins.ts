// Built-in transforms referenced by the bundled sensor documents

import type { Scalar } from '@station-locale/protocol';
import { ValidationError } from '../errors.js';
import { isMapping } from '../merge/deep-merge.js';
import { enumerationValues } from '../references/expander.js';
import { UNIT_SYSTEM_CODES, type Transform, type UnitSystem } from './types.js';

const COMPASS_POINTS = 16;
const COMPASS_SECTOR = 360 / COMPASS_POINTS;

/**
 * Map a unit-system code reported by the station to its name.
 *
 * @throws ValidationError for an unknown code
 */
export function unitSystemFromCode(code: number): UnitSystem {
  for (const [name, value] of Object.entries(UNIT_SYSTEM_CODES)) {
    if (value === code && isUnitSystem(name)) {
      return name;
    }
  }
  throw new ValidationError(`Invalid unit system value: ${code}`, {
    field: 'unitSystem',
    details: { code },
  });
}

function isUnitSystem(name: string): name is UnitSystem {
  return Object.hasOwn(UNIT_SYSTEM_CODES, name);
}

/**
 * Wind speed on the Beaufort scale → its description.
 * Scale numbers without an entry map to "<n> - Unknown".
 */
export const beaufortScaleMap: Transform = (value, { enums }) => {
  const force = Math.trunc(value);
  const scale = enums.beaufort_scale;
  const key = String(force);

  if (isMapping(scale) && Object.hasOwn(scale, key)) {
    const description = scale[key];
    if (description === null || typeof description !== 'object') {
      return description;
    }
  }
  return `${force} - Unknown`;
};

/**
 * Wind direction in degrees → one of 16 compass points.
 * Each point covers 22.5°, centred on its heading.
 */
export const degreesToCardinal: Transform = (value, { enums }) => {
  const points = enumerationValues(enums.cardinal_directions);
  if (points === null || points.length < COMPASS_POINTS) {
    throw new ValidationError('Enumeration "cardinal_directions" must define 16 compass points', {
      field: 'cardinal_directions',
    });
  }

  const sector = Math.trunc((value + COMPASS_SECTOR / 2) / COMPASS_SECTOR);
  const index = ((sector % COMPASS_POINTS) + COMPASS_POINTS) % COMPASS_POINTS;
  return points[index];
};

/**
 * Epoch seconds of a station-local wall-clock reading → UTC epoch seconds.
 */
export const localtimeToUtcTimestamp: Transform = (value, { utcOffsetMinutes }) =>
  value - utcOffsetMinutes * 60;

/**
 * Unit-system code → unit-system name.
 */
export const unitSystemToString: Transform = (value): Scalar => unitSystemFromCode(value);

/**
 * The static name → transform table the default registry is built from.
 */
export const builtInTransforms: Readonly<Record<string, Transform>> = Object.freeze({
  beaufort_scale_map: beaufortScaleMap,
  degrees_to_cardinal: degreesToCardinal,
  localtime_to_utc_timestamp: localtimeToUtcTimestamp,
  unit_system_to_string: unitSystemToString,
});
