// Transform types

import type { ReadonlyDocumentMapping, Scalar } from '@station-locale/protocol';

/**
 * Unit systems a station can report in.
 */
export type UnitSystem = 'US' | 'METRIC' | 'METRICWX';

/**
 * Numeric codes the station runtime uses for each unit system.
 */
export const UNIT_SYSTEM_CODES: Readonly<Record<UnitSystem, number>> = {
  US: 0x01,
  METRIC: 0x10,
  METRICWX: 0x11,
};

/**
 * Ambient information a transform may need besides the raw value.
 */
export type TransformContext = {
  unitSystem: UnitSystem;
  /** Offset of the station's local time from UTC, in minutes */
  utcOffsetMinutes: number;
  /** Resolved enumeration table for the active language */
  enums: ReadonlyDocumentMapping;
};

/**
 * A named conversion from a raw measurement to a display or derived value.
 */
export type Transform = (value: number, context: TransformContext) => Scalar;
