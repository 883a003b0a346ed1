import { Decimal } from 'decimal.js';

import type { GroupedTable } from '@/modules/aggregation/index.js';

/**
 * Conversion factors by name. The factor multiplies a value in the source unit.
 */
export const UNIT_CONVERSIONS = {
  terajoule_to_megawatt_hour: new Decimal(1).div('0.036'),
  kilowatt_hour_to_megawatt_hour: new Decimal(1).div(1000),
  kilowatt_hour_to_gigawatt_hour: new Decimal(1).div(1_000_000),
  megawatt_to_kilowatt: new Decimal(1000),
} as const;

export type UnitConversionName = keyof typeof UNIT_CONVERSIONS;

export const isUnitConversionName = (name: string): name is UnitConversionName =>
  Object.hasOwn(UNIT_CONVERSIONS, name);

/**
 * Multiplies every value by a fixed factor. Keys and row order are unchanged.
 */
export const convertUnits = (grouped: GroupedTable, factor: Decimal.Value): GroupedTable => {
  const multiplier = new Decimal(factor);
  return {
    dimensions: grouped.dimensions,
    rows: grouped.rows.map((row) => ({ key: row.key, value: row.value.mul(multiplier) })),
  };
};
