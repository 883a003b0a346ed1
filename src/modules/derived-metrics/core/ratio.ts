import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { serializeKey, type GroupedRow, type GroupedTable } from '@/modules/aggregation/index.js';

import type { RatioOutOfBoundsError } from './errors.js';
import type { RatioOptions, RatioUnit } from './types.js';

const UNIT_SCALE: Record<RatioUnit, Decimal> = {
  percent: new Decimal(100),
  fraction: new Decimal(1),
};

/**
 * Upper bound of a ratio in the given unit.
 */
export const ratioUpperBound = (unit: RatioUnit): Decimal => UNIT_SCALE[unit];

/**
 * Divides numerator by denominator for every denominator key.
 *
 * - Left join on the denominator: numerator keys without a denominator row are dropped
 * - Missing numerator counts as 0
 * - A zero denominator yields 0
 *
 * Both tables must be grouped over the same dimensions.
 */
export const computeRatio = (
  numerator: GroupedTable,
  denominator: GroupedTable,
  options: RatioOptions
): Result<GroupedTable, RatioOutOfBoundsError> => {
  const dimensions = denominator.dimensions;
  const scale = UNIT_SCALE[options.unit];
  const numeratorByKey = new Map(
    numerator.rows.map((row) => [serializeKey(row.key, dimensions), row.value])
  );

  const rows: GroupedRow[] = [];
  for (const row of denominator.rows) {
    const top = numeratorByKey.get(serializeKey(row.key, dimensions)) ?? new Decimal(0);
    const value = row.value.isZero() ? new Decimal(0) : top.div(row.value).mul(scale);

    if (value.isNegative() || value.greaterThan(scale)) {
      return err({
        type: 'RatioOutOfBounds',
        message:
          `Ratio ${value.toString()} for ${serializeKey(row.key, dimensions)} ` +
          `is outside [0, ${scale.toString()}]`,
        key: row.key,
        numerator: top.toString(),
        denominator: row.value.toString(),
      });
    }

    rows.push({ key: row.key, value });
  }

  return ok({ dimensions: [...dimensions], rows });
};
