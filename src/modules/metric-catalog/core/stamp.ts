import { err, ok, type Result } from 'neverthrow';

import { serializeKey, type GroupKey, type GroupedTable } from '@/modules/aggregation/index.js';
import { TOTAL_SENTINEL } from '@/modules/rollup/index.js';

import type { MetricDefinition, MetricRow } from './types.js';
import type { InvalidPeriodError } from '@/modules/derived-metrics/index.js';

type StampField = 'category' | 'subCategory' | 'fuelType';

const toInteger = (value: string | number | undefined): number | null => {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(parsed) ? parsed : null;
};

const invalidPeriod = (key: GroupKey, dimensions: readonly string[]): InvalidPeriodError => ({
  type: 'InvalidPeriod',
  message: `Row ${serializeKey(key, dimensions)} has no valid Year/Month period`,
  key,
});

/**
 * Turns grouped rows into output rows.
 *
 * A column that is a dimension takes the group value, or "Total" when the
 * rows come from a rollup that dropped it. Any other column takes the
 * definition's static stamp, or stays empty.
 */
export const stampRows = (
  definition: MetricDefinition,
  grouped: GroupedTable,
  drop: readonly string[] = []
): Result<MetricRow[], InvalidPeriodError> => {
  const { dimensions, stamp } = definition;
  const hasMonth = dimensions.includes('Month');

  const column = (key: GroupKey, dimension: string, fallback: string | null): string | null => {
    if (drop.includes(dimension)) return TOTAL_SENTINEL;
    if (!dimensions.includes(dimension)) return fallback;
    const value = key[dimension];
    return value === undefined ? null : String(value);
  };
  const stamped = (field: StampField): string | null => stamp?.[field] ?? null;

  const rows: MetricRow[] = [];
  for (const row of grouped.rows) {
    const year = toInteger(row.key['Year']);
    const month = hasMonth ? toInteger(row.key['Month']) : null;
    if (year === null || (hasMonth && (month === null || month < 1 || month > 12))) {
      return err(invalidPeriod(row.key, grouped.dimensions));
    }

    rows.push({
      Year: year,
      Month: month,
      Region: column(row.key, 'Region', stamp?.region ?? null),
      Metric_Group: definition.metricGroup,
      Category: column(row.key, 'Category', stamped('category')),
      Sub_Category: column(row.key, 'Sub_Category', stamped('subCategory')),
      Fuel_Type: column(row.key, 'Fuel_Type', stamped('fuelType')),
      value: row.value.toNumber(),
    });
  }

  return ok(rows);
};
