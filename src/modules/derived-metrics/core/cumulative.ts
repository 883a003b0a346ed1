import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { sortByKey, splitSeries } from './time-series.js';

import type { InvalidPeriodError } from './errors.js';
import type { GroupedRow, GroupedTable } from '@/modules/aggregation/index.js';

/**
 * Running total over each series in period order.
 *
 * Used for stock measures built from flows, e.g. the fleet on the road as the
 * running sum of first registrations.
 */
export const cumulativeSum = (grouped: GroupedTable): Result<GroupedTable, InvalidPeriodError> => {
  const split = splitSeries(grouped);
  if (split.isErr()) return err(split.error);

  const output: GroupedRow[] = [];
  for (const series of split.value) {
    let total = new Decimal(0);
    for (const { row } of series) {
      total = total.plus(row.value);
      output.push({ key: row.key, value: total });
    }
  }

  return ok({ dimensions: grouped.dimensions, rows: sortByKey(output, grouped.dimensions) });
};
