import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { sortByKey, splitSeries } from './time-series.js';

import type { InvalidPeriodError } from './errors.js';
import type { RollingMeanOptions } from './types.js';
import type { GroupedRow, GroupedTable } from '@/modules/aggregation/index.js';

/**
 * Trailing rolling mean over each series (one per non-time key).
 *
 * Each series is sorted by period before the window moves. A value is
 * emitted only when the window holds `window` consecutive periods; a gap
 * in the period sequence starts a new window. For a run of N consecutive
 * periods this yields max(0, N - window + 1) rows.
 */
export const rollingMean = (
  grouped: GroupedTable,
  options: RollingMeanOptions
): Result<GroupedTable, InvalidPeriodError> => {
  const { window } = options;
  const split = splitSeries(grouped);
  if (split.isErr()) return err(split.error);

  const size = new Decimal(window);
  const output: GroupedRow[] = [];

  for (const series of split.value) {
    let run: Decimal[] = [];
    let sum = new Decimal(0);
    let previousPeriod: number | null = null;

    for (const { row, period } of series) {
      if (previousPeriod !== null && period !== previousPeriod + 1) {
        run = [];
        sum = new Decimal(0);
      }
      previousPeriod = period;

      run.push(row.value);
      sum = sum.plus(row.value);
      if (run.length > window) {
        const leaving = run.shift();
        if (leaving !== undefined) sum = sum.minus(leaving);
      }

      if (run.length === window) {
        output.push({ key: row.key, value: sum.div(size) });
      }
    }
  }

  return ok({ dimensions: grouped.dimensions, rows: sortByKey(output, grouped.dimensions) });
};
