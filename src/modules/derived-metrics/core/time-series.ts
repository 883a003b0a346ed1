import { err, ok, type Result } from 'neverthrow';

import { frequencyOf, toPeriodIndex } from '@/common/types/temporal.js';
import {
  compareKeys,
  projectKey,
  serializeKey,
  type GroupedRow,
  type GroupedTable,
} from '@/modules/aggregation/index.js';

import type { InvalidPeriodError } from './errors.js';

const TIME_DIMENSIONS = new Set(['Year', 'Month']);

export interface PeriodRow {
  readonly row: GroupedRow;
  readonly period: number;
}

/**
 * Dimensions that identify one series: every dimension except Year and Month.
 */
export const seriesDimensions = (dimensions: readonly string[]): string[] =>
  dimensions.filter((dimension) => !TIME_DIMENSIONS.has(dimension));

const numericOrNull = (value: string | number | undefined): number | null => {
  if (value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Splits a grouped table into one series per non-time key, each sorted
 * ascending by period. The sort is stable and happens inside each series.
 */
export const splitSeries = (grouped: GroupedTable): Result<PeriodRow[][], InvalidPeriodError> => {
  const frequency = frequencyOf(grouped.dimensions);
  const partition = seriesDimensions(grouped.dimensions);
  const series = new Map<string, PeriodRow[]>();

  for (const row of grouped.rows) {
    const period = toPeriodIndex(
      frequency,
      numericOrNull(row.key['Year']),
      numericOrNull(row.key['Month'])
    );
    if (period === null) {
      return err({
        type: 'InvalidPeriod',
        message: `Row ${serializeKey(row.key, grouped.dimensions)} has no valid Year/Month period`,
        key: row.key,
      });
    }

    const id = serializeKey(projectKey(row.key, partition), partition);
    const rows = series.get(id);
    if (rows === undefined) {
      series.set(id, [{ row, period }]);
    } else {
      rows.push({ row, period });
    }
  }

  return ok([...series.values()].map((rows) => rows.sort((a, b) => a.period - b.period)));
};

export const sortByKey = (rows: GroupedRow[], dimensions: readonly string[]): GroupedRow[] =>
  rows.sort((a, b) => compareKeys(a.key, b.key, dimensions));
