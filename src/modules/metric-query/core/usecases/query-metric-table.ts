import { err, ok, type Result } from 'neverthrow';

import { normalizePagination } from '@/common/constants/pagination.js';
import { createValidationError, type ValidationError } from '@/common/types/errors.js';

import type {
  MetricTableConnection,
  MetricTableFilter,
  QueryMetricTableInput,
  ValueFilter,
} from '../types.js';
import type { MetricRow, MetricTable } from '@/modules/metric-catalog/index.js';

const isValueSet = <T>(value: ValueFilter<T>): value is readonly T[] => Array.isArray(value);

const matchesValue = <T>(actual: T | null, expected: ValueFilter<T> | undefined): boolean => {
  if (expected === undefined) return true;
  if (actual === null) return false;
  if (isValueSet(expected)) return expected.includes(actual);
  return actual === expected;
};

const matchesFilter = (row: MetricRow, filter: MetricTableFilter): boolean => {
  const { year } = filter;
  if (year?.gte !== undefined && row.Year < year.gte) return false;
  if (year?.lte !== undefined && row.Year > year.lte) return false;

  return (
    matchesValue(row.Month, filter.month) &&
    matchesValue(row.Region, filter.region) &&
    matchesValue(row.Metric_Group, filter.metricGroup) &&
    matchesValue(row.Category, filter.category) &&
    matchesValue(row.Sub_Category, filter.subCategory) &&
    matchesValue(row.Fuel_Type, filter.fuelType)
  );
};

/**
 * Reads a page of a metric table.
 *
 * Processing order:
 * 1. Filter (Year range, then equality or set membership per column)
 * 2. Keep the table's row order
 * 3. Apply pagination (limit clamped to [1, 1000], offset to >= 0)
 */
export const queryMetricTable = (
  table: MetricTable,
  input: QueryMetricTableInput
): Result<MetricTableConnection, ValidationError> => {
  const filter = input.filter ?? {};
  const { year } = filter;

  if (year?.gte !== undefined && year.lte !== undefined && year.gte > year.lte) {
    return err(
      createValidationError(
        `Year range is empty: gte ${String(year.gte)} is after lte ${String(year.lte)}`,
        'filter.year'
      )
    );
  }

  const { limit, offset } = normalizePagination({
    limit: input.limit ?? null,
    offset: input.offset ?? null,
  });

  const matching = table.rows.filter((row) => matchesFilter(row, filter));
  const totalCount = matching.length;

  return ok({
    metricId: table.metricId,
    nodes: matching.slice(offset, offset + limit),
    pageInfo: {
      totalCount,
      hasNextPage: offset + limit < totalCount,
      hasPreviousPage: offset > 0,
    },
  });
};
