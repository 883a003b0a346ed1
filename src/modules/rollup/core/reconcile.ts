import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  aggregate,
  serializeKey,
  sumByKey,
  type AggregateSpec,
  type AggregationError,
  type GroupKey,
  type GroupedTable,
} from '@/modules/aggregation/index.js';

import type { ReconciliationDifference, ReconciliationMismatchError } from './errors.js';
import type { RollupTable } from './types.js';
import type { DataTable } from '@/common/types/table.js';

const MAX_REPORTED_DIFFERENCES = 10;

/**
 * Dimensions that survive a rollup, in their original order.
 */
export const keptDimensions = (dimensions: readonly string[], drop: readonly string[]): string[] =>
  dimensions.filter((dimension) => !drop.includes(dimension));

/**
 * Second aggregation pass over the same subset with `drop` removed from the key.
 */
export const buildRollup = (
  subset: DataTable,
  dimensions: readonly string[],
  drop: readonly string[],
  spec: AggregateSpec
): Result<RollupTable, AggregationError> =>
  aggregate(subset, keptDimensions(dimensions, drop), spec).map((grouped) => ({
    drop: [...drop],
    grouped,
  }));

/**
 * |a - b| <= tolerance * max(|a|, |b|)
 */
export const withinTolerance = (a: Decimal, b: Decimal, tolerance: number): boolean => {
  const difference = a.minus(b).abs();
  if (difference.isZero()) return true;
  return difference.lessThanOrEqualTo(Decimal.max(a.abs(), b.abs()).mul(tolerance));
};

/**
 * Checks that detail rows summed over the dropped dimensions equal the rollup,
 * key by key, within a relative tolerance.
 */
export const reconcile = (
  detail: GroupedTable,
  rollup: RollupTable,
  tolerance: number
): Result<void, ReconciliationMismatchError> => {
  const kept = rollup.grouped.dimensions;
  const summed = sumByKey(detail, kept);

  const detailByKey = new Map(summed.rows.map((row) => [serializeKey(row.key, kept), row]));
  const rollupByKey = new Map(rollup.grouped.rows.map((row) => [serializeKey(row.key, kept), row]));

  const differences: ReconciliationDifference[] = [];
  const record = (
    key: GroupKey,
    detailValue: Decimal | null,
    rollupValue: Decimal | null
  ): void => {
    differences.push({
      key,
      detail: detailValue === null ? null : detailValue.toString(),
      rollup: rollupValue === null ? null : rollupValue.toString(),
    });
  };

  // A key present on one side only reconciles when the other side's value is zero.
  for (const [id, row] of rollupByKey) {
    const detailRow = detailByKey.get(id);
    if (detailRow === undefined) {
      if (!row.value.isZero()) record(row.key, null, row.value);
    } else if (!withinTolerance(detailRow.value, row.value, tolerance)) {
      record(row.key, detailRow.value, row.value);
    }
  }

  for (const [id, row] of detailByKey) {
    if (!rollupByKey.has(id) && !row.value.isZero()) {
      record(row.key, row.value, null);
    }
  }

  if (differences.length === 0) {
    return ok(undefined);
  }

  const shown = differences
    .slice(0, MAX_REPORTED_DIFFERENCES)
    .map(
      (d) => `${serializeKey(d.key, kept)} detail=${d.detail ?? 'none'} total=${d.rollup ?? 'none'}`
    )
    .join('; ');
  const count = String(differences.length);

  return err({
    type: 'ReconciliationMismatch',
    message: `Total over [${rollup.drop.join(', ')}] disagrees with detail rows for ${count} key(s): ${shown}`,
    drop: rollup.drop,
    differences,
  });
};

/**
 * Builds one rollup and verifies it against the detail rows.
 */
export const rollupAndReconcile = (
  subset: DataTable,
  detail: GroupedTable,
  drop: readonly string[],
  spec: AggregateSpec,
  tolerance: number
): Result<RollupTable, AggregationError | ReconciliationMismatchError> =>
  buildRollup(subset, detail.dimensions, drop, spec).andThen((rollup) =>
    reconcile(detail, rollup, tolerance).map(() => rollup)
  );
