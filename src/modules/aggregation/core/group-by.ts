import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidNumericValueError,
  createMissingColumnError,
  type InvalidNumericValueError,
  type MissingColumnError,
} from '@/common/types/errors.js';
import {
  createTable,
  isBlank,
  missingColumns,
  readCell,
  toDecimal,
  type DataTable,
} from '@/common/types/table.js';

import { compareKeys, projectKey, rowKey, serializeKey } from './keys.js';

import type { AggregateSpec, GroupKey, GroupedRow, GroupedTable, RequiredGroups } from './types.js';

export type AggregationError = MissingColumnError | InvalidNumericValueError;

export interface IncompleteKeyResult {
  table: DataTable;
  /** Number of rows removed because a dimension was blank */
  dropped: number;
}

/**
 * Columns an aggregate reads besides the group dimensions.
 */
export const aggregateColumns = (spec: AggregateSpec): string[] => {
  if (spec.kind === 'sum') return [spec.valueColumn];
  return spec.idColumn !== undefined ? [spec.idColumn] : [];
};

/**
 * Removes rows whose key is incomplete over `dimensions`.
 *
 * Detail and rollup passes must see the same rows, so this runs once on
 * the filtered subset before either pass.
 */
export const dropIncompleteKeys = (
  table: DataTable,
  dimensions: readonly string[]
): IncompleteKeyResult => {
  const rows = table.rows.filter((row) => rowKey(row, dimensions) !== null);
  return { table: createTable(table.columns, rows), dropped: table.rows.length - rows.length };
};

const sortRows = (rows: GroupedRow[], dimensions: readonly string[]): GroupedRow[] =>
  rows.sort((a, b) => compareKeys(a.key, b.key, dimensions));

/**
 * Groups rows by an ordered dimension tuple and counts or sums them.
 *
 * - count: number of rows (or of rows with a non-blank `idColumn`)
 * - sum: decimal sum of `valueColumn`; blank cells are skipped
 *
 * Rows with a blank dimension are ignored; callers that need the count use
 * dropIncompleteKeys first. Groups are returned ordered by key.
 */
export const aggregate = (
  table: DataTable,
  dimensions: readonly string[],
  spec: AggregateSpec
): Result<GroupedTable, AggregationError> => {
  const missing = missingColumns(table, [...dimensions, ...aggregateColumns(spec)]);
  if (missing.length > 0) {
    return err(createMissingColumnError(missing, 'Grouped aggregation'));
  }

  const groups = new Map<string, { key: GroupKey; value: Decimal }>();

  for (const row of table.rows) {
    const key = rowKey(row, dimensions);
    if (key === null) continue;

    let increment: Decimal;
    if (spec.kind === 'count') {
      if (spec.idColumn !== undefined && isBlank(readCell(row, spec.idColumn))) continue;
      increment = new Decimal(1);
    } else {
      const cell = readCell(row, spec.valueColumn);
      const value = toDecimal(cell);
      if (value === undefined) {
        return err(createInvalidNumericValueError(spec.valueColumn, cell ?? ''));
      }
      increment = value ?? new Decimal(0);
    }

    const id = serializeKey(key, dimensions);
    const existing = groups.get(id);
    if (existing === undefined) {
      groups.set(id, { key, value: increment });
    } else {
      existing.value = existing.value.plus(increment);
    }
  }

  return ok({ dimensions: [...dimensions], rows: sortRows([...groups.values()], dimensions) });
};

/**
 * Re-aggregates grouped rows onto a subset of their dimensions by summing values.
 */
export const sumByKey = (grouped: GroupedTable, dimensions: readonly string[]): GroupedTable => {
  const groups = new Map<string, { key: GroupKey; value: Decimal }>();

  for (const row of grouped.rows) {
    const key = projectKey(row.key, dimensions);
    const id = serializeKey(key, dimensions);
    const existing = groups.get(id);
    if (existing === undefined) {
      groups.set(id, { key, value: row.value });
    } else {
      existing.value = existing.value.plus(row.value);
    }
  }

  return { dimensions: [...dimensions], rows: sortRows([...groups.values()], dimensions) };
};

/**
 * Adds zero-valued rows so that every required value of `dimension` appears
 * for each observed combination of the other dimensions.
 *
 * A dimension that is not part of the grouped table leaves it unchanged.
 */
export const completeGroups = (grouped: GroupedTable, required: RequiredGroups): GroupedTable => {
  const { dimension, values } = required;
  if (!grouped.dimensions.includes(dimension)) return grouped;

  const otherDimensions = grouped.dimensions.filter((d) => d !== dimension);
  const present = new Set(grouped.rows.map((row) => serializeKey(row.key, grouped.dimensions)));
  const prefixes = new Map<string, GroupKey>();
  for (const row of grouped.rows) {
    const prefix = projectKey(row.key, otherDimensions);
    prefixes.set(serializeKey(prefix, otherDimensions), prefix);
  }

  const added: GroupedRow[] = [];
  for (const prefix of prefixes.values()) {
    for (const value of values) {
      const key: GroupKey = { ...prefix, [dimension]: value };
      if (!present.has(serializeKey(key, grouped.dimensions))) {
        added.push({ key, value: new Decimal(0) });
      }
    }
  }

  if (added.length === 0) return grouped;
  return {
    dimensions: grouped.dimensions,
    rows: sortRows([...grouped.rows, ...added], grouped.dimensions),
  };
};
