import { err, ok, type Result } from 'neverthrow';

import { createMissingColumnError, type MissingColumnError } from '@/common/types/errors.js';
import {
  cellEquals,
  createTable,
  missingColumns,
  readCell,
  type DataRow,
  type DataTable,
} from '@/common/types/table.js';

import type { PredicateSet, PredicateValue } from './types.js';

/**
 * Columns referenced by a predicate set, in declaration order.
 */
export const predicateColumns = (predicates: PredicateSet): string[] => Object.keys(predicates);

const matchesValue = (row: DataRow, column: string, expected: PredicateValue): boolean => {
  const cell = readCell(row, column);
  if (Array.isArray(expected)) {
    return expected.some((value) => cellEquals(cell, value));
  }
  return cellEquals(cell, expected);
};

/**
 * True when the row satisfies every predicate in the set.
 * An empty set matches every row.
 */
export const matchesPredicates = (row: DataRow, predicates: PredicateSet): boolean =>
  Object.entries(predicates).every(([column, expected]) => matchesValue(row, column, expected));

/**
 * Selects the rows satisfying all predicates.
 *
 * Every referenced column must exist in the table; a missing column is an
 * error rather than an empty selection. An empty result is a valid table.
 */
export const filterRows = (
  table: DataTable,
  predicates: PredicateSet
): Result<DataTable, MissingColumnError> => {
  const missing = missingColumns(table, predicateColumns(predicates));
  if (missing.length > 0) {
    return err(createMissingColumnError(missing, 'Segment filter'));
  }

  const rows = table.rows.filter((row) => matchesPredicates(row, predicates));
  return ok(createTable(table.columns, rows));
};

/**
 * Formats a predicate set for log messages: `Fuel_Type=BEV, Category in [Private, Commercial]`.
 */
export const describePredicates = (predicates: PredicateSet): string => {
  const parts = Object.entries(predicates).map(([column, expected]) =>
    Array.isArray(expected)
      ? `${column} in [${expected.map(String).join(', ')}]`
      : `${column}=${String(expected)}`
  );
  return parts.length === 0 ? '(all rows)' : parts.join(', ');
};
