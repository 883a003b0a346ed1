import { cellEquals, readCell, toDecimal, type CellValue } from '@/common/types/table.js';

import type { RowPredicate } from './types.js';

export const fieldEquals =
  (column: string, value: CellValue): RowPredicate =>
  (row) =>
    cellEquals(readCell(row, column), value);

export const fieldIn = (column: string, values: readonly CellValue[]): RowPredicate => {
  return (row) => {
    const cell = readCell(row, column);
    return values.some((value) => cellEquals(cell, value));
  };
};

/**
 * True when the column holds a number no greater than `limit`.
 * Blank and non-numeric cells never match.
 */
export const numberAtMost =
  (column: string, limit: number): RowPredicate =>
  (row) => {
    const value = toDecimal(readCell(row, column));
    return value !== null && value !== undefined && value.lessThanOrEqualTo(limit);
  };

/**
 * True when the column holds a number strictly greater than `limit`.
 */
export const numberAbove =
  (column: string, limit: number): RowPredicate =>
  (row) => {
    const value = toDecimal(readCell(row, column));
    return value !== null && value !== undefined && value.greaterThan(limit);
  };

export const allOf =
  (...predicates: RowPredicate[]): RowPredicate =>
  (row) =>
    predicates.every((predicate) => predicate(row));
