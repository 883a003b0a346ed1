/**
 * In-memory flat tables
 *
 * Every stage of the metric pipeline reads a table and returns a new one.
 * Rows are plain records keyed by column name; nothing mutates a row after
 * it has been produced.
 */

import { Decimal } from 'decimal.js';

export type CellValue = string | number | null;

export type DataRow = Readonly<Record<string, CellValue>>;

export interface DataTable {
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
}

export const createTable = (columns: readonly string[], rows: readonly DataRow[]): DataTable => ({
  columns: [...columns],
  rows,
});

export const missingColumns = (table: DataTable, required: readonly string[]): string[] => {
  const present = new Set(table.columns);
  return required.filter((column) => !present.has(column));
};

/**
 * Reads a cell as a column value, treating absent keys as null.
 */
export const readCell = (row: DataRow, column: string): CellValue => row[column] ?? null;

export const isBlank = (cell: CellValue): boolean =>
  cell === null || (typeof cell === 'string' && cell.trim() === '');

/**
 * Parses a numeric cell into a Decimal.
 * Returns null for blank cells and undefined when the cell is not a number.
 */
export const toDecimal = (cell: CellValue): Decimal | null | undefined => {
  if (isBlank(cell)) return null;
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? new Decimal(cell) : undefined;
  }
  const text = (cell ?? '').trim();
  if (!/^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/.test(text)) return undefined;
  return new Decimal(text);
};

/**
 * Equality used by filters and joins: numbers and numeric strings compare by value,
 * everything else by exact string match.
 */
export const cellEquals = (a: CellValue, b: CellValue): boolean => {
  if (a === null || b === null) return a === b;
  if (typeof a === typeof b) return a === b;

  const left = toDecimal(a);
  const right = toDecimal(b);
  if (left === null || left === undefined || right === null || right === undefined) return false;
  return left.equals(right);
};

const compareCodePoints = (a: string, b: string): number => {
  let index = 0;
  while (index < a.length && index < b.length) {
    const left = a.codePointAt(index) ?? 0;
    const right = b.codePointAt(index) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    index += left > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
};

/**
 * Total order over cells: nulls first, numbers before strings, numbers ascending,
 * strings by code point.
 */
export const compareCells = (a: CellValue, b: CellValue): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return compareCodePoints(a, b);
};

