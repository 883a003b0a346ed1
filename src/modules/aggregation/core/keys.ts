import { compareCells, readCell, type DataRow } from '@/common/types/table.js';

import type { GroupKey, GroupKeyValue } from './types.js';

/**
 * Stable string identity of a key over the given dimensions.
 */
export const serializeKey = (key: GroupKey, dimensions: readonly string[]): string =>
  JSON.stringify(dimensions.map((dimension) => key[dimension] ?? null));

/**
 * Orders keys dimension by dimension, in the dimensions' declared order.
 */
export const compareKeys = (a: GroupKey, b: GroupKey, dimensions: readonly string[]): number => {
  for (const dimension of dimensions) {
    const order = compareCells(a[dimension] ?? null, b[dimension] ?? null);
    if (order !== 0) return order;
  }
  return 0;
};

/**
 * Restricts a key to a subset of its dimensions.
 */
export const projectKey = (key: GroupKey, dimensions: readonly string[]): GroupKey => {
  const projected: Record<string, GroupKeyValue> = {};
  for (const dimension of dimensions) {
    const value = key[dimension];
    if (value !== undefined) projected[dimension] = value;
  }
  return projected;
};

/**
 * Reads a row's key. Returns null when any dimension is blank.
 */
export const rowKey = (row: DataRow, dimensions: readonly string[]): GroupKey | null => {
  const key: Record<string, GroupKeyValue> = {};
  for (const dimension of dimensions) {
    const cell = readCell(row, dimension);
    if (cell === null || (typeof cell === 'string' && cell.trim() === '')) return null;
    key[dimension] = cell;
  }
  return key;
};
