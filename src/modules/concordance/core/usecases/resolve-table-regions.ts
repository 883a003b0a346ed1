/**
 * Use case: attach canonical regions to every row of a table.
 */

import { err, ok, type Result } from 'neverthrow';

import { createMissingColumnError } from '@/common/types/errors.js';
import {
  createTable,
  missingColumns,
  readCell,
  type DataRow,
  type DataTable,
} from '@/common/types/table.js';

import type { ResolveRegionsError } from '../errors.js';
import type { ConcordanceResolver } from '../resolver.js';
import type { RegionColumns } from '../types.js';

/** Column that keeps the raw label when it is overwritten in place */
export const RAW_LABEL_COLUMN = 'District';

/**
 * Writes the canonical region of each row into `targetColumn`.
 *
 * When source and target are the same column (e.g. a "Region" column that
 * actually holds districts), the raw label is preserved under "District"
 * before the column is overwritten.
 */
export const resolveTableRegions = (
  table: DataTable,
  columns: RegionColumns,
  resolver: ConcordanceResolver
): Result<DataTable, ResolveRegionsError> => {
  const missing = missingColumns(table, [columns.sourceColumn]);
  if (missing.length > 0) {
    return err(createMissingColumnError(missing, 'Concordance resolution'));
  }

  const inPlace = columns.sourceColumn === columns.targetColumn;
  const rawColumn = inPlace ? RAW_LABEL_COLUMN : columns.sourceColumn;

  const outputColumns = [...table.columns];
  if (!outputColumns.includes(rawColumn)) outputColumns.push(rawColumn);
  if (!outputColumns.includes(columns.targetColumn)) outputColumns.push(columns.targetColumn);

  const rows: DataRow[] = table.rows.map((row) => {
    const label = readCell(row, columns.sourceColumn);
    return {
      ...row,
      [rawColumn]: label,
      [columns.targetColumn]: resolver.resolve(label),
    };
  });

  return ok(createTable(outputColumns, rows));
};
