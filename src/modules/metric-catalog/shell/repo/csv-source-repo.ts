import path from 'node:path';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidNumericValueError,
  createMissingColumnError,
  errorMessage,
} from '@/common/types/errors.js';
import {
  createTable,
  toDecimal,
  type CellValue,
  type DataRow,
  type DataTable,
} from '@/common/types/table.js';
import { readTextFile } from '@/infra/files/text.js';

import type { SourceLoadError, SourceRepo } from '../../core/ports.js';
import type { SourceDefinition } from '../../core/types.js';

export interface CsvSourceRepoOptions {
  /** Directory that source `file` paths are relative to */
  rootDir: string;
}

const isStringRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toCell = (
  raw: unknown,
  column: string,
  numeric: boolean
): Result<CellValue, SourceLoadError> => {
  const text = typeof raw === 'string' ? raw.trim() : '';
  if (text === '') return ok(null);
  if (!numeric) return ok(text);

  const value = toDecimal(text);
  if (value === null || value === undefined) {
    return err(createInvalidNumericValueError(column, text));
  }
  return ok(value.toNumber());
};

/**
 * Parses CSV text into a table. The header row names the columns, after
 * `renameColumns` is applied; blank cells become null and `numericColumns`
 * are read as numbers.
 */
export const parseSourceCsv = (
  contents: string,
  source: SourceDefinition,
  filePath: string
): Result<DataTable, SourceLoadError> => {
  const renames = source.renameColumns ?? {};
  let header: string[] = [];
  let records: unknown;

  try {
    records = parseCsv(contents, {
      bom: true,
      skip_empty_lines: true,
      columns: (names: string[]) => {
        header = names.map((name) => {
          const trimmed = name.trim();
          return renames[trimmed] ?? trimmed;
        });
        return header;
      },
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }

  const numericColumns = new Set(source.numericColumns ?? []);
  const absent = [...numericColumns].filter((column) => !header.includes(column));
  if (absent.length > 0) {
    return err(createMissingColumnError(absent, `Source '${source.id}'`));
  }

  const rows: DataRow[] = [];
  for (const record of Array.isArray(records) ? records : []) {
    if (!isStringRecord(record)) continue;

    const row: Record<string, CellValue> = {};
    for (const column of header) {
      const cell = toCell(record[column], column, numericColumns.has(column));
      if (cell.isErr()) return err(cell.error);
      row[column] = cell.value;
    }
    rows.push(row);
  }

  return ok(createTable(header, rows));
};

export const createCsvSourceRepo = (options: CsvSourceRepoOptions): SourceRepo => ({
  async load(source: SourceDefinition): Promise<Result<DataTable, SourceLoadError>> {
    const filePath = path.join(options.rootDir, source.file);
    const contents = await readTextFile(filePath, `Source '${source.id}'`);
    if (contents.isErr()) {
      return err(contents.error);
    }
    return parseSourceCsv(contents.value, source, filePath);
  },
});
