import path from 'node:path';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createMissingColumnError,
  createValidationError,
  errorMessage,
  type InfraError,
  type MissingColumnError,
  type ValidationError,
} from '@/common/types/errors.js';
import { readTextFile } from '@/infra/files/text.js';
import {
  OUTPUT_KEY_COLUMNS,
  type MetricRow,
  type MetricTable,
} from '@/modules/metric-catalog/index.js';

export type MetricTableRepoError = InfraError | MissingColumnError | ValidationError;

export interface MetricTableRepoOptions {
  /** Directory holding the written metric artifacts */
  outputDir: string;
}

export interface MetricTableRepo {
  /**
   * Reads the artifact written for `outputName`.
   */
  get(outputName: string): Promise<Result<MetricTable, MetricTableRepoError>>;
}

const OUTPUT_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

const optionalText = (value: string | undefined): string | null =>
  value === undefined || value === '' ? null : value;

const parseNumber = (
  value: string | undefined,
  column: string,
  line: number
): Result<number | null, ValidationError> => {
  if (value === undefined || value === '') return ok(null);
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return err(createValidationError(`Line ${String(line)}: '${value}' is not a number`, column));
  }
  return ok(parsed);
};

/**
 * Turns the records of a metric artifact back into typed rows.
 * The header must be the output key columns followed by the value column.
 */
export const parseMetricTable = (
  outputName: string,
  records: readonly string[][]
): Result<MetricTable, MissingColumnError | ValidationError> => {
  const [header, ...body] = records;
  if (header === undefined) {
    return err(createValidationError(`Metric table '${outputName}' has no header`));
  }

  const missing = OUTPUT_KEY_COLUMNS.filter((column, index) => header[index] !== column);
  const valueColumn = header[OUTPUT_KEY_COLUMNS.length];
  if (missing.length > 0 || valueColumn === undefined) {
    return err(
      createMissingColumnError(
        valueColumn === undefined ? [...missing, '<value>'] : missing,
        `Metric table '${outputName}'`
      )
    );
  }

  const rows: MetricRow[] = [];
  for (const [index, record] of body.entries()) {
    const line = index + 2;
    const [year, month, region, metricGroup, category, subCategory, fuelType, value] = record;

    const parsedYear = parseNumber(year, 'Year', line);
    if (parsedYear.isErr()) return err(parsedYear.error);
    const parsedMonth = parseNumber(month, 'Month', line);
    if (parsedMonth.isErr()) return err(parsedMonth.error);
    const parsedValue = parseNumber(value, valueColumn, line);
    if (parsedValue.isErr()) return err(parsedValue.error);

    if (parsedYear.value === null || parsedValue.value === null) {
      return err(createValidationError(`Line ${String(line)}: Year and value are required`));
    }

    rows.push({
      Year: parsedYear.value,
      Month: parsedMonth.value,
      Region: optionalText(region),
      Metric_Group: metricGroup ?? '',
      Category: optionalText(category),
      Sub_Category: optionalText(subCategory),
      Fuel_Type: optionalText(fuelType),
      value: parsedValue.value,
    });
  }

  return ok({ metricId: valueColumn, outputName, valueColumn, rows });
};

const isRecordList = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'));

export const createMetricTableRepo = (options: MetricTableRepoOptions): MetricTableRepo => ({
  async get(outputName: string): Promise<Result<MetricTable, MetricTableRepoError>> {
    if (!OUTPUT_NAME_PATTERN.test(outputName)) {
      return err(createValidationError(`Invalid output name '${outputName}'`, 'outputName'));
    }

    const filePath = path.join(options.outputDir, `${outputName}.csv`);
    const contents = await readTextFile(filePath, `Metric table '${outputName}'`);
    if (contents.isErr()) {
      return err(contents.error);
    }

    let records: unknown;
    try {
      records = parseCsv(contents.value, { bom: true, skip_empty_lines: true });
    } catch (error) {
      return err({
        type: 'ParseError',
        message: `Failed to parse CSV at ${filePath}: ${errorMessage(error)}`,
        path: filePath,
        cause: error,
      });
    }

    if (!isRecordList(records)) {
      return err({
        type: 'ParseError',
        message: `Unexpected CSV structure at ${filePath}`,
        path: filePath,
      });
    }

    return parseMetricTable(outputName, records);
  },
});
