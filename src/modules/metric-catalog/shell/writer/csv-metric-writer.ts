import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { writeFileAtomic } from '@/infra/files/text.js';

import { createOutputWriteError, type OutputWriteError } from '../../core/errors.js';
import { OUTPUT_KEY_COLUMNS, type MetricRow, type MetricTable } from '../../core/types.js';

import type { MetricWriter } from '../../core/ports.js';

export interface CsvMetricWriterOptions {
  outputDir: string;
}

type OutputCell = string | number | null;

const toRecord = (row: MetricRow): OutputCell[] => [
  row.Year,
  row.Month,
  row.Region,
  row.Metric_Group,
  row.Category,
  row.Sub_Category,
  row.Fuel_Type,
  row.value,
];

/**
 * Renders a metric table as CSV: header, then rows in table order.
 * Empty cells are written as empty fields.
 */
export const formatMetricCsv = (table: MetricTable): string =>
  stringify([[...OUTPUT_KEY_COLUMNS, table.valueColumn], ...table.rows.map(toRecord)]);

export const createCsvMetricWriter = (options: CsvMetricWriterOptions): MetricWriter => ({
  async write(table: MetricTable): Promise<Result<string, OutputWriteError>> {
    const filePath = path.join(options.outputDir, `${table.outputName}.csv`);
    const written = await writeFileAtomic(filePath, formatMetricCsv(table));
    if (written.isErr()) {
      return err(createOutputWriteError(filePath, written.error.message));
    }
    return ok(written.value);
  },
});
