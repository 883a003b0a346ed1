import { mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createCsvMetricWriter, formatMetricCsv } from '@/modules/metric-catalog/index.js';

import type { MetricTable } from '@/modules/metric-catalog/index.js';

const table: MetricTable = {
  metricId: 'EV_Registrations',
  outputName: 'ev_registrations',
  valueColumn: 'EV_Registrations',
  rows: [
    {
      Year: 2023,
      Month: 1,
      Region: 'Auckland',
      Metric_Group: 'Transport',
      Category: 'All',
      Sub_Category: 'Light Passenger Vehicle',
      Fuel_Type: 'BEV',
      value: 2,
    },
    {
      Year: 2023,
      Month: null,
      Region: 'Total',
      Metric_Group: 'Transport',
      Category: null,
      Sub_Category: 'Light, heavy',
      Fuel_Type: null,
      value: 0.5,
    },
  ],
};

const EXPECTED_CSV = [
  'Year,Month,Region,Metric_Group,Category,Sub_Category,Fuel_Type,EV_Registrations',
  '2023,1,Auckland,Transport,All,Light Passenger Vehicle,BEV,2',
  '2023,,Total,Transport,,"Light, heavy",,0.5',
  '',
].join('\n');

describe('formatMetricCsv', () => {
  it('writes the fixed key columns then the metric column', () => {
    expect(formatMetricCsv(table)).toBe(EXPECTED_CSV);
  });

  it('writes only the header for an empty table', () => {
    expect(formatMetricCsv({ ...table, rows: [] })).toBe(
      'Year,Month,Region,Metric_Group,Category,Sub_Category,Fuel_Type,EV_Registrations\n'
    );
  });
});

describe('csv metric writer', () => {
  it('writes <outputName>.csv and leaves no temporary file', async () => {
    const outputDir = await mkdtemp(path.join(tmpdir(), 'metrics-'));
    const writer = createCsvMetricWriter({ outputDir });

    const written = (await writer.write(table))._unsafeUnwrap();

    expect(written).toBe(path.join(outputDir, 'ev_registrations.csv'));
    expect(await readFile(written, 'utf8')).toBe(EXPECTED_CSV);
    expect(await readdir(outputDir)).toEqual(['ev_registrations.csv']);
  });

  it('replaces an existing artifact', async () => {
    const outputDir = await mkdtemp(path.join(tmpdir(), 'metrics-'));
    await writeFile(path.join(outputDir, 'ev_registrations.csv'), 'stale', 'utf8');
    const writer = createCsvMetricWriter({ outputDir });

    const written = (await writer.write(table))._unsafeUnwrap();

    expect(await readFile(written, 'utf8')).toBe(EXPECTED_CSV);
  });

  it('creates the output directory', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'metrics-'));
    const writer = createCsvMetricWriter({ outputDir: path.join(root, 'nested', 'out') });

    const written = (await writer.write(table))._unsafeUnwrap();

    expect(written).toBe(path.join(root, 'nested', 'out', 'ev_registrations.csv'));
  });

  it('returns an OutputWrite error when the directory cannot be created', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'metrics-'));
    const blocker = path.join(root, 'file');
    await writeFile(blocker, 'not a directory', 'utf8');
    const writer = createCsvMetricWriter({ outputDir: blocker });

    const error = (await writer.write(table))._unsafeUnwrapErr();

    expect(error.type).toBe('OutputWrite');
    expect(error.path).toBe(path.join(blocker, 'ev_registrations.csv'));
  });
});
