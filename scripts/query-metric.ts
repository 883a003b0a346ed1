/**
 * Query Metric Script
 *
 * Prints a filtered page of a written metric table as JSON.
 *
 * Usage:
 *   tsx scripts/query-metric.ts <outputName> [--from YEAR] [--to YEAR] [--region NAME]...
 *     [--fuel-type NAME]... [--limit N] [--offset N]
 */

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { createMetricTableRepo, queryMetricTable } from '../src/modules/metric-query/index.js';

import type { MetricTableFilter } from '../src/modules/metric-query/index.js';

interface CLIOptions {
  outputName: string | undefined;
  filter: MetricTableFilter;
  limit: number | null;
  offset: number | null;
}

const toNumber = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got '${value ?? ''}'`);
  }
  return parsed;
};

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const regions: string[] = [];
  const fuelTypes: string[] = [];
  const year: { gte?: number; lte?: number } = {};
  const options: CLIOptions = { outputName: undefined, filter: {}, limit: null, offset: null };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--from':
        year.gte = toNumber(arg, nextArg);
        i++;
        break;
      case '--to':
        year.lte = toNumber(arg, nextArg);
        i++;
        break;
      case '--region':
        if (nextArg !== undefined) regions.push(nextArg);
        i++;
        break;
      case '--fuel-type':
        if (nextArg !== undefined) fuelTypes.push(nextArg);
        i++;
        break;
      case '--limit':
        options.limit = toNumber(arg, nextArg);
        i++;
        break;
      case '--offset':
        options.offset = toNumber(arg, nextArg);
        i++;
        break;
      default:
        options.outputName ??= arg;
    }
  }

  options.filter = {
    ...(year.gte !== undefined || year.lte !== undefined ? { year } : {}),
    ...(regions.length > 0 ? { region: regions } : {}),
    ...(fuelTypes.length > 0 ? { fuelType: fuelTypes } : {}),
  };
  return options;
}

const main = async (): Promise<void> => {
  const options = parseArgs();
  if (options.outputName === undefined) {
    console.error('Usage: tsx scripts/query-metric.ts <outputName> [options]');
    process.exit(1);
  }

  const config = createConfig(parseEnv(process.env));
  const repo = createMetricTableRepo({ outputDir: config.paths.outputDir });

  const table = await repo.get(options.outputName);
  if (table.isErr()) {
    console.error(`${table.error.type}: ${table.error.message}`);
    process.exit(1);
  }

  const page = queryMetricTable(table.value, {
    filter: options.filter,
    limit: options.limit,
    offset: options.offset,
  });
  if (page.isErr()) {
    console.error(`${page.error.type}: ${page.error.message}`);
    process.exit(1);
  }

  console.log(JSON.stringify(page.value, null, 2));
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
