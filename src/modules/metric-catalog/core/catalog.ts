import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '@/common/types/errors.js';
import { isUnitConversionName } from '@/modules/derived-metrics/index.js';
import { getRuleSet } from '@/modules/reclassification/index.js';

import {
  GROUPABLE_DIMENSIONS,
  type CatalogFileDTO,
  type MetricCatalog,
  type MetricDefinition,
  type SourceDefinition,
} from './types.js';

const TIME_DIMENSIONS: readonly string[] = ['Year', 'Month'];
const GROUPABLE: ReadonlySet<string> = new Set(GROUPABLE_DIMENSIONS);

/** Stamp field -> the dimension whose column it fills */
const STAMP_DIMENSIONS = {
  category: 'Category',
  subCategory: 'Sub_Category',
  fuelType: 'Fuel_Type',
  region: 'Region',
} as const;

const findDuplicates = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
};

const validateSource = (source: SourceDefinition): string[] => {
  const problems: string[] = [];
  if (source.reclassify !== undefined && getRuleSet(source.reclassify) === undefined) {
    problems.push(`source '${source.id}': unknown reclassification rule set '${source.reclassify}'`);
  }
  return problems;
};

const validateMetric = (
  metric: MetricDefinition,
  sources: ReadonlyMap<string, SourceDefinition>
): string[] => {
  const problems: string[] = [];
  const report = (message: string): void => {
    problems.push(`metric '${metric.outputName}': ${message}`);
  };
  const { dimensions, calculation } = metric;

  const source = sources.get(metric.source);
  if (source === undefined) {
    report(`unknown source '${metric.source}'`);
  } else if (dimensions.includes('Region') && source.regionColumn === undefined) {
    report(`dimension 'Region' needs source '${source.id}' to declare a regionColumn`);
  }

  for (const dimension of dimensions) {
    if (!GROUPABLE.has(dimension)) {
      report(`dimension '${dimension}' is not one of ${GROUPABLE_DIMENSIONS.join(', ')}`);
    }
  }
  for (const duplicate of findDuplicates(dimensions)) {
    report(`dimension '${duplicate}' is listed more than once`);
  }
  if (!dimensions.includes('Year')) {
    report('dimensions must include Year');
  }

  for (const [field, dimension] of Object.entries(STAMP_DIMENSIONS)) {
    const stamped = metric.stamp !== undefined && Object.hasOwn(metric.stamp, field);
    if (stamped && dimensions.includes(dimension)) {
      report(`stamp.${field} conflicts with the ${dimension} dimension`);
    }
  }

  if (calculation.kind === 'unit_convert' && typeof calculation.conversion === 'string') {
    if (!isUnitConversionName(calculation.conversion)) {
      report(`unknown unit conversion '${calculation.conversion}'`);
    }
  }

  for (const rollup of metric.rollups ?? []) {
    if (calculation.kind === 'rolling_mean') {
      report('rolling means cannot declare rollups');
      break;
    }
    for (const dimension of rollup.drop) {
      if (!dimensions.includes(dimension)) {
        report(`rollup drops '${dimension}', which is not a dimension`);
      } else if (TIME_DIMENSIONS.includes(dimension)) {
        report(`rollup cannot drop the time dimension '${dimension}'`);
      }
    }
  }

  for (const required of metric.requiredGroups ?? []) {
    if (!dimensions.includes(required.dimension)) {
      report(`requiredGroups names '${required.dimension}', which is not a dimension`);
    }
  }

  return problems;
};

/**
 * Builds the registry from a schema-valid catalog file.
 *
 * Every rule is checked and all problems are reported together. One bad
 * definition rejects the whole catalog.
 */
export const createMetricCatalog = (dto: CatalogFileDTO): Result<MetricCatalog, ValidationError> => {
  const problems: string[] = [];

  for (const duplicate of findDuplicates(dto.sources.map((s) => s.id))) {
    problems.push(`source id '${duplicate}' is declared more than once`);
  }
  for (const duplicate of findDuplicates(dto.metrics.map((m) => m.outputName))) {
    problems.push(`outputName '${duplicate}' is declared more than once`);
  }

  const sources = new Map(dto.sources.map((source) => [source.id, source]));
  for (const source of dto.sources) {
    problems.push(...validateSource(source));
  }
  for (const metric of dto.metrics) {
    problems.push(...validateMetric(metric, sources));
  }

  if (problems.length > 0) {
    return err(
      createValidationError(
        `Metric catalog is invalid (${String(problems.length)} problem(s))`,
        'metrics',
        problems
      )
    );
  }

  return ok({
    version: dto.version,
    sources,
    metrics: dto.metrics,
  });
};

/**
 * Restricts a catalog to the given output names, keeping catalog order.
 * Returns the names that match no metric alongside.
 */
export const selectMetrics = (
  catalog: MetricCatalog,
  outputNames: readonly string[] | undefined
): { metrics: readonly MetricDefinition[]; unknown: string[] } => {
  if (outputNames === undefined || outputNames.length === 0) {
    return { metrics: catalog.metrics, unknown: [] };
  }
  const wanted = new Set(outputNames);
  const known = new Set(catalog.metrics.map((metric) => metric.outputName));
  return {
    metrics: catalog.metrics.filter((metric) => wanted.has(metric.outputName)),
    unknown: outputNames.filter((name) => !known.has(name)),
  };
};
