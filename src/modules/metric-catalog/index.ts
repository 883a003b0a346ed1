/**
 * Metric Catalog Module - Public API
 *
 * Declarative registry of electrification metrics and the orchestrator that
 * turns prepared source tables into one CSV artifact per metric.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  OUTPUT_KEY_COLUMNS,
  GROUPABLE_DIMENSIONS,
  CalculationSchema,
  MetricDefinitionSchema,
  SourceDefinitionSchema,
  CatalogFileSchema,
  type GroupableDimension,
  type MetricRow,
  type MetricTable,
  type Calculation,
  type CalculationKind,
  type MetricStamp,
  type MetricDefinition,
  type SourceDefinition,
  type CatalogFileDTO,
  type MetricCatalog,
  type MetricContext,
  type MetricDiagnostics,
  type MetricComputation,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createInvalidDefinitionError,
  createSourceUnavailableError,
  createOutputWriteError,
  createUnexpectedError,
  type InvalidDefinitionError,
  type SourceUnavailableError,
  type OutputWriteError,
  type UnexpectedError,
  type ComputeMetricError,
  type MetricError,
  type CatalogError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { CatalogRepo, SourceRepo, SourceLoadError, MetricWriter } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export { createMetricCatalog, selectMetrics } from './core/catalog.js';
export { stampRows } from './core/stamp.js';
export { computeMetric } from './core/usecases/compute-metric.js';
export {
  prepareSource,
  REGION_COLUMN,
  type PreparedSource,
} from './core/usecases/prepare-source.js';
export {
  runMetricCatalog,
  formatRunSummary,
  type RunMetricCatalogDeps,
  type RunMetricCatalogInput,
  type MetricRunResult,
  type RunSummary,
} from './core/usecases/run-metric-catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { createCatalogRepo, type CatalogRepoOptions } from './shell/repo/yaml-catalog-repo.js';
export {
  createCsvSourceRepo,
  parseSourceCsv,
  type CsvSourceRepoOptions,
} from './shell/repo/csv-source-repo.js';
export {
  createCsvMetricWriter,
  formatMetricCsv,
  type CsvMetricWriterOptions,
} from './shell/writer/csv-metric-writer.js';
