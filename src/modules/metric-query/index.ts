/**
 * Metric Query Module - Public API
 *
 * Filtered, paged reads over written metric tables.
 */

export { queryMetricTable } from './core/usecases/query-metric-table.js';
export {
  createMetricTableRepo,
  parseMetricTable,
  type MetricTableRepo,
  type MetricTableRepoError,
  type MetricTableRepoOptions,
} from './shell/repo/csv-metric-table-repo.js';
export type {
  ValueFilter,
  YearRange,
  MetricTableFilter,
  QueryMetricTableInput,
  MetricTablePageInfo,
  MetricTableConnection,
} from './core/types.js';
