/**
 * Aggregation Module - Public API
 */

export {
  aggregate,
  aggregateColumns,
  completeGroups,
  dropIncompleteKeys,
  sumByKey,
  type AggregationError,
  type IncompleteKeyResult,
} from './core/group-by.js';
export { compareKeys, projectKey, rowKey, serializeKey } from './core/keys.js';
export {
  AggregateSpecSchema,
  CountAggregateSchema,
  SumAggregateSchema,
  RequiredGroupsSchema,
  type AggregateSpec,
  type CountAggregate,
  type SumAggregate,
  type GroupKey,
  type GroupKeyValue,
  type GroupedRow,
  type GroupedTable,
  type RequiredGroups,
} from './core/types.js';
