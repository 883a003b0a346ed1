/**
 * Segment Filter Module - Public API
 */

export {
  filterRows,
  matchesPredicates,
  predicateColumns,
  describePredicates,
} from './core/filter.js';
export {
  PredicateSetSchema,
  PredicateValueSchema,
  type PredicateSet,
  type PredicateValue,
  type PredicateScalar,
} from './core/types.js';
