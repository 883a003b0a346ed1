/**
 * Rollup Module - Public API
 *
 * "Total" aggregates over a reduced dimension set, and the post-condition
 * that detail rows add up to them.
 */

export {
  buildRollup,
  keptDimensions,
  reconcile,
  rollupAndReconcile,
  withinTolerance,
} from './core/reconcile.js';
export {
  TOTAL_SENTINEL,
  DEFAULT_RECONCILIATION_TOLERANCE,
  RollupSpecSchema,
  type RollupSpec,
  type RollupTable,
} from './core/types.js';
export type { ReconciliationMismatchError, ReconciliationDifference } from './core/errors.js';
