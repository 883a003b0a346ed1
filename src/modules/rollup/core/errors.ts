import type { GroupKey } from '@/modules/aggregation/index.js';

export interface ReconciliationDifference {
  readonly key: GroupKey;
  /** Sum of detail rows over the dropped dimensions; null when no detail row exists */
  readonly detail: string | null;
  /** Rollup value; null when the rollup has no row for the key */
  readonly rollup: string | null;
}

/**
 * Detail rows do not add up to their rollup. This points at an aggregation
 * bug, never at a data-quality problem.
 */
export interface ReconciliationMismatchError {
  readonly type: 'ReconciliationMismatch';
  readonly message: string;
  readonly drop: readonly string[];
  readonly differences: readonly ReconciliationDifference[];
}
