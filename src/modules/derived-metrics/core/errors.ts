import type { GroupKey } from '@/modules/aggregation/index.js';

/**
 * A ratio fell outside its unit's bounds, which means the numerator was
 * not a subset of the denominator.
 */
export interface RatioOutOfBoundsError {
  readonly type: 'RatioOutOfBounds';
  readonly message: string;
  readonly key: GroupKey;
  readonly numerator: string;
  readonly denominator: string;
}

/**
 * A rolling window cannot be applied because rows lack a usable period.
 */
export interface InvalidPeriodError {
  readonly type: 'InvalidPeriod';
  readonly message: string;
  readonly key: GroupKey;
}

export type DerivationError = RatioOutOfBoundsError | InvalidPeriodError;
