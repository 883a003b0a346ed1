import { type Static, Type } from '@sinclair/typebox';

export const RatioUnitSchema = Type.Union([Type.Literal('percent'), Type.Literal('fraction')]);

/**
 * percent: 100 * n / d, bounded by [0, 100]
 * fraction: n / d, bounded by [0, 1]
 */
export type RatioUnit = Static<typeof RatioUnitSchema>;

export interface RatioOptions {
  unit: RatioUnit;
}

export interface RollingMeanOptions {
  /** Number of consecutive periods in the window; also the minimum periods for output */
  window: number;
}
