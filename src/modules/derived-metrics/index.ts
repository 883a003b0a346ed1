/**
 * Derived Metrics Module - Public API
 *
 * Calculations applied to grouped aggregates: ratios, unit conversions,
 * trailing rolling means and running totals.
 */

export { computeRatio, ratioUpperBound } from './core/ratio.js';
export {
  convertUnits,
  isUnitConversionName,
  UNIT_CONVERSIONS,
  type UnitConversionName,
} from './core/unit-convert.js';
export { rollingMean } from './core/rolling-mean.js';
export { cumulativeSum } from './core/cumulative.js';
export { seriesDimensions, splitSeries, type PeriodRow } from './core/time-series.js';
export {
  RatioUnitSchema,
  type RatioUnit,
  type RatioOptions,
  type RollingMeanOptions,
} from './core/types.js';
export type {
  DerivationError,
  RatioOutOfBoundsError,
  InvalidPeriodError,
} from './core/errors.js';
