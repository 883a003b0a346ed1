/**
 * Period helpers shared by the aggregation and derivation stages.
 */

/**
 * Frequency of a metric's time axis
 */
export enum Frequency {
  MONTH = 'MONTH',
  YEAR = 'YEAR',
}

/**
 * Returns the frequency implied by a metric's dimensions.
 * A metric with a Month dimension is monthly; otherwise it is yearly.
 */
export const frequencyOf = (dimensions: readonly string[]): Frequency =>
  dimensions.includes('Month') ? Frequency.MONTH : Frequency.YEAR;

/**
 * Maps a (year, month) pair onto a dense integer axis so that consecutive
 * periods differ by exactly one.
 *
 * - MONTH: year * 12 + (month - 1)
 * - YEAR: year
 *
 * Returns null when the period cannot be placed on the axis.
 */
export const toPeriodIndex = (
  frequency: Frequency,
  year: number | null,
  month: number | null
): number | null => {
  if (year === null || !Number.isInteger(year)) return null;
  if (frequency === Frequency.YEAR) return year;
  if (month === null || !Number.isInteger(month) || month < 1 || month > 12) return null;
  return year * 12 + (month - 1);
};

