import { describe, expect, it } from 'vitest';

import { computeRatio, ratioUpperBound } from '@/modules/derived-metrics/index.js';

import { makeGrouped } from '../../fixtures/builders.js';

const DIMENSIONS = ['Year', 'Region'];

describe('computeRatio', () => {
  it('computes a percentage per denominator key', () => {
    const numerator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 25]]);
    const denominator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 100]]);

    const result = computeRatio(numerator, denominator, { unit: 'percent' })._unsafeUnwrap();

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]!.value.toNumber()).toBe(25);
  });

  it('computes a fraction', () => {
    const numerator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 1]]);
    const denominator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 4]]);

    const result = computeRatio(numerator, denominator, { unit: 'fraction' })._unsafeUnwrap();

    expect(result.rows[0]!.value.toNumber()).toBe(0.25);
  });

  it('yields 0 for a zero denominator', () => {
    const numerator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 0]]);
    const denominator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 0]]);

    const result = computeRatio(numerator, denominator, { unit: 'percent' })._unsafeUnwrap();

    expect(result.rows[0]!.value.toNumber()).toBe(0);
  });

  it('left-joins on the denominator: missing numerators count as zero', () => {
    const numerator = makeGrouped(DIMENSIONS, [
      [{ Year: 2023, Region: 'Auckland' }, 1],
      [{ Year: 2023, Region: 'Atlantis' }, 9],
    ]);
    const denominator = makeGrouped(DIMENSIONS, [
      [{ Year: 2023, Region: 'Auckland' }, 2],
      [{ Year: 2023, Region: 'Canterbury' }, 5],
    ]);

    const result = computeRatio(numerator, denominator, { unit: 'percent' })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key['Region'], row.value.toNumber()])).toEqual([
      ['Auckland', 50],
      ['Canterbury', 0],
    ]);
  });

  it('fails with RatioOutOfBounds when the numerator exceeds the denominator', () => {
    const numerator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 3]]);
    const denominator = makeGrouped(DIMENSIONS, [[{ Year: 2023, Region: 'Auckland' }, 2]]);

    const error = computeRatio(numerator, denominator, { unit: 'percent' })._unsafeUnwrapErr();

    expect(error).toMatchObject({
      type: 'RatioOutOfBounds',
      key: { Year: 2023, Region: 'Auckland' },
      numerator: '3',
      denominator: '2',
    });
  });

  it('fails with RatioOutOfBounds for a negative ratio', () => {
    const numerator = makeGrouped(['Year'], [[{ Year: 2023 }, -1]]);
    const denominator = makeGrouped(['Year'], [[{ Year: 2023 }, 2]]);

    const error = computeRatio(numerator, denominator, { unit: 'fraction' })._unsafeUnwrapErr();

    expect(error.type).toBe('RatioOutOfBounds');
  });

  it('keeps every value within the unit bound', () => {
    const keys = [1, 2, 3, 4, 5].map((year) => ({ Year: year }));
    const numerator = makeGrouped(
      ['Year'],
      keys.map((key, index) => [key, index] as const)
    );
    const denominator = makeGrouped(
      ['Year'],
      keys.map((key) => [key, 4] as const)
    );

    const result = computeRatio(numerator, denominator, { unit: 'percent' })._unsafeUnwrap();

    for (const row of result.rows) {
      expect(row.value.greaterThanOrEqualTo(0)).toBe(true);
      expect(row.value.lessThanOrEqualTo(ratioUpperBound('percent'))).toBe(true);
    }
    expect(result.rows.map((row) => row.value.toNumber())).toEqual([0, 25, 50, 75, 100]);
  });
});
