import { describe, expect, it } from 'vitest';

import { rollingMean } from '@/modules/derived-metrics/index.js';

import { makeGrouped, monthlyKeys } from '../../fixtures/builders.js';

const MONTHLY = ['Year', 'Month'];

describe('rollingMean', () => {
  it('emits N - W + 1 values for N consecutive months', () => {
    const keys = [...monthlyKeys(2022, 12), { Year: 2023, Month: 1 }];
    const grouped = makeGrouped(
      MONTHLY,
      keys.map((key) => [key, 0.5] as const)
    );

    const result = rollingMean(grouped, { window: 12 })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key, row.value.toNumber()])).toEqual([
      [{ Year: 2022, Month: 12 }, 0.5],
      [{ Year: 2023, Month: 1 }, 0.5],
    ]);
  });

  it('emits nothing until the window is full', () => {
    const grouped = makeGrouped(
      MONTHLY,
      monthlyKeys(2023, 11).map((key) => [key, 1] as const)
    );

    expect(rollingMean(grouped, { window: 12 })._unsafeUnwrap().rows).toEqual([]);
  });

  it('averages the trailing window', () => {
    const grouped = makeGrouped(
      MONTHLY,
      monthlyKeys(2023, 4).map((key, index) => [key, index + 1] as const)
    );

    const result = rollingMean(grouped, { window: 3 })._unsafeUnwrap();

    expect(result.rows.map((row) => row.value.toNumber())).toEqual([2, 3]);
  });

  it('sorts each series by period before applying the window', () => {
    const grouped = makeGrouped(MONTHLY, [
      [{ Year: 2023, Month: 3 }, 30],
      [{ Year: 2023, Month: 1 }, 10],
      [{ Year: 2023, Month: 2 }, 20],
    ]);

    const result = rollingMean(grouped, { window: 2 })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key['Month'], row.value.toNumber()])).toEqual([
      [2, 15],
      [3, 25],
    ]);
  });

  it('keeps series apart by their non-time dimensions', () => {
    const grouped = makeGrouped(
      ['Year', 'Month', 'Region'],
      [
        [{ Year: 2023, Month: 1, Region: 'Auckland' }, 1],
        [{ Year: 2023, Month: 1, Region: 'Otago' }, 100],
        [{ Year: 2023, Month: 2, Region: 'Auckland' }, 3],
        [{ Year: 2023, Month: 2, Region: 'Otago' }, 300],
      ]
    );

    const result = rollingMean(grouped, { window: 2 })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key['Region'], row.value.toNumber()])).toEqual([
      ['Auckland', 2],
      ['Otago', 200],
    ]);
  });

  it('restarts the window after a gap in the period sequence', () => {
    const grouped = makeGrouped(MONTHLY, [
      [{ Year: 2023, Month: 1 }, 1],
      [{ Year: 2023, Month: 2 }, 1],
      [{ Year: 2023, Month: 4 }, 1],
      [{ Year: 2023, Month: 5 }, 1],
      [{ Year: 2023, Month: 6 }, 1],
    ]);

    const result = rollingMean(grouped, { window: 3 })._unsafeUnwrap();

    expect(result.rows.map((row) => row.key['Month'])).toEqual([6]);
  });

  it('crosses year boundaries for monthly series', () => {
    const grouped = makeGrouped(MONTHLY, [
      [{ Year: 2022, Month: 12 }, 2],
      [{ Year: 2023, Month: 1 }, 4],
    ]);

    const result = rollingMean(grouped, { window: 2 })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key, row.value.toNumber()])).toEqual([
      [{ Year: 2023, Month: 1 }, 3],
    ]);
  });

  it('uses years as periods for yearly series', () => {
    const grouped = makeGrouped(['Year'], [
      [{ Year: 2020 }, 1],
      [{ Year: 2021 }, 2],
      [{ Year: 2022 }, 6],
    ]);

    const result = rollingMean(grouped, { window: 3 })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key, row.value.toNumber()])).toEqual([
      [{ Year: 2022 }, 3],
    ]);
  });

  it('fails with InvalidPeriod for a month outside 1-12', () => {
    const grouped = makeGrouped(MONTHLY, [[{ Year: 2023, Month: 13 }, 1]]);

    expect(rollingMean(grouped, { window: 1 })._unsafeUnwrapErr().type).toBe('InvalidPeriod');
  });
});
