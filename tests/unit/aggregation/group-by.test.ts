import { describe, expect, it } from 'vitest';

import {
  aggregate,
  completeGroups,
  dropIncompleteKeys,
  sumByKey,
} from '@/modules/aggregation/index.js';

import { makeGrouped, makeTable } from '../../fixtures/builders.js';

const values = (rows: readonly { value: { toNumber(): number } }[]): number[] =>
  rows.map((row) => row.value.toNumber());

describe('aggregate', () => {
  const table = makeTable([
    { Year: 2023, Region: 'Canterbury', OBJECTID: 1, kWh: '10.5' },
    { Year: 2023, Region: 'Auckland', OBJECTID: 2, kWh: 4 },
    { Year: 2023, Region: 'Auckland', OBJECTID: null, kWh: null },
    { Year: 2022, Region: 'Auckland', OBJECTID: 4, kWh: 1 },
  ]);

  it('counts rows per key, ordered by key', () => {
    const result = aggregate(table, ['Year', 'Region'], { kind: 'count' })._unsafeUnwrap();

    expect(result.dimensions).toEqual(['Year', 'Region']);
    expect(result.rows.map((row) => row.key)).toEqual([
      { Year: 2022, Region: 'Auckland' },
      { Year: 2023, Region: 'Auckland' },
      { Year: 2023, Region: 'Canterbury' },
    ]);
    expect(values(result.rows)).toEqual([1, 2, 1]);
  });

  it('counts only rows with a non-blank id column', () => {
    const result = aggregate(table, ['Year', 'Region'], {
      kind: 'count',
      idColumn: 'OBJECTID',
    })._unsafeUnwrap();

    expect(values(result.rows)).toEqual([1, 1, 1]);
  });

  it('sums a value column exactly, skipping blank cells', () => {
    const result = aggregate(table, ['Region'], { kind: 'sum', valueColumn: 'kWh' })._unsafeUnwrap();

    expect(result.rows.map((row) => [row.key['Region'], row.value.toString()])).toEqual([
      ['Auckland', '5'],
      ['Canterbury', '10.5'],
    ]);
  });

  it('keeps decimal precision across many additions', () => {
    const tenths = makeTable(Array.from({ length: 10 }, () => ({ Year: 2023, v: 0.1 })));

    const result = aggregate(tenths, ['Year'], { kind: 'sum', valueColumn: 'v' })._unsafeUnwrap();

    expect(result.rows[0]!.value.toString()).toBe('1');
  });

  it('fails with InvalidNumericValue for a non-numeric value cell', () => {
    const bad = makeTable([{ Year: 2023, kWh: 'n/a' }]);

    const error = aggregate(bad, ['Year'], { kind: 'sum', valueColumn: 'kWh' })._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'InvalidNumericValue', column: 'kWh', value: 'n/a' });
  });

  it('fails with MissingColumn when a dimension is absent', () => {
    const error = aggregate(table, ['Year', 'Fuel_Type'], { kind: 'count' })._unsafeUnwrapErr();

    expect(error.type).toBe('MissingColumn');
    expect(error.message).toBe(
      'Grouped aggregation requires column(s) not present in the input: Fuel_Type'
    );
  });

  it('returns no rows for an empty table', () => {
    const empty = makeTable([], ['Year']);

    expect(aggregate(empty, ['Year'], { kind: 'count' })._unsafeUnwrap().rows).toEqual([]);
  });
});

describe('dropIncompleteKeys', () => {
  it('removes rows with a blank dimension and counts them', () => {
    const table = makeTable([
      { Year: 2023, Region: 'Auckland' },
      { Year: 2023, Region: '' },
      { Year: null, Region: 'Auckland' },
    ]);

    const { table: complete, dropped } = dropIncompleteKeys(table, ['Year', 'Region']);

    expect(complete.rows).toEqual([{ Year: 2023, Region: 'Auckland' }]);
    expect(dropped).toBe(2);
  });
});

describe('sumByKey', () => {
  it('re-aggregates onto fewer dimensions', () => {
    const grouped = makeGrouped(
      ['Year', 'Region'],
      [
        [{ Year: 2023, Region: 'Auckland' }, 3],
        [{ Year: 2023, Region: 'Canterbury' }, 2],
        [{ Year: 2024, Region: 'Auckland' }, 5],
      ]
    );

    const result = sumByKey(grouped, ['Year']);

    expect(result.rows.map((row) => [row.key, row.value.toNumber()])).toEqual([
      [{ Year: 2023 }, 5],
      [{ Year: 2024 }, 5],
    ]);
  });
});

describe('completeGroups', () => {
  it('adds zero rows for required values missing from an observed key', () => {
    const grouped = makeGrouped(
      ['Year', 'Fuel_Type'],
      [
        [{ Year: 2023, Fuel_Type: 'BEV' }, 4],
        [{ Year: 2024, Fuel_Type: 'PHEV' }, 1],
      ]
    );

    const result = completeGroups(grouped, { dimension: 'Fuel_Type', values: ['BEV', 'PHEV'] });

    expect(result.rows.map((row) => [row.key, row.value.toNumber()])).toEqual([
      [{ Year: 2023, Fuel_Type: 'BEV' }, 4],
      [{ Year: 2023, Fuel_Type: 'PHEV' }, 0],
      [{ Year: 2024, Fuel_Type: 'BEV' }, 0],
      [{ Year: 2024, Fuel_Type: 'PHEV' }, 1],
    ]);
  });

  it('leaves a table unchanged when the dimension is not grouped', () => {
    const grouped = makeGrouped(['Year'], [[{ Year: 2023 }, 4]]);

    expect(completeGroups(grouped, { dimension: 'Fuel_Type', values: ['BEV'] })).toBe(grouped);
  });
});
