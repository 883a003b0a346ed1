import { describe, expect, it } from 'vitest';

import {
  cellEquals,
  compareCells,
  isBlank,
  missingColumns,
  readCell,
  toDecimal,
} from '@/common/types/table.js';

import { makeTable } from '../../fixtures/builders.js';

describe('table helpers', () => {
  describe('toDecimal', () => {
    it('parses numbers and numeric strings', () => {
      expect(toDecimal(12)?.toString()).toBe('12');
      expect(toDecimal(' 3.5 ')?.toString()).toBe('3.5');
      expect(toDecimal('-1e3')?.toString()).toBe('-1000');
    });

    it('returns null for blank cells', () => {
      expect(toDecimal(null)).toBeNull();
      expect(toDecimal('   ')).toBeNull();
    });

    it('returns undefined for non-numeric cells', () => {
      expect(toDecimal('abc')).toBeUndefined();
      expect(toDecimal('12kg')).toBeUndefined();
      expect(toDecimal(Number.NaN)).toBeUndefined();
    });
  });

  describe('cellEquals', () => {
    it('compares numbers and numeric strings by value', () => {
      expect(cellEquals('2023', 2023)).toBe(true);
      expect(cellEquals(1, '1.0')).toBe(true);
      expect(cellEquals('2023', 2024)).toBe(false);
    });

    it('compares strings exactly', () => {
      expect(cellEquals('BEV', 'BEV')).toBe(true);
      expect(cellEquals('BEV', 'bev')).toBe(false);
    });

    it('treats null as equal only to null', () => {
      expect(cellEquals(null, null)).toBe(true);
      expect(cellEquals(null, '')).toBe(false);
    });
  });

  it('orders nulls first, then numbers, then strings by code point', () => {
    const cells = ['b', 2, null, 'B', 1, 'a'];

    expect([...cells].sort(compareCells)).toEqual([null, 1, 2, 'B', 'a', 'b']);
  });

  it('orders characters outside the basic plane after the rest of it', () => {
    const cells = ['\u{1F697}', '\uFF5E', 'z'];

    expect([...cells].sort(compareCells)).toEqual(['z', '\uFF5E', '\u{1F697}']);
  });

  it('reads absent keys as null and detects blank cells', () => {
    const table = makeTable([{ Region: 'Auckland' }]);
    const row = table.rows[0]!;

    expect(readCell(row, 'Region')).toBe('Auckland');
    expect(readCell(row, 'Month')).toBeNull();
    expect(isBlank(' ')).toBe(true);
    expect(isBlank(0)).toBe(false);
  });

  it('lists required columns missing from a table', () => {
    const table = makeTable([{ Year: 2023, Region: 'Auckland' }]);

    expect(missingColumns(table, ['Year', 'Month', 'Fuel_Type'])).toEqual(['Month', 'Fuel_Type']);
  });
});
