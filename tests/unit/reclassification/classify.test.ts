import { describe, expect, it } from 'vitest';

import {
  allOf,
  applyRuleSet,
  applyRuleTables,
  classifyRow,
  fieldEquals,
  fieldIn,
  numberAbove,
  numberAtMost,
  type RuleTable,
} from '@/modules/reclassification/index.js';

import { makeTable } from '../../fixtures/builders.js';

const sizeRules: RuleTable = {
  column: 'Size',
  rules: [
    { when: numberAtMost('Mass', 100), then: 'Small' },
    { when: numberAtMost('Mass', 1000), then: 'Medium' },
    { when: numberAbove('Mass', 1000), then: 'Large' },
  ],
  fallback: 'Unknown',
};

describe('predicates', () => {
  it('fieldEquals and fieldIn compare numeric strings by value', () => {
    expect(fieldEquals('Code', 7)({ Code: '7' })).toBe(true);
    expect(fieldIn('Code', ['A', 'B'])({ Code: 'B' })).toBe(true);
    expect(fieldIn('Code', ['A', 'B'])({ Code: 'C' })).toBe(false);
  });

  it('numeric predicates never match blank or non-numeric cells', () => {
    expect(numberAtMost('Mass', 10)({ Mass: null })).toBe(false);
    expect(numberAbove('Mass', 10)({ Mass: 'heavy' })).toBe(false);
    expect(numberAtMost('Mass', 10)({ Mass: '10' })).toBe(true);
    expect(numberAbove('Mass', 10)({ Mass: 10 })).toBe(false);
  });

  it('allOf requires every predicate', () => {
    const predicate = allOf(fieldEquals('Type', 'VAN'), numberAbove('Mass', 10));

    expect(predicate({ Type: 'VAN', Mass: 11 })).toBe(true);
    expect(predicate({ Type: 'VAN', Mass: 9 })).toBe(false);
  });
});

describe('classifyRow', () => {
  it('returns the first matching rule', () => {
    expect(classifyRow({ Mass: 50 }, sizeRules)).toBe('Small');
    expect(classifyRow({ Mass: 100 }, sizeRules)).toBe('Small');
    expect(classifyRow({ Mass: 101 }, sizeRules)).toBe('Medium');
    expect(classifyRow({ Mass: 5000 }, sizeRules)).toBe('Large');
  });

  it('falls back when no rule matches', () => {
    expect(classifyRow({ Mass: null }, sizeRules)).toBe('Unknown');
  });
});

describe('applyRuleTables', () => {
  it('adds target columns and overwrites existing ones', () => {
    const table = makeTable([
      { Mass: 40, Size: 'stale' },
      { Mass: 4000, Size: 'stale' },
    ]);

    const result = applyRuleTables(table, [sizeRules]);

    expect(result.columns).toEqual(['Mass', 'Size']);
    expect(result.rows.map((row) => row['Size'])).toEqual(['Small', 'Large']);
    expect(table.rows[0]!['Size']).toBe('stale');
  });

  it('evaluates every table against the original row', () => {
    const echo: RuleTable = {
      column: 'Echo',
      rules: [{ when: fieldEquals('Size', 'Small'), then: 'saw Small' }],
      fallback: 'saw original',
    };
    const table = makeTable([{ Mass: 40, Size: 'Original' }]);

    const result = applyRuleTables(table, [sizeRules, echo]);

    expect(result.rows[0]).toEqual({ Mass: 40, Size: 'Small', Echo: 'saw original' });
  });
});

describe('applyRuleSet', () => {
  it('fails with MissingColumn when a required column is absent', () => {
    const table = makeTable([{ Mass: 40 }]);

    const result = applyRuleSet(table, { id: 'sizes', requires: ['Mass', 'Type'], tables: [] });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MissingColumn');
    expect(error.columns).toEqual(['Type']);
    expect(error.message).toBe(
      "Reclassification 'sizes' requires column(s) not present in the input: Type"
    );
  });
});
