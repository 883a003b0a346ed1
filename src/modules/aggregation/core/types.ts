import { type Static, Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

export type GroupKeyValue = string | number;

/**
 * Dimension -> value for one group. Holds exactly the grouped table's dimensions.
 */
export type GroupKey = Readonly<Record<string, GroupKeyValue>>;

export interface GroupedRow {
  readonly key: GroupKey;
  readonly value: Decimal;
}

/**
 * One row per distinct key, ordered by key (see compareKeys).
 */
export interface GroupedTable {
  readonly dimensions: readonly string[];
  readonly rows: readonly GroupedRow[];
}

export const CountAggregateSchema = Type.Object({
  kind: Type.Literal('count'),
  /** When set, only rows with a non-blank value in this column are counted */
  idColumn: Type.Optional(Type.String({ minLength: 1 })),
});

export const SumAggregateSchema = Type.Object({
  kind: Type.Literal('sum'),
  valueColumn: Type.String({ minLength: 1 }),
});

export const AggregateSpecSchema = Type.Union([CountAggregateSchema, SumAggregateSchema]);

export type CountAggregate = Static<typeof CountAggregateSchema>;
export type SumAggregate = Static<typeof SumAggregateSchema>;
export type AggregateSpec = Static<typeof AggregateSpecSchema>;

/**
 * Values that must appear for a dimension even when no row carries them.
 */
export const RequiredGroupsSchema = Type.Object({
  dimension: Type.String({ minLength: 1 }),
  values: Type.Array(Type.Union([Type.String(), Type.Number()]), { minItems: 1 }),
});

export type RequiredGroups = Static<typeof RequiredGroupsSchema>;
