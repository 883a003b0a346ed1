import { type Static, Type } from '@sinclair/typebox';

import { AggregateSpecSchema, RequiredGroupsSchema } from '@/modules/aggregation/index.js';
import { RatioUnitSchema } from '@/modules/derived-metrics/index.js';
import { RollupSpecSchema } from '@/modules/rollup/index.js';
import { PredicateSetSchema } from '@/modules/segment-filter/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Output schema
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Columns every metric artifact starts with, in order. The metric value
 * column (named after the metric id) follows.
 */
export const OUTPUT_KEY_COLUMNS = [
  'Year',
  'Month',
  'Region',
  'Metric_Group',
  'Category',
  'Sub_Category',
  'Fuel_Type',
] as const;

/**
 * Dimensions a metric may group by. Each one has a column in the output schema.
 */
export const GROUPABLE_DIMENSIONS = [
  'Year',
  'Month',
  'Region',
  'Category',
  'Sub_Category',
  'Fuel_Type',
] as const;

export type GroupableDimension = (typeof GROUPABLE_DIMENSIONS)[number];

export interface MetricRow {
  Year: number;
  Month: number | null;
  Region: string | null;
  Metric_Group: string;
  Category: string | null;
  Sub_Category: string | null;
  Fuel_Type: string | null;
  value: number;
}

/**
 * One output artifact. Detail rows come first, then each rollup's rows.
 */
export interface MetricTable {
  metricId: string;
  outputName: string;
  /** Header of the value column; equals metricId */
  valueColumn: string;
  rows: MetricRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog file schema
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

const StampSchema = Type.Object({
  category: Type.Optional(NullableString),
  subCategory: Type.Optional(NullableString),
  fuelType: Type.Optional(NullableString),
  /** Region written when Region is not a dimension, e.g. "New Zealand" */
  region: Type.Optional(Type.String()),
});

const RatioFields = {
  numerator: PredicateSetSchema,
  /** Extra predicates on top of the segment; omitted means the whole segment */
  denominator: Type.Optional(PredicateSetSchema),
  unit: RatioUnitSchema,
};

const CountCalculationSchema = Type.Object({
  kind: Type.Literal('count'),
  idColumn: Type.Optional(Type.String({ minLength: 1 })),
});

const SumCalculationSchema = Type.Object({
  kind: Type.Literal('sum'),
  valueColumn: Type.String({ minLength: 1 }),
});

const RatioCalculationSchema = Type.Object({
  kind: Type.Literal('ratio'),
  aggregate: AggregateSpecSchema,
  ...RatioFields,
  /** Divide running totals instead of per-period values */
  cumulative: Type.Optional(Type.Boolean()),
});

const RollingMeanCalculationSchema = Type.Object({
  kind: Type.Literal('rolling_mean'),
  aggregate: AggregateSpecSchema,
  /** When present, the window runs over this ratio instead of the raw aggregate */
  ratio: Type.Optional(Type.Object(RatioFields)),
  window: Type.Integer({ minimum: 1 }),
});

const UnitConvertCalculationSchema = Type.Object({
  kind: Type.Literal('unit_convert'),
  valueColumn: Type.String({ minLength: 1 }),
  /** Named conversion (see UNIT_CONVERSIONS) or an explicit factor */
  conversion: Type.Union([
    Type.String({ minLength: 1 }),
    Type.Object({ factor: Type.Number({ exclusiveMinimum: 0 }) }),
  ]),
});

export const CalculationSchema = Type.Union([
  CountCalculationSchema,
  SumCalculationSchema,
  RatioCalculationSchema,
  RollingMeanCalculationSchema,
  UnitConvertCalculationSchema,
]);

export const MetricDefinitionSchema = Type.Object({
  metricId: Type.String({ minLength: 1 }),
  outputName: Type.String({ minLength: 1, pattern: '^[A-Za-z0-9_.-]+$' }),
  source: Type.String({ minLength: 1 }),
  metricGroup: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  filterConditions: Type.Optional(PredicateSetSchema),
  dimensions: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  stamp: Type.Optional(StampSchema),
  calculation: CalculationSchema,
  rollups: Type.Optional(Type.Array(RollupSpecSchema)),
  requiredGroups: Type.Optional(Type.Array(RequiredGroupsSchema)),
});

export const SourceDefinitionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  /** Path of the cleaned table, relative to the sources directory */
  file: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  /** Header renames applied on load, e.g. "Sub-Category" -> "Sub_Category" */
  renameColumns: Type.Optional(Type.Record(Type.String(), Type.String({ minLength: 1 }))),
  /** Columns parsed as numbers on load */
  numericColumns: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  /** Rule set applied before concordance (see reclassification module) */
  reclassify: Type.Optional(Type.String({ minLength: 1 })),
  /** Column with raw place labels; enables concordance resolution into "Region" */
  regionColumn: Type.Optional(Type.String({ minLength: 1 })),
});

export const CatalogFileSchema = Type.Object({
  version: Type.String(),
  sources: Type.Array(SourceDefinitionSchema),
  metrics: Type.Array(MetricDefinitionSchema),
});

export type Calculation = Static<typeof CalculationSchema>;
export type CalculationKind = Calculation['kind'];
export type MetricStamp = Static<typeof StampSchema>;
export type MetricDefinition = Static<typeof MetricDefinitionSchema>;
export type SourceDefinition = Static<typeof SourceDefinitionSchema>;
export type CatalogFileDTO = Static<typeof CatalogFileSchema>;

/**
 * Validated, immutable registry of sources and metrics.
 */
export interface MetricCatalog {
  readonly version: string;
  readonly sources: ReadonlyMap<string, SourceDefinition>;
  readonly metrics: readonly MetricDefinition[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Computation and run results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable settings shared by every metric of a run.
 */
export interface MetricContext {
  /** Relative tolerance for rollup reconciliation */
  readonly tolerance: number;
}

export interface MetricDiagnostics {
  inputRows: number;
  segmentRows: number;
  /** Segment rows removed because a grouping dimension was blank */
  incompleteRows: number;
  detailRows: number;
  rollupRows: number;
}

export type MetricComputation =
  | { status: 'computed'; table: MetricTable; diagnostics: MetricDiagnostics }
  | { status: 'skipped'; reason: string; diagnostics: MetricDiagnostics };
