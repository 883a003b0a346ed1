/**
 * Compute Metric Use Case
 *
 * Pure per-metric pipeline over a prepared source table:
 * filter -> drop incomplete keys -> aggregate -> derive -> rollup + reconcile -> stamp.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createMissingColumnError } from '@/common/types/errors.js';
import { missingColumns, type DataTable } from '@/common/types/table.js';
import {
  aggregate,
  completeGroups,
  dropIncompleteKeys,
  serializeKey,
  type AggregateSpec,
  type GroupedTable,
  type RequiredGroups,
} from '@/modules/aggregation/index.js';
import {
  computeRatio,
  convertUnits,
  cumulativeSum,
  isUnitConversionName,
  rollingMean,
  UNIT_CONVERSIONS,
  type RatioUnit,
} from '@/modules/derived-metrics/index.js';
import { rollupAndReconcile, type RollupTable } from '@/modules/rollup/index.js';
import { describePredicates, filterRows, type PredicateSet } from '@/modules/segment-filter/index.js';

import { createInvalidDefinitionError, type ComputeMetricError } from '../errors.js';
import { stampRows } from '../stamp.js';

import type {
  Calculation,
  MetricComputation,
  MetricContext,
  MetricDefinition,
  MetricDiagnostics,
  MetricRow,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A grouped result before stamping. `drop` is empty for detail rows.
 */
interface DerivedBlock {
  drop: readonly string[];
  grouped: GroupedTable;
}

interface RatioSpec {
  numerator: PredicateSet;
  denominator?: PredicateSet | undefined;
  unit: RatioUnit;
}

interface PipelineInput {
  subset: DataTable;
  definition: MetricDefinition;
  tolerance: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const withRequiredGroups = (
  grouped: GroupedTable,
  required: readonly RequiredGroups[] | undefined
): GroupedTable => (required ?? []).reduce(completeGroups, grouped);

const aggregateWithGroups = (
  table: DataTable,
  definition: MetricDefinition,
  spec: AggregateSpec
): Result<GroupedTable, ComputeMetricError> =>
  aggregate(table, definition.dimensions, spec).map((grouped) =>
    withRequiredGroups(grouped, definition.requiredGroups)
  );

/**
 * Aggregates a subset and each declared rollup of it, reconciling every
 * rollup against the detail before it is returned.
 */
const aggregateWithRollups = (
  table: DataTable,
  definition: MetricDefinition,
  spec: AggregateSpec,
  tolerance: number
): Result<DerivedBlock[], ComputeMetricError> => {
  const detail = aggregateWithGroups(table, definition, spec);
  if (detail.isErr()) return err(detail.error);

  const blocks: DerivedBlock[] = [{ drop: [], grouped: detail.value }];
  for (const { drop } of definition.rollups ?? []) {
    const rollup = rollupAndReconcile(table, detail.value, drop, spec, tolerance);
    if (rollup.isErr()) return err(rollup.error);
    blocks.push(toBlock(rollup.value, definition));
  }
  return ok(blocks);
};

const toBlock = (rollup: RollupTable, definition: MetricDefinition): DerivedBlock => ({
  drop: rollup.drop,
  grouped: withRequiredGroups(rollup.grouped, definition.requiredGroups),
});

const resolveFactor = (
  definition: MetricDefinition,
  conversion: string | { factor: number }
): Result<Decimal.Value, ComputeMetricError> => {
  if (typeof conversion !== 'string') return ok(conversion.factor);
  if (!isUnitConversionName(conversion)) {
    return err(
      createInvalidDefinitionError(definition.outputName, `unknown unit conversion '${conversion}'`)
    );
  }
  return ok(UNIT_CONVERSIONS[conversion]);
};

/**
 * Numerator and denominator blocks of a ratio, paired by rollup.
 * The optional denominator predicates scope the segment and the numerator
 * predicates narrow that scope, so numerator rows are always denominator rows.
 */
const ratioBlocks = (
  input: PipelineInput,
  spec: AggregateSpec,
  ratio: RatioSpec,
  withRollups: boolean
): Result<{ numerators: DerivedBlock[]; denominators: DerivedBlock[] }, ComputeMetricError> => {
  const { subset, definition, tolerance } = input;
  const scoped: MetricDefinition = withRollups ? definition : { ...definition, rollups: [] };

  return filterRows(subset, ratio.denominator ?? {}).andThen((denominatorRows) =>
    aggregateWithRollups(denominatorRows, scoped, spec, tolerance).andThen((denominators) =>
      filterRows(denominatorRows, ratio.numerator)
        .andThen((numeratorRows) => aggregateWithRollups(numeratorRows, scoped, spec, tolerance))
        .map((numerators) => ({ numerators, denominators }))
    )
  );
};

/**
 * Adds a zero numerator row for every denominator key the numerator lacks,
 * so a running total carries through periods without numerator rows.
 */
const alignToDenominator = (numerator: GroupedTable, denominator: GroupedTable): GroupedTable => {
  const dimensions = denominator.dimensions;
  const present = new Set(numerator.rows.map((row) => serializeKey(row.key, dimensions)));
  const missing = denominator.rows
    .filter((row) => !present.has(serializeKey(row.key, dimensions)))
    .map((row) => ({ key: row.key, value: new Decimal(0) }));
  if (missing.length === 0) return numerator;
  return { dimensions: numerator.dimensions, rows: [...numerator.rows, ...missing] };
};

const divideBlocks = (
  numerators: readonly DerivedBlock[],
  denominators: readonly DerivedBlock[],
  unit: RatioUnit,
  cumulative: boolean
): Result<DerivedBlock[], ComputeMetricError> => {
  const blocks: DerivedBlock[] = [];
  for (const [index, denominator] of denominators.entries()) {
    const numerator = numerators[index];
    if (numerator === undefined) break;

    let top = numerator.grouped;
    let bottom = denominator.grouped;
    if (cumulative) {
      const runningTop = cumulativeSum(alignToDenominator(top, bottom));
      if (runningTop.isErr()) return err(runningTop.error);
      const runningBottom = cumulativeSum(bottom);
      if (runningBottom.isErr()) return err(runningBottom.error);
      top = runningTop.value;
      bottom = runningBottom.value;
    }

    const ratio = computeRatio(top, bottom, { unit });
    if (ratio.isErr()) return err(ratio.error);
    blocks.push({ drop: denominator.drop, grouped: ratio.value });
  }
  return ok(blocks);
};

const derive = (
  input: PipelineInput,
  calculation: Calculation
): Result<DerivedBlock[], ComputeMetricError> => {
  const { subset, definition, tolerance } = input;

  switch (calculation.kind) {
    case 'count':
      return aggregateWithRollups(
        subset,
        definition,
        calculation.idColumn !== undefined
          ? { kind: 'count', idColumn: calculation.idColumn }
          : { kind: 'count' },
        tolerance
      );

    case 'sum':
      return aggregateWithRollups(
        subset,
        definition,
        { kind: 'sum', valueColumn: calculation.valueColumn },
        tolerance
      );

    case 'unit_convert':
      return resolveFactor(definition, calculation.conversion).andThen((factor) =>
        aggregateWithRollups(
          subset,
          definition,
          { kind: 'sum', valueColumn: calculation.valueColumn },
          tolerance
        ).map((blocks) =>
          blocks.map((block) => ({ drop: block.drop, grouped: convertUnits(block.grouped, factor) }))
        )
      );

    case 'ratio':
      return ratioBlocks(input, calculation.aggregate, calculation, true).andThen(
        ({ numerators, denominators }) =>
          divideBlocks(numerators, denominators, calculation.unit, calculation.cumulative === true)
      );

    case 'rolling_mean': {
      const { window, ratio } = calculation;
      const base: Result<GroupedTable, ComputeMetricError> =
        ratio === undefined
          ? aggregateWithGroups(subset, definition, calculation.aggregate)
          : ratioBlocks(input, calculation.aggregate, ratio, false)
              .andThen(({ numerators, denominators }) =>
                divideBlocks(numerators, denominators, ratio.unit, false)
              )
              .andThen((blocks) => {
                const [detail] = blocks;
                return detail === undefined
                  ? err(createInvalidDefinitionError(definition.outputName, 'ratio produced no rows'))
                  : ok(detail.grouped);
              });

      return base
        .andThen((grouped) => rollingMean(grouped, { window }))
        .map((grouped) => [{ drop: [], grouped }]);
    }
  }
};

const emptyDiagnostics = (inputRows: number): MetricDiagnostics => ({
  inputRows,
  segmentRows: 0,
  incompleteRows: 0,
  detailRows: 0,
  rollupRows: 0,
});

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Computes one metric from its prepared source table.
 *
 * An empty segment is not an error: the metric is reported as skipped so
 * the run can continue. Every other failure is returned as an error and
 * nothing of the metric is produced.
 */
export const computeMetric = (
  table: DataTable,
  definition: MetricDefinition,
  context: MetricContext
): Result<MetricComputation, ComputeMetricError> => {
  const predicates = definition.filterConditions ?? {};
  const filtered = filterRows(table, predicates);
  if (filtered.isErr()) return err(filtered.error);

  const absent = missingColumns(filtered.value, definition.dimensions);
  if (absent.length > 0) {
    return err(createMissingColumnError(absent, 'Grouped aggregation'));
  }

  const diagnostics = emptyDiagnostics(table.rows.length);
  diagnostics.segmentRows = filtered.value.rows.length;

  if (filtered.value.rows.length === 0) {
    return ok({
      status: 'skipped',
      reason: `EmptySegment: no rows match ${describePredicates(predicates)}`,
      diagnostics,
    });
  }

  const { table: subset, dropped } = dropIncompleteKeys(filtered.value, definition.dimensions);
  diagnostics.incompleteRows = dropped;

  if (subset.rows.length === 0) {
    return ok({
      status: 'skipped',
      reason: `EmptySegment: every matching row has a blank value in ${definition.dimensions.join(', ')}`,
      diagnostics,
    });
  }

  const derived = derive({ subset, definition, tolerance: context.tolerance }, definition.calculation);
  if (derived.isErr()) return err(derived.error);

  const rows: MetricRow[] = [];
  for (const block of derived.value) {
    const stamped = stampRows(definition, block.grouped, block.drop);
    if (stamped.isErr()) return err(stamped.error);

    rows.push(...stamped.value);
    if (block.drop.length === 0) {
      diagnostics.detailRows += stamped.value.length;
    } else {
      diagnostics.rollupRows += stamped.value.length;
    }
  }

  return ok({
    status: 'computed',
    table: {
      metricId: definition.metricId,
      outputName: definition.outputName,
      valueColumn: definition.metricId,
      rows,
    },
    diagnostics,
  });
};
