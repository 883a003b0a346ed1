import { err, ok, type Result } from 'neverthrow';

import {
  createValidationError,
  type MissingColumnError,
  type ValidationError,
} from '@/common/types/errors.js';
import {
  createConcordanceResolver,
  resolveTableRegions,
  type ConcordanceMap,
  type ConcordanceStats,
} from '@/modules/concordance/index.js';
import { applyRuleSet, getRuleSet } from '@/modules/reclassification/index.js';

import type { SourceDefinition } from '../types.js';
import type { DataTable } from '@/common/types/table.js';

/** Column that receives canonical regions */
export const REGION_COLUMN = 'Region';

export interface PreparedSource {
  table: DataTable;
  /** Raw labels that resolved to "Unknown"; empty when no concordance ran */
  unmappedLabels: string[];
  concordance: ConcordanceStats | null;
}

/**
 * Runs the once-per-source stages: reclassification, then concordance.
 */
export const prepareSource = (
  table: DataTable,
  source: SourceDefinition,
  concordance: ConcordanceMap
): Result<PreparedSource, MissingColumnError | ValidationError> => {
  let prepared = table;

  if (source.reclassify !== undefined) {
    const ruleSet = getRuleSet(source.reclassify);
    if (ruleSet === undefined) {
      return err(
        createValidationError(`Unknown reclassification rule set '${source.reclassify}'`, 'reclassify')
      );
    }
    const classified = applyRuleSet(prepared, ruleSet);
    if (classified.isErr()) return err(classified.error);
    prepared = classified.value;
  }

  if (source.regionColumn === undefined) {
    return ok({ table: prepared, unmappedLabels: [], concordance: null });
  }

  const resolver = createConcordanceResolver(concordance);
  const resolved = resolveTableRegions(
    prepared,
    { sourceColumn: source.regionColumn, targetColumn: REGION_COLUMN },
    resolver
  );
  if (resolved.isErr()) return err(resolved.error);

  return ok({
    table: resolved.value,
    unmappedLabels: resolver.unmappedLabels(),
    concordance: resolver.stats(),
  });
};
