import type { DataRow } from '@/common/types/table.js';

/**
 * Predicate over a single source row.
 */
export type RowPredicate = (row: DataRow) => boolean;

/**
 * One (predicate, result) pair of a rule table.
 */
export interface ClassificationRule {
  readonly when: RowPredicate;
  readonly then: string;
}

/**
 * Ordered first-match-wins mapping onto one target column.
 * `fallback` is mandatory and applies when no rule matches.
 */
export interface RuleTable {
  readonly column: string;
  readonly rules: readonly ClassificationRule[];
  readonly fallback: string;
}

/**
 * Named group of rule tables applied together to one source.
 */
export interface RuleSet {
  readonly id: string;
  /** Columns the rules read; absent columns fail the whole set */
  readonly requires: readonly string[];
  readonly tables: readonly RuleTable[];
}
