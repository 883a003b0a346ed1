import { err, ok, type Result } from 'neverthrow';

import { createMissingColumnError, type MissingColumnError } from '@/common/types/errors.js';
import { createTable, missingColumns, type DataRow, type DataTable } from '@/common/types/table.js';

import type { RuleSet, RuleTable } from './types.js';

/**
 * Returns the result of the first rule whose predicate matches,
 * or the table's fallback.
 */
export const classifyRow = (row: DataRow, table: RuleTable): string => {
  for (const rule of table.rules) {
    if (rule.when(row)) {
      return rule.then;
    }
  }
  return table.fallback;
};

/**
 * Applies each rule table in order, adding or overwriting its target column.
 * Every table sees the original row, so one table's output never feeds another.
 */
export const applyRuleTables = (table: DataTable, ruleTables: readonly RuleTable[]): DataTable => {
  const columns = [...table.columns];
  for (const ruleTable of ruleTables) {
    if (!columns.includes(ruleTable.column)) columns.push(ruleTable.column);
  }

  const rows = table.rows.map((row) => {
    const classified: Record<string, string> = {};
    for (const ruleTable of ruleTables) {
      classified[ruleTable.column] = classifyRow(row, ruleTable);
    }
    return { ...row, ...classified };
  });

  return createTable(columns, rows);
};

/**
 * Applies a named rule set after checking that its input columns exist.
 */
export const applyRuleSet = (
  table: DataTable,
  ruleSet: RuleSet
): Result<DataTable, MissingColumnError> => {
  const missing = missingColumns(table, ruleSet.requires);
  if (missing.length > 0) {
    return err(createMissingColumnError(missing, `Reclassification '${ruleSet.id}'`));
  }
  return ok(applyRuleTables(table, ruleSet.tables));
};
