/**
 * Reclassification Module - Public API
 *
 * Ordered (predicate, result) rule tables that map raw source codes onto
 * the canonical category columns before metrics are computed.
 */

export { classifyRow, applyRuleTables, applyRuleSet } from './core/classify.js';
export { fieldEquals, fieldIn, numberAtMost, numberAbove, allOf } from './core/predicates.js';
export { RULE_SETS, getRuleSet } from './core/rule-sets/index.js';
export {
  vehicleRegisterRuleSet,
  categoryRules,
  subCategoryRules,
  fuelTypeRules,
  conditionRules,
  LIGHT_VEHICLE_MASS_LIMIT_KG,
} from './core/rule-sets/vehicle-register.js';

export type { RowPredicate, ClassificationRule, RuleTable, RuleSet } from './core/types.js';
