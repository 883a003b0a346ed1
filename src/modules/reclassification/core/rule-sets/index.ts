import { vehicleRegisterRuleSet } from './vehicle-register.js';

import type { RuleSet } from '../types.js';

/**
 * Rule sets a source declaration may reference by id.
 */
export const RULE_SETS: ReadonlyMap<string, RuleSet> = new Map([
  [vehicleRegisterRuleSet.id, vehicleRegisterRuleSet],
]);

export const getRuleSet = (id: string): RuleSet | undefined => RULE_SETS.get(id);
