/**
 * @kconfig-audit/rule-db
 *
 * Hardening recommendations as validated data.
 */

export type { Rule, RuleTable } from './types.js';
export { RULE_DATABASE_VERSION, RuleDatabaseError } from './types.js';
export { validateRuleDatabase, parseExpectation } from './validator.js';
export { loadRuleTable, parseRuleTable, BUNDLED_RULES_PATH } from './loader.js';
export type { ChecklistSources } from './checklist.js';
export { buildChecklist } from './checklist.js';
