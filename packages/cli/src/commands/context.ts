import { loadRuleTable, type RuleTable } from '@kconfig-audit/rule-db';
import { resolveRulesPath, type AuditLog } from '@kconfig-audit/runtime-host';
import type { Theme } from '../report/theme.js';

/** What a command writes to. The report goes to `out`; progress goes to `log`. */
export interface CommandContext {
  readonly out: (line: string) => void;
  readonly log: AuditLog;
  readonly theme: Theme;
  /** Passed to resolveRulesPath. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/** Load the rule database named by --rules, the environment, or the bundled default. */
export function loadRules(rules: string | undefined, ctx: CommandContext): RuleTable {
  const resolved = resolveRulesPath({ rules, env: ctx.env });
  if (resolved.origin !== 'bundled') ctx.log.info(`Rule database: ${resolved.path}`);
  return loadRuleTable(resolved.path);
}
