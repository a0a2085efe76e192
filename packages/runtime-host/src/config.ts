/**
 * kconfig-audit Runtime Host — Configuration Resolution
 *
 * Resolves the rule database path using the following precedence:
 *
 *   1. Explicit `rules` option (the --rules CLI flag)
 *   2. KCONFIG_AUDIT_RULES environment variable
 *   3. Default: the bundled database of @kconfig-audit/rule-db
 *
 * Colour follows chalk's own detection (NO_COLOR, FORCE_COLOR, TTY) and is
 * always off for JSON output.
 */

import chalk from 'chalk';
import type { ColorSupportLevel } from 'chalk';
import { BUNDLED_RULES_PATH } from '@kconfig-audit/rule-db';

export const RULES_ENV = 'KCONFIG_AUDIT_RULES';

export type RulesOrigin = 'flag' | 'env' | 'bundled';

export interface ResolvedRules {
  readonly path: string;
  readonly origin: RulesOrigin;
}

export interface ResolveRulesOptions {
  /** Explicit override, highest precedence. */
  readonly rules?: string | undefined;
  /** Environment to read. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve which rule database to load.
 */
export function resolveRulesPath(opts?: ResolveRulesOptions): ResolvedRules {
  const env = opts?.env ?? process.env;
  const fromEnv = env[RULES_ENV];

  if (typeof opts?.rules === 'string' && opts.rules !== '') {
    return { path: opts.rules, origin: 'flag' };
  }
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return { path: fromEnv, origin: 'env' };
  }
  return { path: BUNDLED_RULES_PATH, origin: 'bundled' };
}

/**
 * Colour level for terminal output.
 *
 * @param json - JSON output is never coloured
 */
export function resolveColorLevel(json: boolean): ColorSupportLevel {
  return json ? 0 : chalk.level;
}
