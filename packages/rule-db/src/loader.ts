/**
 * kconfig-audit Rule Database — Loader
 *
 * Reads a rule database JSON file and validates it. The bundled database
 * ships next to this package's sources under data/.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { ValidationError } from '@kconfig-audit/parsers';
import { validateRuleDatabase } from './validator.js';
import { RuleDatabaseError } from './types.js';
import type { RuleTable } from './types.js';

/** Absolute path of the bundled hardening recommendations. */
export const BUNDLED_RULES_PATH = fileURLToPath(new URL('../data/hardening-rules.json', import.meta.url));

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Parse and validate rule database text.
 *
 * @param source - Name used in error messages
 * @throws {RuleDatabaseError} On malformed JSON or any validation error
 */
export function parseRuleTable(text: string, source: string): RuleTable {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const error: ValidationError = { message: err instanceof Error ? err.message : String(err) };
    throw new RuleDatabaseError(source, [error]);
  }

  const result = validateRuleDatabase(raw);
  if (!result.ok) throw new RuleDatabaseError(source, result.errors);
  return result.value;
}

/**
 * Load a rule database from disk.
 *
 * @param path - Defaults to the bundled database
 * @throws {RuleDatabaseError} When the file is missing, unreadable or invalid
 */
export function loadRuleTable(path: string = BUNDLED_RULES_PATH): RuleTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new RuleDatabaseError(path, [{ message: 'file not found' }]);
    }
    throw err;
  }
  return parseRuleTable(text, path);
}
