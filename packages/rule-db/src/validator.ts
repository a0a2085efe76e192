/**
 * kconfig-audit Rule Database — Validator
 *
 * Turns an untrusted JSON value into a typed RuleTable.
 *
 * Validation collects every problem it finds, each with the JSON path of
 * the offending value, instead of stopping at the first. A database that
 * yields any error is rejected as a whole.
 *
 * Check forms:
 *
 *   { "kconfig": "BUG", "expect": "y" }          CONFIG_ prefix is added
 *   { "cmdline": "nosmt", "expect": "is present" }
 *   { "sysctl": "kernel.kptr_restrict", "expect": "2" }
 *   { "and": [check, check, ...] }               at least two children
 *   { "or": [check, check, ...] }
 *   { "version": [5, 5] }                        only inside a combinator
 *   { "versionGate": [4, 18], "before": check, "after": check }
 */

import { isArch } from '@kconfig-audit/parsers';
import type { Arch, DataSourceKind, KernelVersion, ValidationError, ValidationResult } from '@kconfig-audit/parsers';
import {
  DECISIONS,
  REASONS,
  andCheck,
  optionCheck,
  orCheck,
  versionCheck,
  versionGatedCheck,
} from '@kconfig-audit/engine';
import type { Check, Decision, Expectation, Reason, RuleAnnotation } from '@kconfig-audit/engine';
import { RULE_DATABASE_VERSION } from './types.js';
import type { Rule, RuleTable } from './types.js';

// ---------------------------------------------------------------------------
// Expectation text
// ---------------------------------------------------------------------------

const NUMERIC_EXPECTATION = /^(>=|<=) (-?\d+)$/;

/**
 * Parse the text form of an expectation.
 *
 * @returns `null` for the empty string or a malformed comparison
 */
export function parseExpectation(text: string): Expectation | null {
  switch (text) {
    case 'is not set':
      return { mode: 'off' };
    case 'is not off':
      return { mode: 'not-off' };
    case 'is present':
      return { mode: 'present' };
    case '':
      return null;
  }
  const numeric = NUMERIC_EXPECTATION.exec(text);
  if (numeric !== null) {
    const [, op, digits = ''] = numeric;
    return { mode: 'numeric', op: op === '<=' ? '<=' : '>=', threshold: Number.parseInt(digits, 10) };
  }
  if (text.startsWith('>=') || text.startsWith('<=')) return null;
  return { mode: 'equals', value: text };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVersionPair(value: unknown): value is KernelVersion {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => typeof n === 'number' && Number.isInteger(n) && n >= 0)
  );
}

function isDecision(value: unknown): value is Decision {
  return DECISIONS.some((d) => d === value);
}

function isReason(value: unknown): value is Reason {
  return REASONS.some((r) => r === value);
}

/** Report every key of `obj` outside `allowed`. */
function checkKeys(
  obj: Readonly<Record<string, unknown>>,
  allowed: ReadonlyArray<string>,
  path: string,
  errors: ValidationError[],
): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      errors.push({ message: `unknown key "${key}"`, context: path });
    }
  }
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

const SOURCE_KEYS: ReadonlyArray<DataSourceKind> = ['kconfig', 'cmdline', 'sysctl'];
const FORM_KEYS = [...SOURCE_KEYS, 'and', 'or', 'version', 'versionGate'];

function validateOption(
  raw: Readonly<Record<string, unknown>>,
  source: DataSourceKind,
  path: string,
  errors: ValidationError[],
): Check | undefined {
  checkKeys(raw, [source, 'expect'], path, errors);
  const name = raw[source];
  const text = raw['expect'];

  if (typeof name !== 'string' || name === '') {
    errors.push({ message: `"${source}" must be a non-empty option name`, context: path });
    return undefined;
  }
  if (source === 'kconfig' && name.startsWith('CONFIG_')) {
    errors.push({ message: `write "${name.slice('CONFIG_'.length)}" without the CONFIG_ prefix`, context: path });
    return undefined;
  }
  if (typeof text !== 'string') {
    errors.push({ message: '"expect" must be a string', context: path });
    return undefined;
  }
  const expect = parseExpectation(text);
  if (expect === null) {
    errors.push({ message: `bad expectation "${text}"`, context: path });
    return undefined;
  }
  return optionCheck(source, source === 'kconfig' ? `CONFIG_${name}` : name, expect);
}

function validateCombinator(
  raw: Readonly<Record<string, unknown>>,
  kind: 'and' | 'or',
  path: string,
  errors: ValidationError[],
): Check | undefined {
  checkKeys(raw, [kind], path, errors);
  const list = raw[kind];
  if (!Array.isArray(list) || list.length < 2) {
    errors.push({ message: `"${kind}" must list at least two checks`, context: path });
    return undefined;
  }

  const children: Check[] = [];
  list.forEach((child: unknown, i) => {
    const check = validateCheck(child, `${path}.${kind}[${i}]`, errors, false);
    if (check !== undefined) children.push(check);
  });

  const [first, second, ...rest] = children;
  if (first === undefined || second === undefined || children.length !== list.length) return undefined;
  return kind === 'and' ? andCheck(first, second, ...rest) : orCheck(first, second, ...rest);
}

function validateGate(
  raw: Readonly<Record<string, unknown>>,
  path: string,
  errors: ValidationError[],
): Check | undefined {
  checkKeys(raw, ['versionGate', 'before', 'after'], path, errors);
  const threshold = raw['versionGate'];
  if (!isVersionPair(threshold)) {
    errors.push({ message: '"versionGate" must be a [major, minor] pair', context: path });
  }
  const before = validateCheck(raw['before'], `${path}.before`, errors, false);
  const after = validateCheck(raw['after'], `${path}.after`, errors, false);
  if (!isVersionPair(threshold) || before === undefined || after === undefined) return undefined;
  return versionGatedCheck([threshold[0], threshold[1]], before, after);
}

/**
 * Validate one check.
 *
 * @param topLevel - A bare version check is only meaningful inside a combinator
 */
function validateCheck(raw: unknown, path: string, errors: ValidationError[], topLevel: boolean): Check | undefined {
  if (!isRecord(raw)) {
    errors.push({ message: 'check must be an object', context: path });
    return undefined;
  }

  const form = FORM_KEYS.find((key) => key in raw);
  const source = SOURCE_KEYS.find((key) => key === form);
  if (source !== undefined) return validateOption(raw, source, path, errors);

  switch (form) {
    case 'and':
    case 'or':
      return validateCombinator(raw, form, path, errors);
    case 'versionGate':
      return validateGate(raw, path, errors);
    case 'version': {
      checkKeys(raw, ['version'], path, errors);
      if (topLevel) {
        errors.push({ message: 'a version check cannot be a rule by itself', context: path });
        return undefined;
      }
      const minimum = raw['version'];
      if (!isVersionPair(minimum)) {
        errors.push({ message: '"version" must be a [major, minor] pair', context: path });
        return undefined;
      }
      return versionCheck([minimum[0], minimum[1]]);
    }
    default:
      errors.push({ message: `unknown check form, expected one of: ${FORM_KEYS.join(', ')}`, context: path });
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

function validateArchs(raw: unknown, path: string, errors: ValidationError[]): ReadonlyArray<Arch> | undefined {
  if (!Array.isArray(raw) || raw.length === 0) {
    errors.push({ message: '"archs" must be a non-empty list', context: path });
    return undefined;
  }
  const archs: Arch[] = [];
  for (const token of raw) {
    if (typeof token === 'string' && isArch(token)) archs.push(token);
    else errors.push({ message: `unknown arch "${String(token)}"`, context: path });
  }
  return archs.length === raw.length ? archs : undefined;
}

function validateRule(raw: unknown, path: string, errors: ValidationError[]): Rule | undefined {
  if (!isRecord(raw)) {
    errors.push({ message: 'rule must be an object', context: path });
    return undefined;
  }
  checkKeys(raw, ['decision', 'reason', 'note', 'archs', 'check'], path, errors);
  const before = errors.length;

  const { decision, reason, note } = raw;
  if (!isDecision(decision)) {
    errors.push({ message: `unknown decision "${String(decision)}"`, context: `${path}.decision` });
  }
  if (!isReason(reason)) {
    errors.push({ message: `unknown reason "${String(reason)}"`, context: `${path}.reason` });
  }
  if (note !== undefined && typeof note !== 'string') {
    errors.push({ message: '"note" must be a string', context: `${path}.note` });
  }
  const archs = raw['archs'] === undefined ? undefined : validateArchs(raw['archs'], `${path}.archs`, errors);
  const check = validateCheck(raw['check'], `${path}.check`, errors, true);

  if (errors.length > before || !isDecision(decision) || !isReason(reason) || check === undefined) {
    return undefined;
  }
  const annotation: RuleAnnotation =
    typeof note === 'string' ? { decision, reason, note } : { decision, reason };
  return archs !== undefined ? { annotation, archs, check } : { annotation, check };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON value as a rule database.
 *
 * @returns The typed table, or every error found
 */
export function validateRuleDatabase(raw: unknown): ValidationResult<RuleTable> {
  const errors: ValidationError[] = [];
  if (!isRecord(raw)) {
    return { ok: false, errors: [{ message: 'rule database must be a JSON object' }] };
  }

  checkKeys(raw, ['version', ...SOURCE_KEYS], '$', errors);
  if (raw['version'] !== RULE_DATABASE_VERSION) {
    errors.push({ message: `unsupported version ${String(raw['version'])}, expected ${RULE_DATABASE_VERSION}`, context: '$.version' });
  }

  const groups: Record<DataSourceKind, Rule[]> = { kconfig: [], cmdline: [], sysctl: [] };
  for (const source of SOURCE_KEYS) {
    const list = raw[source];
    if (!Array.isArray(list)) {
      errors.push({ message: `"${source}" must be a list of rules`, context: `$.${source}` });
      continue;
    }
    list.forEach((item: unknown, i) => {
      const rule = validateRule(item, `$.${source}[${i}]`, errors);
      if (rule !== undefined) groups[source].push(rule);
    });
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: { version: RULE_DATABASE_VERSION, ...groups } };
}
