/**
 * kconfig-audit Engine — Evaluation
 *
 * Computes an OK / FAIL / UNKNOWN verdict with a reason for every check of
 * a populated checklist.
 *
 * Composition:
 * - AND: the first FAIL decides (later children are skipped); otherwise the
 *   first UNKNOWN; otherwise OK with the first child's reason.
 * - OR: the first OK decides (later children are skipped); otherwise the
 *   first UNKNOWN; otherwise FAIL with every child's reason.
 * - Version-gated: exactly one branch is evaluated, selected by the detected
 *   kernel version.
 *
 * This module is side-effect free. Every entry is evaluated; a FAIL is a
 * verdict, never an exception.
 */

import { compareVersions, formatVersion, parseInteger } from '@kconfig-audit/parsers';
import type {
  AndCheck,
  Check,
  Checklist,
  Expectation,
  OptionCheck,
  OrCheck,
  VersionCheck,
  VersionGatedCheck,
} from '../types/check.js';
import { CheckEvaluationError, Verdict } from '../types/result.js';
import type {
  EvaluatedCheck,
  EvaluatedCombinator,
  EvaluatedEntry,
  EvaluatedGate,
  EvaluatedNode,
  EvaluatedOption,
  EvaluatedVersion,
  EvaluationResult,
} from '../types/result.js';

const VERSION_NOT_DETECTED = 'kernel version is not detected';

/** Raw values that mean "off" for a `not-off` expectation. */
const OFF_VALUES: ReadonlySet<string> = new Set(['0', 'off']);

/** Strip one pair of surrounding double quotes. */
export function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

function numericOperand(name: string, text: string): number {
  const n = parseInteger(text);
  if (n === null) {
    throw new CheckEvaluationError(`cannot compare ${name}: "${text}" is not an integer`);
  }
  return n;
}

function compareOption(name: string, value: string | null, expect: Expectation): EvaluationResult {
  const ok = (reason: string): EvaluationResult => ({ verdict: Verdict.Ok, reason, foundValue: value });
  const fail = (reason: string): EvaluationResult => ({ verdict: Verdict.Fail, reason, foundValue: value });

  switch (expect.mode) {
    case 'equals': {
      const wanted = unquote(expect.value);
      if (value === null) return fail(`${name} is not set, expected "${wanted}"`);
      const actual = unquote(value);
      return actual === wanted ? ok(`${name} is "${actual}"`) : fail(`${name} is "${actual}", expected "${wanted}"`);
    }

    case 'not-off': {
      if (value === null) return fail(`${name} is off (not set)`);
      const actual = unquote(value);
      return OFF_VALUES.has(actual) ? fail(`${name} is off ("${actual}")`) : ok(`${name} is not off ("${actual}")`);
    }

    case 'off':
      return value === null ? ok(`${name} is not set`) : fail(`${name} is "${unquote(value)}", expected to be off`);

    case 'present':
      return ok(`${name} is present`);

    case 'numeric': {
      if (!Number.isInteger(expect.threshold)) {
        throw new CheckEvaluationError(`cannot compare ${name}: threshold ${expect.threshold} is not an integer`);
      }
      const expected = `expected ${expect.op} ${expect.threshold}`;
      if (value === null) return fail(`${name} is not set, ${expected}`);
      const actual = numericOperand(name, unquote(value));
      const passes = expect.op === '>=' ? actual >= expect.threshold : actual <= expect.threshold;
      return passes ? ok(`${name} is ${actual}, ${expected}`) : fail(`${name} is ${actual}, ${expected}`);
    }

    default: {
      const _exhaustive: never = expect;
      return _exhaustive;
    }
  }
}

function evaluateOption(check: OptionCheck): EvaluatedOption {
  const observed = check.observed;
  let result: EvaluationResult;

  if (observed === undefined || !observed.present) {
    const { name } = check;
    switch (check.expect.mode) {
      case 'off':
        result = { verdict: Verdict.Ok, reason: `${name} is not found`, foundValue: null };
        break;
      case 'present':
        result = { verdict: Verdict.Fail, reason: `${name} is not present`, foundValue: null };
        break;
      default:
        result = { verdict: Verdict.Unknown, reason: `${name} is not found`, foundValue: null };
    }
  } else {
    result = compareOption(check.name, observed.value, check.expect);
  }

  return { kind: 'option', check, result };
}

function evaluateVersion(check: VersionCheck): EvaluatedVersion {
  const { detected, minimum } = check;
  if (detected === undefined) {
    return { kind: 'version', check, result: { verdict: Verdict.Unknown, reason: VERSION_NOT_DETECTED, foundValue: null } };
  }
  const found = formatVersion(detected);
  const result: EvaluationResult =
    compareVersions(detected, minimum) >= 0
      ? { verdict: Verdict.Ok, reason: `kernel version ${found} >= ${formatVersion(minimum)}`, foundValue: found }
      : { verdict: Verdict.Fail, reason: `kernel version ${found} < ${formatVersion(minimum)}`, foundValue: found };
  return { kind: 'version', check, result };
}

// ---------------------------------------------------------------------------
// Composites
// ---------------------------------------------------------------------------

function evaluateCombinator(check: AndCheck | OrCheck): EvaluatedCombinator {
  // AND stops at the first FAIL, OR at the first OK.
  const decisive = check.kind === 'and' ? Verdict.Fail : Verdict.Ok;
  const children: EvaluatedNode[] = [];
  const evaluated: EvaluatedCheck[] = [];
  let decided: EvaluationResult | undefined;

  for (const child of check.children) {
    if (decided !== undefined) {
      children.push({ kind: 'skipped', check: child });
      continue;
    }
    const node = evaluateCheck(child);
    children.push(node);
    evaluated.push(node);
    if (node.result.verdict === decisive) decided = node.result;
  }

  const unknown = evaluated.find((node) => node.result.verdict === Verdict.Unknown);
  const [head] = evaluated;
  let result: EvaluationResult;

  if (decided !== undefined) {
    result = decided;
  } else if (unknown !== undefined) {
    result = unknown.result;
  } else if (head === undefined) {
    throw new CheckEvaluationError(`${check.kind} check has no children`);
  } else if (check.kind === 'and') {
    // Every child is OK.
    result = head.result;
  } else {
    // Every child FAILed.
    result = {
      verdict: Verdict.Fail,
      reason: evaluated.map((node) => node.result.reason).join('; '),
      foundValue: head.result.foundValue,
    };
  }

  return { kind: check.kind, check, result, children };
}

function evaluateGate(check: VersionGatedCheck): EvaluatedGate {
  const { detected } = check;
  if (detected === undefined) {
    return {
      kind: 'version-gated',
      check,
      result: { verdict: Verdict.Unknown, reason: VERSION_NOT_DETECTED, foundValue: null },
    };
  }
  const side = compareVersions(detected, check.threshold) < 0 ? 'before' : 'after';
  const node = evaluateCheck(side === 'before' ? check.before : check.after);
  return { kind: 'version-gated', check, result: node.result, branch: { side, node } };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Evaluate one populated check tree.
 *
 * @throws {CheckEvaluationError} On a numeric comparison with a non-integer operand
 */
export function evaluateCheck(check: Check): EvaluatedCheck {
  switch (check.kind) {
    case 'option':
      return evaluateOption(check);
    case 'version':
      return evaluateVersion(check);
    case 'and':
    case 'or':
      return evaluateCombinator(check);
    case 'version-gated':
      return evaluateGate(check);
    default: {
      const _exhaustive: never = check;
      return _exhaustive;
    }
  }
}

/** Evaluate every entry of a checklist, in order. */
export function evaluateChecklist(checklist: Checklist): ReadonlyArray<EvaluatedEntry> {
  return checklist.map((entry) => ({ annotation: entry.annotation, evaluated: evaluateCheck(entry.check) }));
}
