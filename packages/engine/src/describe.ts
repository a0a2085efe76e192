/**
 * kconfig-audit Engine — Check Description
 *
 * Text forms of checks for reports and generated fragments.
 */

import { formatVersion } from '@kconfig-audit/parsers';
import type { Check, Expectation, OptionCheck } from './types/check.js';

/**
 * Render an expectation in its rule-database text form.
 *
 * @example
 * expectationText({ mode: 'equals', value: 'y' })                   // 'y'
 * expectationText({ mode: 'numeric', op: '>=', threshold: 32 })      // '>= 32'
 */
export function expectationText(expect: Expectation): string {
  switch (expect.mode) {
    case 'equals':
      return expect.value;
    case 'not-off':
      return 'is not off';
    case 'off':
      return 'is not set';
    case 'present':
      return 'is present';
    case 'numeric':
      return `${expect.op} ${expect.threshold}`;
    default: {
      const _exhaustive: never = expect;
      return _exhaustive;
    }
  }
}

/**
 * The option a check is mainly about: the first option leaf in declaration
 * order, following the `after` branch of version gates.
 */
export function mainOption(check: Check): OptionCheck | undefined {
  switch (check.kind) {
    case 'option':
      return check;
    case 'version':
      return undefined;
    case 'and':
    case 'or':
      for (const child of check.children) {
        const found = mainOption(child);
        if (found !== undefined) return found;
      }
      return undefined;
    case 'version-gated':
      return mainOption(check.after);
    default: {
      const _exhaustive: never = check;
      return _exhaustive;
    }
  }
}

/** Name, type and desired value columns of a report row. */
export interface CheckSummary {
  readonly name: string;
  readonly type: string;
  readonly desired: string;
}

export function summarizeCheck(check: Check): CheckSummary {
  switch (check.kind) {
    case 'option':
      return { name: check.name, type: check.source, desired: expectationText(check.expect) };
    case 'version':
      return { name: 'kernel version', type: 'version', desired: formatVersion(check.minimum) };
    case 'version-gated':
      return summarizeCheck(check.after);
    case 'and':
    case 'or': {
      const main = mainOption(check);
      // A combinator of version checks only falls back to its first child.
      return summarizeCheck(main ?? check.children[0]);
    }
    default: {
      const _exhaustive: never = check;
      return _exhaustive;
    }
  }
}
