/**
 * kconfig-audit Rule Database — Checklist Builder
 */

import type { Arch } from '@kconfig-audit/parsers';
import type { Checklist, ChecklistEntry } from '@kconfig-audit/engine';
import type { Rule, RuleTable } from './types.js';

/** Which optional rule groups to include. The kconfig group is always included. */
export interface ChecklistSources {
  readonly cmdline: boolean;
  readonly sysctl: boolean;
}

function forArch(rules: ReadonlyArray<Rule>, arch: Arch): ChecklistEntry[] {
  return rules
    .filter((rule) => rule.archs === undefined || rule.archs.includes(arch))
    .map((rule) => ({ annotation: rule.annotation, check: rule.check }));
}

/**
 * Build the checklist for one architecture, in database order:
 * kconfig rules, then cmdline rules, then sysctl rules.
 */
export function buildChecklist(table: RuleTable, arch: Arch, sources: ChecklistSources): Checklist {
  return [
    ...forArch(table.kconfig, arch),
    ...(sources.cmdline ? forArch(table.cmdline, arch) : []),
    ...(sources.sysctl ? forArch(table.sysctl, arch) : []),
  ];
}
