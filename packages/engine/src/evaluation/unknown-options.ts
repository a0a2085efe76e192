/**
 * kconfig-audit Engine — Unknown Options
 *
 * Lists parsed options that no rule looks at. Informational only: an option
 * without a recommendation is not a finding.
 */

import type { DataSourceKind } from '@kconfig-audit/parsers';
import type { Check, Checklist } from '../types/check.js';
import type { SourceData } from '../population/populate.js';

export interface UnknownOption {
  readonly source: DataSourceKind;
  readonly name: string;
  readonly value: string | null;
}

function collectReferences(check: Check, into: Set<string>): void {
  switch (check.kind) {
    case 'option':
      into.add(`${check.source}:${check.name}`);
      return;
    case 'version':
      return;
    case 'and':
    case 'or':
      for (const child of check.children) collectReferences(child, into);
      return;
    case 'version-gated':
      // Both branches count: the option is known even if this kernel uses the other name.
      collectReferences(check.before, into);
      collectReferences(check.after, into);
      return;
    default: {
      const _exhaustive: never = check;
      return _exhaustive;
    }
  }
}

/**
 * Collect, per source and in file order, the options referenced by no
 * option leaf of the checklist.
 */
export function collectUnknownOptions(checklist: Checklist, data: SourceData): ReadonlyArray<UnknownOption> {
  const referenced = new Set<string>();
  for (const entry of checklist) collectReferences(entry.check, referenced);

  const unknown: UnknownOption[] = [];
  for (const source of ['kconfig', 'cmdline', 'sysctl'] as const) {
    const options = data[source];
    if (options === undefined) continue;
    for (const [name, value] of options) {
      if (!referenced.has(`${source}:${name}`)) unknown.push({ source, name, value });
    }
  }
  return unknown;
}
