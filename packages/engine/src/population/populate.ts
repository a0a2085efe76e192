/**
 * kconfig-audit Engine — Population
 *
 * Binds parsed data to the checks of a checklist. Option leaves receive
 * what their data source holds for their name; version leaves and
 * version-gated nodes receive the detected kernel version.
 *
 * Population never mutates. It returns a new checklist in which every
 * subtree it did not touch keeps its object identity.
 */

import type { DataSourceKind, KernelVersion, ParsedOptions } from '@kconfig-audit/parsers';
import type {
  Check,
  CheckChildren,
  Checklist,
  ChecklistEntry,
  LeafCheck,
  Observation,
  VersionGatedCheck,
} from '../types/check.js';

/** Parsed data keyed by source. A missing key means the source was not supplied. */
export type SourceData = Readonly<Partial<Record<DataSourceKind, ParsedOptions>>>;

// ---------------------------------------------------------------------------
// Tree rewriting
// ---------------------------------------------------------------------------

export interface CheckRewriter {
  readonly leaf: (leaf: LeafCheck) => LeafCheck;
  /** Applied to a gate after its branches have been rewritten. */
  readonly gate?: ((gate: VersionGatedCheck) => VersionGatedCheck) | undefined;
}

/**
 * Rebuild a check tree bottom-up. A node whose children all come back
 * identical is returned as is.
 */
export function rewriteCheck(check: Check, rewriter: CheckRewriter): Check {
  switch (check.kind) {
    case 'option':
    case 'version':
      return rewriter.leaf(check);

    case 'and':
    case 'or': {
      const [first, second, ...rest] = check.children;
      const children: CheckChildren = [
        rewriteCheck(first, rewriter),
        rewriteCheck(second, rewriter),
        ...rest.map((child) => rewriteCheck(child, rewriter)),
      ];
      const unchanged = children.every((child, i) => child === check.children[i]);
      return unchanged ? check : { ...check, children };
    }

    case 'version-gated': {
      const before = rewriteCheck(check.before, rewriter);
      const after = rewriteCheck(check.after, rewriter);
      const gate = before === check.before && after === check.after ? check : { ...check, before, after };
      return rewriter.gate !== undefined ? rewriter.gate(gate) : gate;
    }

    default: {
      const _exhaustive: never = check;
      return _exhaustive;
    }
  }
}

/** Rewrite every entry's check, keeping entries whose check did not change. */
export function rewriteChecklist(checklist: Checklist, rewriter: CheckRewriter): Checklist {
  return checklist.map((entry): ChecklistEntry => {
    const check = rewriteCheck(entry.check, rewriter);
    return check === entry.check ? entry : { ...entry, check };
  });
}

// ---------------------------------------------------------------------------
// Population
// ---------------------------------------------------------------------------

function observe(options: ParsedOptions, name: string): Observation {
  return options.has(name) ? { present: true, value: options.get(name) ?? null } : { present: false };
}

/**
 * Attach observations from one data source to the option leaves bound to it.
 */
export function populateWithData(checklist: Checklist, data: ParsedOptions, kind: DataSourceKind): Checklist {
  return rewriteChecklist(checklist, {
    leaf: (leaf) =>
      leaf.kind === 'option' && leaf.source === kind ? { ...leaf, observed: observe(data, leaf.name) } : leaf,
  });
}

/**
 * Attach the kernel version to every version leaf and version-gated node,
 * including those nested in either branch of a gate.
 */
export function populateWithVersion(checklist: Checklist, version: KernelVersion): Checklist {
  return rewriteChecklist(checklist, {
    leaf: (leaf) => (leaf.kind === 'version' ? { ...leaf, detected: version } : leaf),
    gate: (gate) => ({ ...gate, detected: version }),
  });
}

/** Populate every supplied source, then the version if one was detected. */
export function populate(checklist: Checklist, data: SourceData, version?: KernelVersion): Checklist {
  let populated = checklist;
  for (const kind of ['kconfig', 'cmdline', 'sysctl'] as const) {
    const options = data[kind];
    if (options !== undefined) populated = populateWithData(populated, options, kind);
  }
  return version !== undefined ? populateWithVersion(populated, version) : populated;
}
