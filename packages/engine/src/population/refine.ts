/**
 * kconfig-audit Engine — Refinement Hooks
 *
 * Some recommendations depend on another value of the same configuration:
 * the best ASLR entropy for mmap is whatever CONFIG_ARCH_MMAP_RND_BITS_MAX
 * allows on this build. A refinement hook reads the parsed data and rewrites
 * the expectation of the option leaves it targets.
 *
 * Hooks run once each, after population and before evaluation.
 */

import { parseInteger } from '@kconfig-audit/parsers';
import type { DataSourceKind, ParsedOptions } from '@kconfig-audit/parsers';
import type { Checklist, OptionCheck } from '../types/check.js';
import { CheckEvaluationError } from '../types/result.js';
import { unquote } from '../evaluation/evaluate.js';
import { rewriteChecklist } from './populate.js';
import type { SourceData } from './populate.js';

export interface RefinementHook {
  /** Stable identifier, shown in errors. */
  readonly name: string;
  readonly source: DataSourceKind;
  /** Option name of the leaves to rewrite. */
  readonly target: string;
  /**
   * Compute the replacement: a number for a `numeric` expectation's
   * threshold, a string for an `equals` expectation's value.
   * `null` leaves the checklist unchanged.
   */
  readonly refine: (options: ParsedOptions) => number | string | null;
}

// ---------------------------------------------------------------------------
// Bundled hooks
// ---------------------------------------------------------------------------

export const ARCH_MMAP_RND_BITS_MAX: RefinementHook = {
  name: 'arch-mmap-rnd-bits-max',
  source: 'kconfig',
  target: 'CONFIG_ARCH_MMAP_RND_BITS',
  refine: (options) => {
    const raw = options.get('CONFIG_ARCH_MMAP_RND_BITS_MAX');
    if (raw === undefined || raw === null) return null;
    const bits = parseInteger(unquote(raw));
    if (bits === null) {
      throw new CheckEvaluationError(
        `cannot refine CONFIG_ARCH_MMAP_RND_BITS: CONFIG_ARCH_MMAP_RND_BITS_MAX is "${raw}", not an integer`,
      );
    }
    return bits;
  },
};

export const DEFAULT_REFINEMENTS: ReadonlyArray<RefinementHook> = [ARCH_MMAP_RND_BITS_MAX];

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

function retarget(leaf: OptionCheck, replacement: number | string, hook: RefinementHook): OptionCheck {
  const { expect } = leaf;
  if (expect.mode === 'numeric' && typeof replacement === 'number') {
    return { ...leaf, expect: { ...expect, threshold: replacement } };
  }
  if (expect.mode === 'equals' && typeof replacement === 'string') {
    return { ...leaf, expect: { ...expect, value: replacement } };
  }
  throw new CheckEvaluationError(
    `refinement "${hook.name}" cannot set ${typeof replacement} ${String(replacement)} on ${leaf.name} (${expect.mode})`,
  );
}

/**
 * Apply each hook to the checklist in order.
 *
 * A hook whose source was not supplied, or that returns `null`, changes
 * nothing. Only option leaves matching the hook's source and target are
 * rebuilt.
 *
 * @throws {CheckEvaluationError} When a replacement does not fit the target's expectation
 */
export function applyRefinements(
  checklist: Checklist,
  hooks: ReadonlyArray<RefinementHook>,
  data: SourceData,
): Checklist {
  let refined = checklist;
  for (const hook of hooks) {
    const options = data[hook.source];
    if (options === undefined) continue;
    const replacement = hook.refine(options);
    if (replacement === null) continue;

    refined = rewriteChecklist(refined, {
      leaf: (leaf) =>
        leaf.kind === 'option' && leaf.source === hook.source && leaf.name === hook.target
          ? retarget(leaf, replacement, hook)
          : leaf,
    });
  }
  return refined;
}
