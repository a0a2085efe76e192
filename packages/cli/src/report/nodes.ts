/**
 * Report nodes — one shape for both printed recommendations and check results.
 *
 * A recommendation that was never evaluated (print mode) is a `skipped`
 * node. Skipped composites expose their declared children as skipped
 * nodes too.
 */

import { formatVersion } from '@kconfig-audit/parsers'
import type {
  Check,
  Checklist,
  EvaluatedEntry,
  EvaluatedNode,
  EvaluationResult,
  RuleAnnotation,
} from '@kconfig-audit/engine'

export interface ReportEntry {
  readonly annotation: RuleAnnotation
  readonly node: EvaluatedNode
}

export const fromChecklist = (checklist: Checklist): ReportEntry[] =>
  checklist.map((entry) => ({ annotation: entry.annotation, node: { kind: 'skipped', check: entry.check } }))

export const fromEvaluated = (entries: ReadonlyArray<EvaluatedEntry>): ReportEntry[] =>
  entries.map((entry) => ({ annotation: entry.annotation, node: entry.evaluated }))

export function resultOf(node: EvaluatedNode): EvaluationResult | undefined {
  return node.kind === 'skipped' ? undefined : node.result
}

function declaredChildren(check: Check): ReadonlyArray<EvaluatedNode> | undefined {
  switch (check.kind) {
    case 'option':
    case 'version':
      return undefined
    case 'and':
    case 'or':
      return check.children.map((child): EvaluatedNode => ({ kind: 'skipped', check: child }))
    case 'version-gated':
      return [
        { kind: 'skipped', check: check.before },
        { kind: 'skipped', check: check.after },
      ]
    default: {
      const _exhaustive: never = check
      return _exhaustive
    }
  }
}

/**
 * Children to show under a composite, or `undefined` for a leaf.
 * An evaluated gate shows only its selected branch; an unevaluated one shows both.
 */
export function childrenOf(node: EvaluatedNode): ReadonlyArray<EvaluatedNode> | undefined {
  switch (node.kind) {
    case 'option':
    case 'version':
      return undefined
    case 'and':
    case 'or':
      return node.children
    case 'version-gated':
      return node.branch !== undefined ? [node.branch.node] : []
    case 'skipped':
      return declaredChildren(node.check)
    default: {
      const _exhaustive: never = node
      return _exhaustive
    }
  }
}

/** `<<< AND >>>`, `<<< OR >>>` or `<<< VERSION GATE >= 4.18 >>>`. */
export function markerOf(node: EvaluatedNode): string {
  const check = node.check
  switch (check.kind) {
    case 'and':
      return '<<< AND >>>'
    case 'or':
      return '<<< OR >>>'
    case 'version-gated':
      return `<<< VERSION GATE >= ${formatVersion(check.threshold)} >>>`
    default:
      return ''
  }
}
