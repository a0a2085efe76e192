import { summarizeCheck, Verdict } from '@kconfig-audit/engine'
import type { EvaluatedNode, RuleAnnotation } from '@kconfig-audit/engine'
import { childrenOf, resultOf, type ReportEntry } from './nodes.js'

export interface JsonReportNode {
  readonly name: string
  readonly type: string
  readonly desired_val: string
  readonly decision: string
  readonly reason: string
  /** Top-level entries only. */
  readonly note?: string
  readonly check_result?: string
  readonly check_result_bool?: boolean
  readonly children?: JsonReportNode[]
}

export function toJsonNode(node: EvaluatedNode, annotation: RuleAnnotation): JsonReportNode {
  const summary = summarizeCheck(node.check)
  const result = resultOf(node)
  const children = childrenOf(node)
  return {
    name: summary.name,
    type: summary.type,
    desired_val: summary.desired,
    decision: annotation.decision,
    reason: annotation.reason,
    ...(result !== undefined
      ? { check_result: `${result.verdict}: ${result.reason}`, check_result_bool: result.verdict === Verdict.Ok }
      : {}),
    ...(children !== undefined ? { children: children.map((child) => toJsonNode(child, annotation)) } : {}),
  }
}

function entryNode(entry: ReportEntry): JsonReportNode {
  const node = toJsonNode(entry.node, entry.annotation)
  return entry.annotation.note !== undefined ? { ...node, note: entry.annotation.note } : node
}

/** The whole report as one JSON array on one line. */
export const renderJson = (entries: ReadonlyArray<ReportEntry>): string =>
  JSON.stringify(entries.map(entryNode))
