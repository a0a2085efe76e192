/**
 * kconfig-audit CLI — Table Report
 *
 * Renders entries as fixed-width rows:
 *
 *   option name | type | desired val | decision | reason [| check result]
 *
 * Returns lines; the caller writes them.
 */

import { summarizeCheck, Verdict } from '@kconfig-audit/engine'
import type { CheckSummary, EvaluatedNode, EvaluationResult, RuleAnnotation } from '@kconfig-audit/engine'
import type { ReportMode } from './mode.js'
import { childrenOf, markerOf, resultOf, type ReportEntry } from './nodes.js'
import { plainTheme, verdictColor, type Theme } from './theme.js'

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

const NAME_WIDTH = 40
const TYPE_WIDTH = 7
const DESIRED_WIDTH = 12
const DECISION_WIDTH = 10
const REASON_WIDTH = 18

export const TABLE_WIDTH = NAME_WIDTH + TYPE_WIDTH + DESIRED_WIDTH + DECISION_WIDTH + REASON_WIDTH + 4
export const RESULT_WIDTH = 30

/** Centre `text` in `width` columns; an odd remainder goes to the right. */
export function center(text: string, width: number): string {
  if (text.length >= width) return text
  const left = Math.floor((width - text.length) / 2)
  return ' '.repeat(left) + text + ' '.repeat(width - text.length - left)
}

const indent = (depth: number): string => '  '.repeat(depth)

export function headerLine(withResults: boolean): string {
  const base = [
    center('option name', NAME_WIDTH),
    center('type', TYPE_WIDTH),
    center('desired val', DESIRED_WIDTH),
    center('decision', DECISION_WIDTH),
    center('reason', REASON_WIDTH),
  ].join('|')
  return withResults ? `${base}| check result` : base
}

const resultCell = (result: EvaluationResult | undefined, theme: Theme): string =>
  result === undefined
    ? ''
    : `| ${verdictColor(theme, result.verdict)(`${result.verdict}: ${result.reason}`)}`

function row(summary: CheckSummary, annotation: RuleAnnotation, result: EvaluationResult | undefined, theme: Theme): string {
  return [
    summary.name.padEnd(NAME_WIDTH),
    center(summary.type, TYPE_WIDTH),
    center(summary.desired, DESIRED_WIDTH),
    center(annotation.decision, DECISION_WIDTH),
    center(annotation.reason, REASON_WIDTH),
  ].join('|') + resultCell(result, theme)
}

function verboseRows(node: EvaluatedNode, annotation: RuleAnnotation, depth: number, theme: Theme): string[] {
  const children = childrenOf(node)
  if (children === undefined) {
    const summary = summarizeCheck(node.check)
    return [row({ ...summary, name: indent(depth) + summary.name }, annotation, resultOf(node), theme)]
  }
  const head = `${indent(depth)}    ${markerOf(node)}`.padEnd(TABLE_WIDTH) + resultCell(resultOf(node), theme)
  return [head, ...children.flatMap((child) => verboseRows(child, annotation, depth + 1, theme))]
}

// ---------------------------------------------------------------------------
// Footer
// ---------------------------------------------------------------------------

export interface VerdictCounts {
  readonly ok: number
  readonly fail: number
  readonly unknown: number
}

export function countVerdicts(entries: ReadonlyArray<ReportEntry>): VerdictCounts {
  let ok = 0
  let fail = 0
  let unknown = 0
  for (const entry of entries) {
    switch (resultOf(entry.node)?.verdict) {
      case Verdict.Ok:      ok++; break
      case Verdict.Fail:    fail++; break
      case Verdict.Unknown: unknown++; break
      case undefined:       break
    }
  }
  return { ok, fail, unknown }
}

const isShown = (verdict: Verdict, mode: ReportMode | undefined): boolean => {
  if (mode === 'show_ok') return verdict === Verdict.Ok
  if (mode === 'show_fail') return verdict === Verdict.Fail
  return true
}

export function footerLine(counts: VerdictCounts, mode: ReportMode | undefined): string {
  const part = (verdict: Verdict, n: number): string =>
    `'${verdict}' - ${n}${isShown(verdict, mode) ? '' : ' (suppressed in output)'}`
  return `[+] Config check is finished: ${[
    part(Verdict.Ok, counts.ok),
    part(Verdict.Fail, counts.fail),
    part(Verdict.Unknown, counts.unknown),
  ].join(' / ')}`
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export interface TableOptions {
  readonly mode?: ReportMode | undefined
  /** Add the result column and the footer. False when printing recommendations. */
  readonly withResults: boolean
  readonly theme?: Theme | undefined
}

export function renderTable(entries: ReadonlyArray<ReportEntry>, opts: TableOptions): string[] {
  const theme = opts.theme ?? plainTheme
  const width = opts.withResults ? TABLE_WIDTH + RESULT_WIDTH : TABLE_WIDTH
  const lines = ['='.repeat(width), headerLine(opts.withResults), '='.repeat(width)]

  for (const entry of entries) {
    const result = opts.withResults ? resultOf(entry.node) : undefined
    if (result !== undefined && !isShown(result.verdict, opts.mode)) continue

    if (opts.mode === 'verbose') {
      lines.push(...verboseRows(entry.node, entry.annotation, 0, theme))
      if (entry.annotation.note !== undefined) lines.push(`    note: ${entry.annotation.note}`)
      lines.push('-'.repeat(width))
    } else {
      lines.push(row(summarizeCheck(entry.node.check), entry.annotation, result, theme))
    }
  }

  lines.push('')
  if (opts.withResults) lines.push(footerLine(countVerdicts(entries), opts.mode))
  return lines
}
