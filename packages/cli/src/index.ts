/**
 * @kconfig-audit/cli
 *
 * The `kconfig-audit` program and its report renderers.
 *
 * Usage:
 *   kconfig-audit --help
 *   kconfig-audit -c <kconfig> [-l <cmdline>] [-s <sysctl>] [-m verbose|json|show_ok|show_fail]
 *   kconfig-audit -p <arch> [-m verbose|json]
 *   kconfig-audit -g <arch>
 */

// Program
export type { CliIO } from './commands/index.js'
export { VERSION, createProgram, run, runAction, processIO } from './commands/index.js'
export type { Action, CheckAction, PrintAction, GenerateAction, CliOptions } from './commands/action.js'
export { CliUsageError, resolveAction } from './commands/action.js'
export type { CommandContext } from './commands/context.js'
export { runCheck } from './commands/check.js'
export { runPrint } from './commands/print.js'
export { runGenerate } from './commands/generate.js'

// Reports
export type { ReportMode } from './report/mode.js'
export { REPORT_MODES, isReportMode } from './report/mode.js'
export type { ReportEntry } from './report/nodes.js'
export { fromChecklist, fromEvaluated } from './report/nodes.js'
export type { TableOptions, VerdictCounts } from './report/table.js'
export { renderTable, countVerdicts, footerLine, headerLine, center } from './report/table.js'
export type { JsonReportNode } from './report/json.js'
export { renderJson } from './report/json.js'
export { renderFragment } from './report/fragment.js'
export type { Theme } from './report/theme.js'
export { createTheme, plainTheme, verdictColor } from './report/theme.js'
