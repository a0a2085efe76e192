/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/kconfig-audit.ts   (process entry point)
 *   src/index.ts               (library surface)
 */

import { Command, CommanderError } from 'commander'
import { FatalInputError, SUPPORTED_ARCHS } from '@kconfig-audit/parsers'
import { CheckEvaluationError } from '@kconfig-audit/engine'
import { RuleDatabaseError } from '@kconfig-audit/rule-db'
import {
  ConsoleAuditLog,
  RULES_ENV,
  SilentAuditLog,
  resolveColorLevel,
} from '@kconfig-audit/runtime-host'
import { REPORT_MODES } from '../report/mode.js'
import { createTheme } from '../report/theme.js'
import { CliUsageError, resolveAction, type Action, type CliOptions } from './action.js'
import { runCheck } from './check.js'
import { runGenerate } from './generate.js'
import { runPrint } from './print.js'
import type { CommandContext } from './context.js'

export const VERSION = '0.1.0'

/** Where the program writes. Lines are passed without a trailing newline. */
export interface CliIO {
  readonly out: (line: string) => void
  readonly err: (line: string) => void
  readonly env?: NodeJS.ProcessEnv | undefined
}

export const processIO: CliIO = {
  out: (line) => { process.stdout.write(`${line}\n`) },
  err: (line) => { process.stderr.write(`${line}\n`) },
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/** JSON reports and generated fragments must be the only thing on stdout. */
const isQuiet = (action: Action): boolean => {
  switch (action.kind) {
    case 'check':
    case 'print':
      return action.mode === 'json'
    case 'generate':
      return true
    case 'help':
      return false
  }
}

function contextFor(action: Action, io: CliIO): CommandContext {
  const quiet = isQuiet(action)
  const level = resolveColorLevel(quiet)
  return {
    out: io.out,
    log: quiet ? new SilentAuditLog() : new ConsoleAuditLog(level, io.out),
    theme: createTheme(level),
    env: io.env,
  }
}

export function runAction(action: Action, io: CliIO, help: () => string): void {
  switch (action.kind) {
    case 'check':
      runCheck(action, contextFor(action, io))
      return
    case 'print':
      runPrint(action, contextFor(action, io))
      return
    case 'generate':
      runGenerate(action, contextFor(action, io))
      return
    case 'help':
      io.out(help())
      return
    default: {
      const _exhaustive: never = action
      return _exhaustive
    }
  }
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command()
  const archs = SUPPORTED_ARCHS.join(', ')

  program
    .name('kconfig-audit')
    .description(
      'Checks Linux kernel configuration, boot command line and sysctl settings\n' +
      'against security hardening recommendations. Nothing is modified.',
    )
    .version(VERSION)
    .option('-c, --config <file>', 'check the hardening options in a Kconfig file (also *.gz)')
    .option('-l, --cmdline <file>', 'also check a kernel command line file (contents of /proc/cmdline)')
    .option('-s, --sysctl <file>', 'also check a sysctl output file (sysctl -a)')
    .option('-p, --print <arch>', `print the recommendations for an arch (${archs})`)
    .option('-g, --generate <arch>', `generate a Kconfig fragment with the recommended values (${archs})`)
    .option('-m, --mode <mode>', `report mode (${REPORT_MODES.join(', ')})`)
    .option('-r, --rules <file>', `rule database to use instead of the bundled one (env: ${RULES_ENV})`)
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .exitOverride()
    .action((options: CliOptions) => {
      runAction(resolveAction(options), io, () => program.helpInformation().trimEnd())
    })

  return program
}

const isReportable = (err: unknown): err is Error =>
  err instanceof FatalInputError ||
  err instanceof CheckEvaluationError ||
  err instanceof RuleDatabaseError ||
  err instanceof CliUsageError

/**
 * Parse `argv` (node-style: executable and script first) and run it.
 * Returns the exit code. Errors other than the reportable ones propagate.
 */
export function run(argv: readonly string[], io: CliIO = processIO): number {
  try {
    createProgram(io).parse(argv)
    return 0
  } catch (err) {
    // commander has already written its own message
    if (err instanceof CommanderError) return err.exitCode
    if (isReportable(err)) {
      io.err(`[!] ERROR: ${err.message}`)
      return 1
    }
    throw err
  }
}
