/**
 * commands/action.ts — Turns parsed flags into exactly one thing to do.
 *
 * Pure: no I/O, no process access. Every invalid flag combination is a
 * CliUsageError, raised before any file is opened.
 */

import { SUPPORTED_ARCHS, isArch, type Arch } from '@kconfig-audit/parsers';
import { REPORT_MODES, isReportMode, type ReportMode } from '../report/mode.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Flag values as commander hands them over. */
export interface CliOptions {
  readonly config?: string | undefined;
  readonly cmdline?: string | undefined;
  readonly sysctl?: string | undefined;
  readonly print?: string | undefined;
  readonly generate?: string | undefined;
  readonly mode?: string | undefined;
  readonly rules?: string | undefined;
}

export interface CheckAction {
  readonly kind: 'check';
  readonly config: string;
  readonly cmdline?: string | undefined;
  readonly sysctl?: string | undefined;
  readonly mode?: ReportMode | undefined;
  readonly rules?: string | undefined;
}

export interface PrintAction {
  readonly kind: 'print';
  readonly arch: Arch;
  readonly mode?: 'verbose' | 'json' | undefined;
  readonly rules?: string | undefined;
}

export interface GenerateAction {
  readonly kind: 'generate';
  readonly arch: Arch;
  readonly rules?: string | undefined;
}

export type Action = CheckAction | PrintAction | GenerateAction | { readonly kind: 'help' };

function parseArch(flag: string, value: string): Arch {
  if (isArch(value)) return value;
  throw new CliUsageError(
    `unsupported microarchitecture "${value}" for ${flag}, expected one of: ${SUPPORTED_ARCHS.join(', ')}`,
  );
}

function parseMode(value: string | undefined): ReportMode | undefined {
  if (value === undefined || isReportMode(value)) return value;
  throw new CliUsageError(`invalid mode "${value}", expected one of: ${REPORT_MODES.join(', ')}`);
}

export function resolveAction(options: CliOptions): Action {
  const mode = parseMode(options.mode);

  if (options.config !== undefined) {
    if (options.print !== undefined) throw new CliUsageError("--config and --print can't be used together");
    if (options.generate !== undefined) throw new CliUsageError("--config and --generate can't be used together");
    return {
      kind: 'check',
      config: options.config,
      cmdline: options.cmdline,
      sysctl: options.sysctl,
      mode,
      rules: options.rules,
    };
  }

  if (options.cmdline !== undefined) throw new CliUsageError('checking cmdline depends on checking Kconfig');
  if (options.sysctl !== undefined) throw new CliUsageError('checking sysctl depends on checking Kconfig');

  if (options.print !== undefined && options.generate !== undefined) {
    throw new CliUsageError("--print and --generate can't be used together");
  }

  if (options.print !== undefined) {
    const arch = parseArch('--print', options.print);
    if (mode !== undefined && mode !== 'verbose' && mode !== 'json') {
      throw new CliUsageError(`wrong mode "${mode}" for --print`);
    }
    return { kind: 'print', arch, mode, rules: options.rules };
  }

  if (options.generate !== undefined) {
    const arch = parseArch('--generate', options.generate);
    if (mode !== undefined) throw new CliUsageError(`wrong mode "${mode}" for --generate`);
    return { kind: 'generate', arch, rules: options.rules };
  }

  return { kind: 'help' };
}
