/**
 * commands/check.ts — Check a kernel's configuration against the rule database.
 *
 * Steps:
 *   1. Log the inputs
 *   2. Detect the microarchitecture and kernel version (fatal on failure),
 *      and the compiler (a warning on failure)
 *   3. Build the checklist for the detected arch and the given sources
 *   4. Parse each source, populate the checks, apply refinements
 *   5. Evaluate and print the report
 */

import {
  FatalInputError,
  detectArch,
  detectCompiler,
  detectKernelVersion,
  formatVersion,
  parseCmdline,
  parseKconfig,
  parseSysctl,
  type ParsedOptions,
} from '@kconfig-audit/parsers';
import {
  DEFAULT_REFINEMENTS,
  applyRefinements,
  collectUnknownOptions,
  evaluateChecklist,
  populate,
  type SourceData,
} from '@kconfig-audit/engine';
import { buildChecklist } from '@kconfig-audit/rule-db';
import { readInputText } from '@kconfig-audit/runtime-host';
import { fromEvaluated } from '../report/nodes.js';
import { renderJson } from '../report/json.js';
import { renderTable } from '../report/table.js';
import type { CheckAction } from './action.js';
import { loadRules, type CommandContext } from './context.js';

function readOptional(
  path: string | undefined,
  parse: (text: string, path: string) => ParsedOptions,
): ParsedOptions | undefined {
  return path === undefined ? undefined : parse(readInputText(path), path);
}

export function runCheck(action: CheckAction, ctx: CommandContext): void {
  const { log } = ctx;

  if (action.mode !== undefined && action.mode !== 'json') {
    log.info(`Special report mode: ${action.mode}`);
  }
  log.info(`Kconfig file to check: ${action.config}`);
  if (action.cmdline !== undefined) log.info(`Kernel cmdline file to check: ${action.cmdline}`);
  if (action.sysctl !== undefined) log.info(`Kernel sysctl output file to check: ${action.sysctl}`);

  const table = loadRules(action.rules, ctx);
  const kconfigText = readInputText(action.config);

  const arch = detectArch(kconfigText);
  if (!arch.ok) throw new FatalInputError(arch.error);
  log.info(`Detected microarchitecture: ${arch.value}`);

  const version = detectKernelVersion(kconfigText);
  if (!version.ok) throw new FatalInputError(version.error);
  log.info(`Detected kernel version: ${formatVersion(version.value)}`);

  const compiler = detectCompiler(kconfigText);
  if (compiler.ok) {
    log.info(`Detected compiler: ${compiler.value}`);
  } else {
    log.warn(`Can't detect the compiler: ${compiler.error}`);
  }

  const checklist = buildChecklist(table, arch.value, {
    cmdline: action.cmdline !== undefined,
    sysctl: action.sysctl !== undefined,
  });

  const cmdline = readOptional(action.cmdline, parseCmdline);
  const sysctl = readOptional(action.sysctl, (text) => parseSysctl(text));
  const data: SourceData = {
    kconfig: parseKconfig(kconfigText),
    ...(cmdline !== undefined ? { cmdline } : {}),
    ...(sysctl !== undefined ? { sysctl } : {}),
  };

  const refined = applyRefinements(populate(checklist, data, version.value), DEFAULT_REFINEMENTS, data);
  const entries = fromEvaluated(evaluateChecklist(refined));

  if (action.mode === 'verbose') {
    for (const option of collectUnknownOptions(refined, data)) {
      ctx.out(`[?] No check for option ${option.name} (${option.value ?? 'is not set'})`);
    }
  }

  if (action.mode === 'json') {
    ctx.out(renderJson(entries));
    return;
  }
  for (const line of renderTable(entries, { mode: action.mode, withResults: true, theme: ctx.theme })) {
    ctx.out(line);
  }
}
