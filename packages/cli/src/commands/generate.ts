/**
 * commands/generate.ts — Write a Kconfig fragment with the recommended values.
 *
 * The fragment is the only output, so it can be redirected into a file.
 */

import { buildChecklist } from '@kconfig-audit/rule-db';
import { renderFragment } from '../report/fragment.js';
import type { GenerateAction } from './action.js';
import { loadRules, type CommandContext } from './context.js';

export function runGenerate(action: GenerateAction, ctx: CommandContext): void {
  const table = loadRules(action.rules, ctx);
  const checklist = buildChecklist(table, action.arch, { cmdline: false, sysctl: false });
  for (const line of renderFragment(checklist, action.arch)) ctx.out(line);
}
