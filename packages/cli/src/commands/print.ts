/**
 * commands/print.ts — List the recommendations for one microarchitecture.
 *
 * Every rule group is included. Nothing is evaluated, so the table has no
 * result column and no footer.
 */

import { buildChecklist } from '@kconfig-audit/rule-db';
import { fromChecklist } from '../report/nodes.js';
import { renderJson } from '../report/json.js';
import { renderTable } from '../report/table.js';
import type { PrintAction } from './action.js';
import { loadRules, type CommandContext } from './context.js';

export function runPrint(action: PrintAction, ctx: CommandContext): void {
  if (action.mode === 'verbose') ctx.log.info(`Special report mode: ${action.mode}`);

  const table = loadRules(action.rules, ctx);
  const entries = fromChecklist(buildChecklist(table, action.arch, { cmdline: true, sysctl: true }));

  if (action.mode === 'json') {
    ctx.out(renderJson(entries));
    return;
  }
  ctx.log.info(`Printing kernel security hardening options for ${action.arch}...`);
  for (const line of renderTable(entries, { mode: action.mode, withResults: false, theme: ctx.theme })) {
    ctx.out(line);
  }
}
