/**
 * kconfig-audit Parsers — Kernel Command Line Parser
 *
 * Parses the contents of `/proc/cmdline`: exactly one line of
 * space-separated `name` or `name=value` tokens.
 *
 * Values are normalized the way the kernel's kstrtobool() reads them, so
 * that `init_on_alloc=on` and `init_on_alloc=1` compare equal against a
 * rule. Parameters the kernel parses with its own handler keep their raw
 * value.
 */

import type { ParsedOptions } from './types.js';
import { FatalInputError } from './types.js';

/**
 * Parameters whose values are not parsed with kstrtobool() by the kernel.
 * Their values are kept verbatim (`mitigations=off` stays `off`).
 */
const VERBATIM_PARAMS: ReadonlySet<string> = new Set([
  'debugfs',
  'mitigations',
  'pti',
  'spectre_v2',
  'spectre_v2_user',
  'spec_store_bypass_disable',
  'l1tf',
  'mds',
  'tsx_async_abort',
  'srbds',
  'mmio_stale_data',
  'retbleed',
  'tsx',
]);

const TRUE_SPELLINGS: ReadonlySet<string> = new Set(['1', 'on', 'On', 'ON', 'y', 'Y', 'yes', 'Yes', 'YES']);
const FALSE_SPELLINGS: ReadonlySet<string> = new Set(['0', 'off', 'Off', 'OFF', 'n', 'N', 'no', 'No', 'NO']);

/**
 * Normalize a cmdline parameter value.
 *
 * @example
 * normalizeCmdlineValue('init_on_free', 'on')   // '1'
 * normalizeCmdlineValue('slub_debug', 'P')      // 'P'
 * normalizeCmdlineValue('mitigations', 'off')   // 'off'
 */
export function normalizeCmdlineValue(name: string, value: string): string {
  if (VERBATIM_PARAMS.has(name)) return value;
  if (TRUE_SPELLINGS.has(value)) return '1';
  if (FALSE_SPELLINGS.has(value)) return '0';
  return value;
}

/**
 * Parse kernel command line text into a name → value map.
 *
 * A bare token (`nosmt`) is recorded with the empty string, which is a
 * value, not the off marker. A repeated parameter overwrites the earlier
 * one: the kernel applies the last occurrence.
 *
 * @param text - Full contents of the cmdline file
 * @param source - File name used in the error message
 * @throws {FatalInputError} If the file has more than one non-empty line
 */
export function parseCmdline(text: string, source = 'cmdline'): ParsedOptions {
  const [first = '', ...rest] = text.split('\n');
  if (rest.some((line) => line.trim() !== '')) {
    throw new FatalInputError(`more than one line in "${source}"`);
  }

  const options = new Map<string, string | null>();
  for (const token of first.split(/\s+/)) {
    if (token === '') continue;
    const eq = token.indexOf('=');
    const name = eq === -1 ? token : token.slice(0, eq);
    const value = eq === -1 ? '' : token.slice(eq + 1);
    options.set(name, normalizeCmdlineValue(name, value));
  }
  return options;
}
