/**
 * kconfig-audit Parsers — Kconfig Parser
 *
 * Turns the text of a kernel `.config` into an ordered option map.
 *
 * Two line shapes are recognized (after trimming):
 *
 *   CONFIG_NAME=value          → enabled, raw value kept verbatim
 *   # CONFIG_NAME is not set   → explicitly off, recorded as null
 *
 * Every other line (comments, blank lines, banners) is ignored.
 */

import type { ParsedOptions } from './types.js';
import { FatalInputError } from './types.js';

/** The trailing text of a disabled option line. */
export const KCONFIG_OFF_MARKER = 'is not set';

const OPTION_IS_ON = /^CONFIG_[a-zA-Z0-9_]*=[a-zA-Z0-9_"]*/;
const OPTION_IS_OFF = /^# CONFIG_[a-zA-Z0-9_]* is not set/;

/**
 * Parse Kconfig text into an ordered name → value map.
 *
 * @param text - Full contents of the Kconfig file
 * @returns Option map; `null` values denote explicitly disabled options
 * @throws {FatalInputError} On a malformed enabled or disabled line, or when
 *   an option name appears more than once
 */
export function parseKconfig(text: string): ParsedOptions {
  const options = new Map<string, string | null>();

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    let name: string;
    let value: string | null;

    if (OPTION_IS_ON.test(line)) {
      const eq = line.indexOf('=');
      name = line.slice(0, eq);
      const literal = line.slice(eq + 1);
      if (literal === KCONFIG_OFF_MARKER) {
        throw new FatalInputError(`bad enabled Kconfig option "${line}"`);
      }
      value = literal;
    } else if (OPTION_IS_OFF.test(line)) {
      const body = line.slice(2);
      const space = body.indexOf(' ');
      name = body.slice(0, space);
      if (body.slice(space + 1) !== KCONFIG_OFF_MARKER) {
        throw new FatalInputError(`bad disabled Kconfig option "${line}"`);
      }
      value = null;
    } else {
      continue;
    }

    if (options.has(name)) {
      throw new FatalInputError(`Kconfig option "${line}" exists multiple times`);
    }
    options.set(name, value);
  }

  return options;
}
