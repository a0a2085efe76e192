/**
 * kconfig-audit Parsers — sysctl Parser
 *
 * Parses the output of `sysctl -a`: one `name = value` pair per line.
 */

import type { ParsedOptions } from './types.js';
import { FatalInputError } from './types.js';

const SEPARATOR = ' = ';

/**
 * Parse sysctl output into an ordered name → value map.
 *
 * Blank lines are skipped. Values may be empty (`kernel.domainname = `)
 * and may contain spaces or tabs (`kernel.printk = 4\t4\t1\t7`).
 *
 * @throws {FatalInputError} On a non-empty line without ` = `, or when a
 *   parameter appears more than once
 */
export function parseSysctl(text: string): ParsedOptions {
  const options = new Map<string, string | null>();

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '') continue;

    const sep = line.indexOf(SEPARATOR);
    if (sep === -1) {
      // `sysctl -a` prints `name = ` for empty values, which trimEnd() reduced.
      if (line.endsWith(' =')) {
        setOnce(options, line.slice(0, -2).trim(), '', line);
        continue;
      }
      throw new FatalInputError(`bad sysctl line "${line}"`);
    }
    setOnce(options, line.slice(0, sep).trim(), line.slice(sep + SEPARATOR.length), line);
  }

  return options;
}

function setOnce(options: Map<string, string | null>, name: string, value: string, line: string): void {
  if (options.has(name)) {
    throw new FatalInputError(`sysctl option "${line}" exists multiple times`);
  }
  options.set(name, value);
}
