/**
 * kconfig-audit CLI — Kconfig Fragment
 *
 * Turns the kconfig recommendations for one architecture into a config
 * fragment that can be merged into a kernel build.
 */

import { mainOption, type Checklist } from '@kconfig-audit/engine'
import type { Arch } from '@kconfig-audit/parsers'

/** Its value is computed from CONFIG_ARCH_MMAP_RND_BITS_MAX at check time. */
const REFINED_OPTIONS: ReadonlySet<string> = new Set(['CONFIG_ARCH_MMAP_RND_BITS'])

export function renderFragment(checklist: Checklist, arch: Arch): string[] {
  const marker = `CONFIG_${arch}`
  const lines = [`${marker}=y`]
  const emitted = new Set([marker])

  for (const entry of checklist) {
    const main = mainOption(entry.check)
    if (main === undefined || main.source !== 'kconfig') continue
    if (REFINED_OPTIONS.has(main.name) || emitted.has(main.name)) continue

    if (main.expect.mode === 'equals') {
      lines.push(`${main.name}=${main.expect.value}`)
    } else if (main.expect.mode === 'off') {
      lines.push(`# ${main.name} is not set`)
    } else {
      continue
    }
    emitted.add(main.name)
  }
  return lines
}
