#!/usr/bin/env -S node --import tsx
/**
 * bin/kconfig-audit.ts — Entry point for the `kconfig-audit` command.
 *
 * kconfig-audit -c /boot/config-6.1.0              → table report
 * kconfig-audit -c config -m json > report.json    → JSON only on stdout
 * kconfig-audit -g ARM64 > hardening.config        → Kconfig fragment
 */

const { run } = await import('../commands/index.js')
process.exitCode = run(process.argv)
