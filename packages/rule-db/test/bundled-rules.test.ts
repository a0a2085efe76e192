/**
 * kconfig-audit Rule Database — Bundled Database and Checklist Tests
 *
 * bundled/loads: the shipped database validates
 * bundled/content: representative recommendations are present
 * checklist/arch: rules for other architectures are dropped, order is kept
 * checklist/sources: cmdline and sysctl groups only when requested
 * loader/files: missing and custom database files
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mainOption } from '@kconfig-audit/engine';
import { loadRuleTable } from '../src/loader.js';
import { buildChecklist } from '../src/checklist.js';
import { RuleDatabaseError } from '../src/types.js';
import type { RuleTable } from '../src/types.js';

// ---------------------------------------------------------------------------
// Bundled database
// ---------------------------------------------------------------------------

const table = loadRuleTable();

function mainNames(checklist: ReturnType<typeof buildChecklist>): string[] {
  return checklist.map((entry) => mainOption(entry.check)?.name ?? '');
}

describe('bundled/loads', () => {
  it('has rules in every group', () => {
    expect(table.version).toBe(1);
    expect(table.kconfig.length).toBeGreaterThan(0);
    expect(table.cmdline.length).toBeGreaterThan(0);
    expect(table.sysctl.length).toBeGreaterThan(0);
  });
});

describe('bundled/content', () => {
  it('gates the stack protector rename at 4.18', () => {
    const gate = table.kconfig.find((rule) => rule.check.kind === 'version-gated');
    expect(gate?.check).toMatchObject({
      threshold: [4, 18],
      before: { name: 'CONFIG_CC_STACKPROTECTOR' },
      after: { name: 'CONFIG_STACKPROTECTOR' },
    });
  });

  it('asks for the maximum mmap entropy', () => {
    const rnd = table.kconfig.find((rule) => mainOption(rule.check)?.name === 'CONFIG_ARCH_MMAP_RND_BITS');
    expect(rnd?.check).toMatchObject({ expect: { mode: 'numeric', op: '>=', threshold: 32 } });
  });

  it('restricts kernel pointers through sysctl', () => {
    const kptr = table.sysctl.find((rule) => mainOption(rule.check)?.name === 'kernel.kptr_restrict');
    expect(kptr?.check).toMatchObject({ expect: { mode: 'equals', value: '2' } });
  });
});

// ---------------------------------------------------------------------------
// Checklist
// ---------------------------------------------------------------------------

describe('checklist/arch', () => {
  it('drops rules for other architectures', () => {
    const x86 = mainNames(buildChecklist(table, 'X86_64', { cmdline: false, sysctl: false }));
    const arm = mainNames(buildChecklist(table, 'ARM', { cmdline: false, sysctl: false }));
    expect(x86).toContain('CONFIG_RANDOMIZE_MEMORY');
    expect(x86).not.toContain('CONFIG_CPU_SW_DOMAIN_PAN');
    expect(arm).toContain('CONFIG_CPU_SW_DOMAIN_PAN');
    expect(arm).not.toContain('CONFIG_RANDOMIZE_MEMORY');
  });

  it('keeps database order', () => {
    const names = mainNames(buildChecklist(table, 'ARM64', { cmdline: false, sysctl: false }));
    expect(names.slice(0, 3)).toEqual(['CONFIG_BUG', 'CONFIG_SLUB_DEBUG', 'CONFIG_THREAD_INFO_IN_TASK']);
  });
});

describe('checklist/sources', () => {
  const small: RuleTable = {
    version: 1,
    kconfig: [
      {
        annotation: { decision: 'defconfig', reason: 'self_protection' },
        check: { kind: 'option', source: 'kconfig', name: 'CONFIG_BUG', expect: { mode: 'equals', value: 'y' } },
      },
    ],
    cmdline: [
      {
        annotation: { decision: 'kspp', reason: 'self_protection' },
        archs: ['ARM64'],
        check: { kind: 'option', source: 'cmdline', name: 'arm64.nomte', expect: { mode: 'off' } },
      },
    ],
    sysctl: [
      {
        annotation: { decision: 'kspp', reason: 'cut_attack_surface' },
        check: { kind: 'option', source: 'sysctl', name: 'kernel.dmesg_restrict', expect: { mode: 'equals', value: '1' } },
      },
    ],
  };

  it('includes only the kconfig group by default', () => {
    expect(mainNames(buildChecklist(small, 'ARM64', { cmdline: false, sysctl: false }))).toEqual(['CONFIG_BUG']);
  });

  it('appends the requested groups in order', () => {
    expect(mainNames(buildChecklist(small, 'ARM64', { cmdline: true, sysctl: true }))).toEqual([
      'CONFIG_BUG',
      'arm64.nomte',
      'kernel.dmesg_restrict',
    ]);
    expect(mainNames(buildChecklist(small, 'X86_64', { cmdline: true, sysctl: false }))).toEqual(['CONFIG_BUG']);
  });
});

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

describe('loader/files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kconfig-audit-rules-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file', () => {
    expect(() => loadRuleTable(join(dir, 'none.json'))).toThrow(RuleDatabaseError);
  });

  it('loads a custom database', () => {
    const path = join(dir, 'rules.json');
    writeFileSync(
      path,
      JSON.stringify({
        version: 1,
        kconfig: [{ decision: 'my', reason: 'cut_attack_surface', check: { kconfig: 'KEXEC', expect: 'is not set' } }],
        cmdline: [],
        sysctl: [],
      }),
    );
    expect(mainNames(buildChecklist(loadRuleTable(path), 'X86_32', { cmdline: true, sysctl: true }))).toEqual([
      'CONFIG_KEXEC',
    ]);
  });
});
