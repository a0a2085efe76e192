/**
 * kconfig-audit Engine — Population and Refinement Tests
 *
 * population/data: option leaves of the matching source receive observations
 * population/version: version leaves and gates (including nested ones) receive the version
 * population/identity: untouched subtrees keep object identity
 * refinement/mmap-rnd-bits: the threshold follows CONFIG_ARCH_MMAP_RND_BITS_MAX, quoted or not
 * refinement/identity: only the targeted leaf changes
 * refinement/incompatible: a replacement that does not fit the expectation is fatal
 * unknown-options: unreferenced options are listed per source, in file order
 * describe: expectation text, main option and row summary
 */

import { describe, it, expect } from 'vitest';
import { populate, populateWithData, populateWithVersion } from '../src/population/populate.js';
import { applyRefinements, ARCH_MMAP_RND_BITS_MAX, DEFAULT_REFINEMENTS } from '../src/population/refine.js';
import type { RefinementHook } from '../src/population/refine.js';
import { evaluateChecklist } from '../src/evaluation/evaluate.js';
import { collectUnknownOptions } from '../src/evaluation/unknown-options.js';
import { expectationText, mainOption, summarizeCheck } from '../src/describe.js';
import { andCheck, optionCheck, orCheck, versionCheck, versionGatedCheck } from '../src/types/check.js';
import type { Check, Checklist, ChecklistEntry } from '../src/types/check.js';
import { CheckEvaluationError, Verdict } from '../src/types/result.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function entry(check: Check): ChecklistEntry {
  return { annotation: { decision: 'kspp', reason: 'self_protection' }, check };
}

const RND_BITS = optionCheck('kconfig', 'CONFIG_ARCH_MMAP_RND_BITS', { mode: 'numeric', op: '>=', threshold: 32 });
const BUG = optionCheck('kconfig', 'CONFIG_BUG', { mode: 'equals', value: 'y' });
const INIT_ON_FREE = optionCheck('cmdline', 'init_on_free', { mode: 'equals', value: '1' });
const GATE = versionGatedCheck(
  [4, 18],
  optionCheck('kconfig', 'CONFIG_CC_STACKPROTECTOR_STRONG', { mode: 'equals', value: 'y' }),
  optionCheck('kconfig', 'CONFIG_STACKPROTECTOR_STRONG', { mode: 'equals', value: 'y' }),
);

const CHECKLIST: Checklist = [entry(BUG), entry(RND_BITS), entry(INIT_ON_FREE), entry(GATE)];

const KCONFIG = new Map<string, string | null>([
  ['CONFIG_X86_64', 'y'],
  ['CONFIG_BUG', 'y'],
  ['CONFIG_ARCH_MMAP_RND_BITS_MAX', '24'],
  ['CONFIG_ARCH_MMAP_RND_BITS', '16'],
  ['CONFIG_STACKPROTECTOR_STRONG', 'y'],
  ['CONFIG_DEVMEM', null],
]);

// ---------------------------------------------------------------------------
// Population
// ---------------------------------------------------------------------------

describe('population/data', () => {
  it('attaches observations to leaves of the matching source', () => {
    const [bug, , cmdline] = populateWithData(CHECKLIST, KCONFIG, 'kconfig');
    expect(bug?.check).toEqual({ ...BUG, observed: { present: true, value: 'y' } });
    expect(cmdline?.check).toBe(INIT_ON_FREE);
  });

  it('records absence', () => {
    const [populated] = populateWithData([entry(INIT_ON_FREE)], new Map([['quiet', '']]), 'cmdline');
    expect(populated?.check).toEqual({ ...INIT_ON_FREE, observed: { present: false } });
  });

  it('does not mutate its input', () => {
    populateWithData(CHECKLIST, KCONFIG, 'kconfig');
    expect(BUG).not.toHaveProperty('observed');
  });
});

describe('population/version', () => {
  it('reaches gates and version leaves nested anywhere', () => {
    const nested = orCheck(BUG, versionGatedCheck([5, 0], versionCheck([4, 0]), BUG));
    const [populated] = populateWithVersion([entry(nested)], [5, 4]);
    const check = populated?.check;
    if (check?.kind !== 'or') throw new Error('expected an or check');
    const gate = check.children[1];
    if (gate.kind !== 'version-gated') throw new Error('expected a gate');
    expect(gate.detected).toEqual([5, 4]);
    expect(gate.before).toEqual({ kind: 'version', minimum: [4, 0], detected: [5, 4] });
    expect(check.children[0]).toBe(BUG);
  });
});

describe('population/identity', () => {
  it('returns the same entries when nothing is bound', () => {
    const populated = populateWithData(CHECKLIST, new Map(), 'sysctl');
    populated.forEach((e, i) => expect(e).toBe(CHECKLIST[i]));
  });

  it('keeps untouched children of a rebuilt combinator', () => {
    const combined = andCheck(BUG, INIT_ON_FREE);
    const [populated] = populateWithData([entry(combined)], KCONFIG, 'kconfig');
    const check = populated?.check;
    if (check?.kind !== 'and') throw new Error('expected an and check');
    expect(check).not.toBe(combined);
    expect(check.children[1]).toBe(INIT_ON_FREE);
  });
});

// ---------------------------------------------------------------------------
// Refinement
// ---------------------------------------------------------------------------

describe('refinement/mmap-rnd-bits', () => {
  it('lowers the threshold to the maximum before evaluation', () => {
    const populated = populate(CHECKLIST, { kconfig: KCONFIG }, [6, 1]);
    const refined = applyRefinements(populated, DEFAULT_REFINEMENTS, { kconfig: KCONFIG });
    expect(refined[1]?.check).toMatchObject({ expect: { mode: 'numeric', op: '>=', threshold: 24 } });

    const result = evaluateChecklist(refined)[1]?.evaluated.result;
    expect(result).toEqual({
      verdict: Verdict.Fail,
      reason: 'CONFIG_ARCH_MMAP_RND_BITS is 16, expected >= 24',
      foundValue: '16',
    });
  });

  it('leaves the static threshold without a maximum', () => {
    const kconfig = new Map([['CONFIG_ARCH_MMAP_RND_BITS', '32']]);
    const refined = applyRefinements(populate(CHECKLIST, { kconfig }), [ARCH_MMAP_RND_BITS_MAX], { kconfig });
    expect(refined[1]).toMatchObject({ check: { expect: { threshold: 32 } } });
  });

  it('is skipped when the kconfig source is missing', () => {
    expect(applyRefinements(CHECKLIST, DEFAULT_REFINEMENTS, {})).toBe(CHECKLIST);
  });

  it('reads a quoted maximum', () => {
    const kconfig = new Map([['CONFIG_ARCH_MMAP_RND_BITS_MAX', '"24"']]);
    const refined = applyRefinements(CHECKLIST, [ARCH_MMAP_RND_BITS_MAX], { kconfig });
    expect(refined[1]?.check).toMatchObject({ expect: { mode: 'numeric', op: '>=', threshold: 24 } });
  });

  it.each(['0x18', 'abc'])('rejects a maximum of %s', (value) => {
    const kconfig = new Map([['CONFIG_ARCH_MMAP_RND_BITS_MAX', value]]);
    expect(() => applyRefinements(CHECKLIST, [ARCH_MMAP_RND_BITS_MAX], { kconfig })).toThrow(
      new CheckEvaluationError(
        `cannot refine CONFIG_ARCH_MMAP_RND_BITS: CONFIG_ARCH_MMAP_RND_BITS_MAX is "${value}", not an integer`,
      ),
    );
  });
});

describe('refinement/identity', () => {
  it('rebuilds only the targeted entry', () => {
    const refined = applyRefinements(CHECKLIST, DEFAULT_REFINEMENTS, { kconfig: KCONFIG });
    expect(refined[0]).toBe(CHECKLIST[0]);
    expect(refined[1]).not.toBe(CHECKLIST[1]);
    expect(refined[2]).toBe(CHECKLIST[2]);
    expect(refined[3]).toBe(CHECKLIST[3]);
  });

  it('runs each hook once', () => {
    let calls = 0;
    const hook: RefinementHook = {
      name: 'counting',
      source: 'kconfig',
      target: 'CONFIG_BUG',
      refine: () => {
        calls += 1;
        return 'm';
      },
    };
    const refined = applyRefinements(CHECKLIST, [hook], { kconfig: KCONFIG });
    expect(calls).toBe(1);
    expect(refined[0]?.check).toMatchObject({ expect: { mode: 'equals', value: 'm' } });
  });
});

describe('refinement/incompatible', () => {
  it('rejects a numeric replacement for an equals expectation', () => {
    const hook: RefinementHook = { name: 'bad', source: 'kconfig', target: 'CONFIG_BUG', refine: () => 3 };
    expect(() => applyRefinements(CHECKLIST, [hook], { kconfig: KCONFIG })).toThrow(CheckEvaluationError);
  });
});

// ---------------------------------------------------------------------------
// Unknown options
// ---------------------------------------------------------------------------

describe('unknown-options', () => {
  it('lists options no leaf references, counting both gate branches', () => {
    const cmdline = new Map([
      ['quiet', ''],
      ['init_on_free', '1'],
    ]);
    expect(collectUnknownOptions(CHECKLIST, { kconfig: KCONFIG, cmdline })).toEqual([
      { source: 'kconfig', name: 'CONFIG_X86_64', value: 'y' },
      { source: 'kconfig', name: 'CONFIG_ARCH_MMAP_RND_BITS_MAX', value: '24' },
      { source: 'kconfig', name: 'CONFIG_DEVMEM', value: null },
      { source: 'cmdline', name: 'quiet', value: '' },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Description
// ---------------------------------------------------------------------------

describe('describe', () => {
  it('renders expectations in their text form', () => {
    expect(expectationText({ mode: 'equals', value: 'auto,nosmt' })).toBe('auto,nosmt');
    expect(expectationText({ mode: 'off' })).toBe('is not set');
    expect(expectationText({ mode: 'not-off' })).toBe('is not off');
    expect(expectationText({ mode: 'present' })).toBe('is present');
    expect(expectationText({ mode: 'numeric', op: '<=', threshold: 0 })).toBe('<= 0');
  });

  it('takes the main option from the after branch of a gate', () => {
    expect(mainOption(GATE)?.name).toBe('CONFIG_STACKPROTECTOR_STRONG');
  });

  it('skips version leaves when looking for the main option', () => {
    expect(summarizeCheck(orCheck(versionCheck([5, 5]), BUG))).toEqual({
      name: 'CONFIG_BUG',
      type: 'kconfig',
      desired: 'y',
    });
  });

  it('summarizes a version leaf', () => {
    expect(summarizeCheck(versionCheck([5, 5]))).toEqual({ name: 'kernel version', type: 'version', desired: '5.5' });
  });
});
