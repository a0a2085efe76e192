/**
 * kconfig-audit Engine — Check Types
 *
 * The hierarchical rule model. A Check is one of:
 *
 *   option         — compare one option of one data source to an expectation
 *   version        — require a minimum kernel version
 *   and / or       — combine two or more checks
 *   version-gated  — pick one of two checks by kernel version
 *
 * Checks are immutable. Population and refinement return new trees;
 * subtrees they do not touch keep their object identity.
 */

import type { DataSourceKind, KernelVersion } from '@kconfig-audit/parsers';

// ---------------------------------------------------------------------------
// Expectations
// ---------------------------------------------------------------------------

export type NumericOperator = '>=' | '<=';

/**
 * The comparison an option check applies to the observed value.
 *
 * - `equals`: the value must equal `value` (surrounding quotes ignored)
 * - `not-off`: the value must be set to anything but an off value
 * - `off`: the option must be off; absence counts as off
 * - `present`: the option must be present with any value (cmdline flags)
 * - `numeric`: integer comparison against `threshold`
 */
export type Expectation =
  | { readonly mode: 'equals'; readonly value: string }
  | { readonly mode: 'not-off' }
  | { readonly mode: 'off' }
  | { readonly mode: 'present' }
  | { readonly mode: 'numeric'; readonly op: NumericOperator; readonly threshold: number };

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

/** What population found for an option leaf. `value: null` is explicit-off. */
export type Observation =
  | { readonly present: false }
  | { readonly present: true; readonly value: string | null };

export interface OptionCheck {
  readonly kind: 'option';
  readonly source: DataSourceKind;
  readonly name: string;
  readonly expect: Expectation;
  /** Attached by population. Absent until then. */
  readonly observed?: Observation | undefined;
}

export interface VersionCheck {
  readonly kind: 'version';
  readonly minimum: KernelVersion;
  readonly detected?: KernelVersion | undefined;
}

/** Combinators always hold at least two children. */
export type CheckChildren = readonly [Check, Check, ...Check[]];

export interface AndCheck {
  readonly kind: 'and';
  readonly children: CheckChildren;
}

export interface OrCheck {
  readonly kind: 'or';
  readonly children: CheckChildren;
}

/**
 * Kernel version below `threshold` selects `before`, otherwise `after`.
 * Used when an option was renamed or replaced in a given release.
 */
export interface VersionGatedCheck {
  readonly kind: 'version-gated';
  readonly threshold: KernelVersion;
  readonly before: Check;
  readonly after: Check;
  readonly detected?: KernelVersion | undefined;
}

export type LeafCheck = OptionCheck | VersionCheck;
export type CombinatorCheck = AndCheck | OrCheck;
export type Check = LeafCheck | CombinatorCheck | VersionGatedCheck;

// ---------------------------------------------------------------------------
// Annotations and checklists
// ---------------------------------------------------------------------------

export const DECISIONS = ['defconfig', 'kspp', 'grsec', 'clipos', 'lockdown', 'maintainer', 'my'] as const;
export type Decision = (typeof DECISIONS)[number];

export const REASONS = ['self_protection', 'security_policy', 'cut_attack_surface', 'harden_userspace'] as const;
export type Reason = (typeof REASONS)[number];

/**
 * Static metadata of a rule: who recommends it and why.
 * Never altered by evaluation.
 */
export interface RuleAnnotation {
  readonly decision: Decision;
  readonly reason: Reason;
  readonly note?: string | undefined;
}

export interface ChecklistEntry {
  readonly annotation: RuleAnnotation;
  readonly check: Check;
}

export type Checklist = ReadonlyArray<ChecklistEntry>;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function optionCheck(source: DataSourceKind, name: string, expect: Expectation): OptionCheck {
  return { kind: 'option', source, name, expect };
}

export function versionCheck(minimum: KernelVersion): VersionCheck {
  return { kind: 'version', minimum };
}

export function andCheck(first: Check, second: Check, ...rest: Check[]): AndCheck {
  return { kind: 'and', children: [first, second, ...rest] };
}

export function orCheck(first: Check, second: Check, ...rest: Check[]): OrCheck {
  return { kind: 'or', children: [first, second, ...rest] };
}

export function versionGatedCheck(threshold: KernelVersion, before: Check, after: Check): VersionGatedCheck {
  return { kind: 'version-gated', threshold, before, after };
}
