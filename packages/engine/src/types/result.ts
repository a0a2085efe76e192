/**
 * kconfig-audit Engine — Evaluation Result Types
 */

import type {
  AndCheck,
  Check,
  OptionCheck,
  OrCheck,
  RuleAnnotation,
  VersionCheck,
  VersionGatedCheck,
} from './check.js';

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

/**
 * The three outcomes of a check.
 *
 * UNKNOWN means the data needed to decide is missing. It is not a failure.
 */
export enum Verdict {
  Ok = 'OK',
  Fail = 'FAIL',
  Unknown = 'UNKNOWN',
}

export interface EvaluationResult {
  readonly verdict: Verdict;
  /** Human-readable explanation, e.g. `CONFIG_BUG is "y"`. */
  readonly reason: string;
  /** Raw value of the option the verdict is about; `null` when absent or off. */
  readonly foundValue: string | null;
}

// ---------------------------------------------------------------------------
// Evaluated tree
// ---------------------------------------------------------------------------

export interface EvaluatedOption {
  readonly kind: 'option';
  readonly check: OptionCheck;
  readonly result: EvaluationResult;
}

export interface EvaluatedVersion {
  readonly kind: 'version';
  readonly check: VersionCheck;
  readonly result: EvaluationResult;
}

/** A combinator child that was never evaluated because of short-circuiting. */
export interface SkippedCheck {
  readonly kind: 'skipped';
  readonly check: Check;
}

export interface EvaluatedCombinator {
  readonly kind: 'and' | 'or';
  readonly check: AndCheck | OrCheck;
  readonly result: EvaluationResult;
  /** One node per declared child, in declaration order. */
  readonly children: ReadonlyArray<EvaluatedNode>;
}

/**
 * A version-gated node holds only the branch that was selected.
 * With no kernel version detected, neither branch is evaluated.
 */
export interface EvaluatedGate {
  readonly kind: 'version-gated';
  readonly check: VersionGatedCheck;
  readonly result: EvaluationResult;
  readonly branch?: { readonly side: 'before' | 'after'; readonly node: EvaluatedCheck } | undefined;
}

export type EvaluatedCheck = EvaluatedOption | EvaluatedVersion | EvaluatedCombinator | EvaluatedGate;
export type EvaluatedNode = EvaluatedCheck | SkippedCheck;

export interface EvaluatedEntry {
  readonly annotation: RuleAnnotation;
  readonly evaluated: EvaluatedCheck;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a check cannot be evaluated at all: a numeric comparison
 * against a value that is not an integer, or a refinement aimed at a check
 * it cannot rewrite. Indicates a rule authoring error, not a verdict.
 */
export class CheckEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckEvaluationError';
  }
}
