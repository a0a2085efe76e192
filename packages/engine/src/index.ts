/**
 * @kconfig-audit/engine
 *
 * Check model, population, refinement and evaluation. Pure: no I/O.
 */

// Types
export type {
  NumericOperator,
  Expectation,
  Observation,
  OptionCheck,
  VersionCheck,
  CheckChildren,
  AndCheck,
  OrCheck,
  VersionGatedCheck,
  LeafCheck,
  CombinatorCheck,
  Check,
  Decision,
  Reason,
  RuleAnnotation,
  ChecklistEntry,
  Checklist,
} from './types/check.js';
export {
  DECISIONS,
  REASONS,
  optionCheck,
  versionCheck,
  andCheck,
  orCheck,
  versionGatedCheck,
} from './types/check.js';

export type {
  EvaluationResult,
  EvaluatedOption,
  EvaluatedVersion,
  SkippedCheck,
  EvaluatedCombinator,
  EvaluatedGate,
  EvaluatedCheck,
  EvaluatedNode,
  EvaluatedEntry,
} from './types/result.js';
export { Verdict, CheckEvaluationError } from './types/result.js';

// Population and refinement
export type { SourceData, CheckRewriter } from './population/populate.js';
export {
  populateWithData,
  populateWithVersion,
  populate,
  rewriteCheck,
  rewriteChecklist,
} from './population/populate.js';
export type { RefinementHook } from './population/refine.js';
export { applyRefinements, ARCH_MMAP_RND_BITS_MAX, DEFAULT_REFINEMENTS } from './population/refine.js';

// Evaluation
export { evaluateCheck, evaluateChecklist, unquote } from './evaluation/evaluate.js';
export type { UnknownOption } from './evaluation/unknown-options.js';
export { collectUnknownOptions } from './evaluation/unknown-options.js';

// Description
export type { CheckSummary } from './describe.js';
export { expectationText, mainOption, summarizeCheck } from './describe.js';
