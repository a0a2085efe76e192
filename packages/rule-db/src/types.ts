/**
 * kconfig-audit Rule Database — Types
 */

import type { Arch, DataSourceKind, ValidationError } from '@kconfig-audit/parsers';
import type { Check, RuleAnnotation } from '@kconfig-audit/engine';

/** A recommendation: annotation, the architectures it applies to, and its check. */
export interface Rule {
  readonly annotation: RuleAnnotation;
  /** Absent means every supported architecture. */
  readonly archs?: ReadonlyArray<Arch> | undefined;
  readonly check: Check;
}

export const RULE_DATABASE_VERSION = 1;

/**
 * The validated rule database. Rules are grouped by the data source the
 * check list needs in order to include them.
 */
export type RuleTable = { readonly version: typeof RULE_DATABASE_VERSION } & {
  readonly [K in DataSourceKind]: ReadonlyArray<Rule>;
};

/**
 * Thrown when a rule database cannot be read or fails validation.
 * Carries every validation error found, not only the first.
 */
export class RuleDatabaseError extends Error {
  readonly errors: ReadonlyArray<ValidationError>;

  constructor(source: string, errors: ReadonlyArray<ValidationError>) {
    const details = errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message));
    super(`invalid rule database "${source}": ${details.join('; ')}`);
    this.name = 'RuleDatabaseError';
    this.errors = errors;
  }
}
