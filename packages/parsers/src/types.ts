/**
 * kconfig-audit Parsers — Core Type Definitions
 *
 * Shared vocabulary for every other package: the supported architectures,
 * the data source kinds, the parsed option map, the kernel version pair,
 * and the result and error types produced by the parsers and detectors.
 *
 * This package has no internal dependencies. It performs no I/O: every
 * function takes file contents as a string.
 */

// ---------------------------------------------------------------------------
// Architectures
// ---------------------------------------------------------------------------

/**
 * The microarchitectures the rule database carries recommendations for.
 *
 * Each one corresponds to a `CONFIG_<ARCH>=y` marker line in a Kconfig file.
 */
export const SUPPORTED_ARCHS = ['X86_64', 'X86_32', 'ARM64', 'ARM'] as const;

export type Arch = (typeof SUPPORTED_ARCHS)[number];

export function isArch(value: string): value is Arch {
  return SUPPORTED_ARCHS.some((arch) => arch === value);
}

// ---------------------------------------------------------------------------
// Parsed data
// ---------------------------------------------------------------------------

/**
 * The kinds of option data a check can be bound to.
 *
 * Kernel version data is not an option source: it is a single pair attached
 * to version checks directly.
 */
export type DataSourceKind = 'kconfig' | 'cmdline' | 'sysctl';

/**
 * Ordered option name → raw value mapping for one data source.
 *
 * `null` is the explicit-off marker (`# CONFIG_X is not set`).
 * Insertion order follows the input file.
 */
export type ParsedOptions = ReadonlyMap<string, string | null>;

/** `(major, minor)` kernel version pair. */
export type KernelVersion = readonly [major: number, minor: number];

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/**
 * Result of a detector. Detection failure is an expected outcome for
 * malformed input; callers decide whether it is fatal.
 */
export type DetectionResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

/**
 * A validation error with an optional location (JSON path, line number).
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Thrown when an input file cannot be trusted: a malformed Kconfig line,
 * a repeated option, a multi-line cmdline file, contradictory compiler
 * markers.
 *
 * The run is aborted; nothing is retried.
 */
export class FatalInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalInputError';
  }
}
