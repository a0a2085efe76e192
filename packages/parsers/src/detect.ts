/**
 * kconfig-audit Parsers — Detectors
 *
 * Facts read from the Kconfig text beyond the option map itself:
 * the target architecture, the kernel version from the file banner,
 * and the compiler that built the kernel.
 *
 * Detection failure is returned as a result union. Only the compiler
 * detector throws, and only for markers that contradict each other.
 */

import type { Arch, DetectionResult, KernelVersion } from './types.js';
import { SUPPORTED_ARCHS, FatalInputError } from './types.js';

// ---------------------------------------------------------------------------
// Architecture
// ---------------------------------------------------------------------------

const ARCH_MARKER = /^CONFIG_([A-Z0-9_]+)=y$/;

/**
 * Detect the microarchitecture from its `CONFIG_<ARCH>=y` marker line.
 *
 * Exactly one supported marker must be present.
 */
export function detectArch(text: string): DetectionResult<Arch> {
  const found: Arch[] = [];
  for (const rawLine of text.split('\n')) {
    const m = ARCH_MARKER.exec(rawLine.trim());
    if (m === null) continue;
    const arch = SUPPORTED_ARCHS.find((a) => a === m[1]);
    if (arch !== undefined && !found.includes(arch)) found.push(arch);
  }

  const [first, ...others] = found;
  if (first === undefined) {
    return { ok: false, error: 'failed to detect microarchitecture' };
  }
  if (others.length > 0) {
    return { ok: false, error: 'more than one supported microarchitecture is detected' };
  }
  return { ok: true, value: first };
}

// ---------------------------------------------------------------------------
// Kernel version
// ---------------------------------------------------------------------------

const VERSION_BANNER = /^# Linux\/.* Kernel Configuration/;
const DIGITS = /^\d+$/;

/**
 * Detect the kernel version from the banner comment, e.g.
 * `# Linux/x86 6.1.0 Kernel Configuration`.
 *
 * The version is the third whitespace-separated field; it needs at least
 * three dot-separated parts and integer major and minor numbers.
 */
export function detectKernelVersion(text: string): DetectionResult<KernelVersion> {
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!VERSION_BANNER.test(line)) continue;

    const field = line.split(/\s+/)[2] ?? '';
    const parts = field.split('.');
    const [major = '', minor = ''] = parts;
    if (parts.length < 3 || !DIGITS.test(major) || !DIGITS.test(minor)) {
      return { ok: false, error: `failed to parse the version "${field}"` };
    }
    return { ok: true, value: [Number.parseInt(major, 10), Number.parseInt(minor, 10)] };
  }
  return { ok: false, error: 'no kernel version detected' };
}

/** Compare two versions: negative, zero or positive like a sort comparator. */
export function compareVersions(a: KernelVersion, b: KernelVersion): number {
  return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1];
}

export function formatVersion(version: KernelVersion): string {
  return `${version[0]}.${version[1]}`;
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

const GCC_MARKER = 'CONFIG_GCC_VERSION=';
const CLANG_MARKER = 'CONFIG_CLANG_VERSION=';

/**
 * Detect the compiler from `CONFIG_GCC_VERSION` and `CONFIG_CLANG_VERSION`.
 *
 * @returns `GCC <n>` or `CLANG <n>`; not detected when either marker is missing
 * @throws {FatalInputError} When both markers are zero or both are nonzero
 */
export function detectCompiler(text: string): DetectionResult<string> {
  let gcc: string | undefined;
  let clang: string | undefined;
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith(GCC_MARKER)) gcc = line.slice(GCC_MARKER.length);
    else if (line.startsWith(CLANG_MARKER)) clang = line.slice(CLANG_MARKER.length);
  }

  if (gcc === undefined || clang === undefined) {
    return { ok: false, error: 'no CONFIG_GCC_VERSION or CONFIG_CLANG_VERSION' };
  }
  if (gcc === '0' && clang !== '0') return { ok: true, value: `CLANG ${clang}` };
  if (clang === '0' && gcc !== '0') return { ok: true, value: `GCC ${gcc}` };
  throw new FatalInputError(`invalid GCC_VERSION and CLANG_VERSION: ${gcc} ${clang}`);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Parse a base-10 integer, accepting an optional sign. `null` if malformed. */
export function parseInteger(text: string | undefined): number | null {
  if (text === undefined || !/^[+-]?\d+$/.test(text)) return null;
  return Number.parseInt(text, 10);
}
