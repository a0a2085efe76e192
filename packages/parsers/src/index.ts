/**
 * @kconfig-audit/parsers
 *
 * Shared types, text parsers and detectors. No I/O.
 */

// Types
export type {
  Arch,
  DataSourceKind,
  ParsedOptions,
  KernelVersion,
  DetectionResult,
  ValidationError,
  ValidationResult,
} from './types.js';
export { SUPPORTED_ARCHS, isArch, FatalInputError } from './types.js';

// Parsers
export { parseKconfig, KCONFIG_OFF_MARKER } from './kconfig.js';
export { parseCmdline, normalizeCmdlineValue } from './cmdline.js';
export { parseSysctl } from './sysctl.js';

// Detectors
export {
  detectArch,
  detectKernelVersion,
  detectCompiler,
  compareVersions,
  formatVersion,
  parseInteger,
} from './detect.js';
