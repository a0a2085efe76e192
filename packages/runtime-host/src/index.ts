/**
 * @kconfig-audit/runtime-host
 *
 * Side-effectful pieces: reading input files, resolving configuration from
 * flags and the environment, and writing progress messages. The parsers and
 * the engine stay pure; everything that touches the process lives here.
 */

// Input files
export { readInputText, isGzip } from './adapters/input-file.js';

// Configuration
export type { RulesOrigin, ResolvedRules, ResolveRulesOptions } from './config.js';
export { RULES_ENV, resolveRulesPath, resolveColorLevel } from './config.js';

// Logging
export type { AuditLog, AuditLogLine, LineWriter } from './logging/audit-log.js';
export { ConsoleAuditLog, SilentAuditLog, MemoryAuditLog } from './logging/audit-log.js';
