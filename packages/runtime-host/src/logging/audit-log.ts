/**
 * kconfig-audit Runtime Host — Audit Log Sinks
 *
 * The run's progress messages (inputs, detected arch, version, compiler)
 * go through an AuditLog so that the report stays the only output in JSON
 * mode and so that tests can inspect what was said.
 *
 * Lines are written as `[+] message` for information and `[-] message`
 * for a non-fatal problem.
 */

import { Chalk } from 'chalk';
import type { ChalkInstance, ColorSupportLevel } from 'chalk';

/**
 * A sink for progress messages.
 *
 * The parsers and the engine never log; only the CLI calls this.
 */
export interface AuditLog {
  info(message: string): void;
  warn(message: string): void;
}

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Writes each message as one line, `[+]` in green and `[-]` in amber.
 */
export class ConsoleAuditLog implements AuditLog {
  private readonly paint: ChalkInstance;

  constructor(
    level: ColorSupportLevel,
    private readonly write: LineWriter = stdoutWriter,
  ) {
    this.paint = new Chalk({ level });
  }

  info(message: string): void {
    this.write(`${this.paint.hex('#81C784')('[+]')} ${message}`);
  }

  warn(message: string): void {
    this.write(`${this.paint.hex('#D4880A')('[-]')} ${message}`);
  }
}

/** Discards everything. Used when stdout must carry JSON only. */
export class SilentAuditLog implements AuditLog {
  info(_message: string): void {}
  warn(_message: string): void {}
}

export interface AuditLogLine {
  readonly level: 'info' | 'warn';
  readonly message: string;
}

/** Keeps messages in memory. For tests. */
export class MemoryAuditLog implements AuditLog {
  readonly lines: AuditLogLine[] = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  /** Messages rendered as ConsoleAuditLog would print them without colour. */
  text(): string[] {
    return this.lines.map((l) => `${l.level === 'info' ? '[+]' : '[-]'} ${l.message}`);
  }
}
