/**
 * kconfig-audit Runtime Host — Input File Reader
 *
 * Reads a Kconfig, cmdline or sysctl file into a string for the parsers.
 *
 * Kernels commonly expose their configuration compressed (/proc/config.gz),
 * so a file is decompressed when its name ends in `.gz` or its contents
 * start with the gzip magic bytes.
 *
 * Each file is read in one synchronous call; no handle outlives the call.
 */

import { readFileSync } from 'node:fs';
import { gunzipSync } from 'node:zlib';
import { FatalInputError } from '@kconfig-audit/parsers';

const GZIP_MAGIC = [0x1f, 0x8b] as const;

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function isGzip(path: string, content: Uint8Array): boolean {
  return path.endsWith('.gz') || (content[0] === GZIP_MAGIC[0] && content[1] === GZIP_MAGIC[1]);
}

/**
 * Read an input file as UTF-8 text, decompressing gzip data.
 *
 * @throws {FatalInputError} When the file cannot be read or decompressed
 */
export function readInputText(path: string): string {
  let content: Buffer;
  try {
    content = readFileSync(path);
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new FatalInputError(`file "${path}" does not exist`);
    }
    if (isNodeError(err) && err.code === 'EISDIR') {
      throw new FatalInputError(`"${path}" is a directory`);
    }
    throw err;
  }

  if (!isGzip(path, content)) return content.toString('utf-8');

  try {
    return gunzipSync(content).toString('utf-8');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new FatalInputError(`failed to decompress "${path}": ${detail}`);
  }
}
