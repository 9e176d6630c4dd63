/**
 * Atomic file writes
 *
 * Content goes to a sibling temp file which is fsynced and renamed over the
 * target, so readers (and a process killed mid-write) only ever see the old
 * file or the new one, never a partial record.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { IOError, describeError } from '../errors.js';

export interface AtomicWriteOptions {
  /** Final file mode (default 0o644) */
  mode?: number;
}

function fsyncPath(target: string, flags: string): void {
  const fd = fs.openSync(target, flags);
  try {
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

function isIgnorableFsyncError(error: unknown): boolean {
  // Directory fsync is unsupported on some filesystems
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  return code === 'EPERM' || code === 'EINVAL' || code === 'EISDIR' || code === 'EBADF';
}

export function atomicWriteFileSync(filePath: string, content: string, options: AtomicWriteOptions = {}): void {
  const dir = path.dirname(filePath);
  const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmp, content, { mode: 0o600 });
    fsyncPath(tmp, 'r+');
    fs.chmodSync(tmp, options.mode ?? 0o644);
    fs.renameSync(tmp, filePath);
  } catch (error) {
    try {
      fs.rmSync(tmp, { force: true });
    } catch (cleanupError) {
      throw new IOError(filePath, `Failed to write (temp file ${tmp} left behind)`, {
        cause: new AggregateError([error, cleanupError]),
      });
    }
    throw new IOError(filePath, `Failed to write: ${describeError(error)}`, { cause: error });
  }

  try {
    fsyncPath(dir, 'r');
  } catch (error) {
    if (!isIgnorableFsyncError(error)) {
      throw new IOError(dir, `Failed to sync directory: ${describeError(error)}`, { cause: error });
    }
  }
}

export function atomicWriteJsonSync(filePath: string, data: unknown, options: AtomicWriteOptions = {}): void {
  atomicWriteFileSync(filePath, JSON.stringify(data, null, 2) + '\n', options);
}
