/**
 * LockStore - Persistence for "what was last successfully built"
 *
 * A LockRecord is written only by the build flow, after the engine build
 * succeeded. The lock state (no-lock, current, stale) is never persisted;
 * it is recomputed on demand by comparing the record's digest with the
 * live profile's digest.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import type { Digest } from '../digest/canonical.js';
import { IOError, describeError } from '../errors.js';
import { atomicWriteJsonSync } from '../fs/atomicWrite.js';

export const LOCK_VERSION = 1;

const LockRecordSchema = z.object({
  version: z.literal(LOCK_VERSION),
  digest: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.string(),
  imageTag: z.string().min(1),
  imageId: z.string().min(1),
});

export type LockRecord = z.infer<typeof LockRecordSchema>;

export type LockState = 'no-lock' | 'current' | 'stale';

export interface LockStore {
  load(): LockRecord | null;
  save(record: LockRecord): void;
  remove(): void;
}

export function reconcileLock(record: LockRecord | null, digest: Digest): LockState {
  if (!record) {
    return 'no-lock';
  }
  return record.digest === digest ? 'current' : 'stale';
}

export function describeLockState(state: LockState): string {
  switch (state) {
    case 'no-lock':
      return 'not built yet';
    case 'current':
      return 'up to date';
    case 'stale':
      return 'profile changed since last build';
  }
}

/**
 * Lock record stored as JSON, one file per profile.
 */
export class FileLockStore implements LockStore {
  constructor(readonly filePath: string) {}

  load(): LockRecord | null {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new IOError(this.filePath, `Failed to read lock record: ${describeError(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IOError(this.filePath, 'Lock record is not valid JSON', { cause: error });
    }

    const result = LockRecordSchema.safeParse(raw);
    if (!result.success) {
      throw new IOError(this.filePath, 'Lock record is malformed', { cause: result.error });
    }
    return result.data;
  }

  save(record: LockRecord): void {
    atomicWriteJsonSync(this.filePath, record);
  }

  remove(): void {
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (error) {
      throw new IOError(this.filePath, `Failed to remove lock record: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * In-memory lock store for tests and dry runs.
 */
export class MemoryLockStore implements LockStore {
  private record: LockRecord | null;

  constructor(initial: LockRecord | null = null) {
    this.record = initial ? { ...initial } : null;
  }

  load(): LockRecord | null {
    return this.record ? { ...this.record } : null;
  }

  save(record: LockRecord): void {
    this.record = { ...record };
  }

  remove(): void {
    this.record = null;
  }
}
