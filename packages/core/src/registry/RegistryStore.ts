/**
 * RegistryStore - Per-project container records
 *
 * Each project keeps a `.kiln/containers.json` next to its sources. A record
 * holds a frozen copy of the profile the container was created from; that
 * copy, not the live profile, drives every later `run`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { profileFromDocument } from '../config/ProfileStore.js';
import { toProfileDocument } from '../config/schema.js';
import type { Profile } from '../config/types.js';
import type { Digest } from '../digest/canonical.js';
import { IOError, describeError } from '../errors.js';
import { atomicWriteJsonSync } from '../fs/atomicWrite.js';
import { DEFAULT_LOGICAL_NAME } from './identity.js';

export const PROJECT_STATE_DIR = '.kiln';
export const REGISTRY_FILE = 'containers.json';
export const REGISTRY_VERSION = 1;

export interface ContainerRecord {
  logicalName: string;
  /** Engine-level container name */
  identity: string;
  profileName: string;
  createdAt: string;
  imageTag: string;
  /** Digest of the profile at creation time */
  digest: Digest;
  frozenConfig: Profile;
}

export interface ProjectRegistry {
  version: typeof REGISTRY_VERSION;
  defaultContainer: string;
  containers: Record<string, ContainerRecord>;
}

export interface RegistryStore {
  /** Directory the registry belongs to */
  readonly projectDir: string;
  load(): ProjectRegistry;
  save(registry: ProjectRegistry): void;
}

export function createEmptyRegistry(): ProjectRegistry {
  return { version: REGISTRY_VERSION, defaultContainer: DEFAULT_LOGICAL_NAME, containers: {} };
}

export function registryFilePath(projectDir: string): string {
  return path.join(projectDir, PROJECT_STATE_DIR, REGISTRY_FILE);
}

/**
 * Walk upward from `startDir` to the nearest directory holding a
 * container registry.
 */
export function findProjectRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(registryFilePath(current))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

const RecordDocumentSchema = z.object({
  logicalName: z.string().min(1),
  identity: z.string().min(1),
  profileName: z.string().min(1),
  createdAt: z.string(),
  imageTag: z.string().min(1),
  digest: z.string().regex(/^[0-9a-f]{64}$/),
  frozenConfig: z.unknown(),
});

const RegistryDocumentSchema = z.object({
  version: z.literal(REGISTRY_VERSION),
  defaultContainer: z.string().min(1),
  containers: z.record(RecordDocumentSchema),
});

/**
 * Registry stored as JSON. Frozen configs are written in profile file shape
 * and validated like a profile file when read back.
 */
export class FileRegistryStore implements RegistryStore {
  readonly filePath: string;

  constructor(readonly projectDir: string) {
    this.filePath = registryFilePath(projectDir);
  }

  load(): ProjectRegistry {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return createEmptyRegistry();
      }
      throw new IOError(this.filePath, `Failed to read container registry: ${describeError(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IOError(this.filePath, 'Container registry is not valid JSON', { cause: error });
    }

    const result = RegistryDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new IOError(this.filePath, 'Container registry is malformed', { cause: result.error });
    }

    const containers: Record<string, ContainerRecord> = {};
    for (const [name, record] of Object.entries(result.data.containers)) {
      containers[name] = {
        logicalName: record.logicalName,
        identity: record.identity,
        profileName: record.profileName,
        createdAt: record.createdAt,
        imageTag: record.imageTag,
        digest: record.digest,
        frozenConfig: profileFromDocument(record.frozenConfig, `${this.filePath} (container '${name}')`),
      };
    }

    return { version: REGISTRY_VERSION, defaultContainer: result.data.defaultContainer, containers };
  }

  save(registry: ProjectRegistry): void {
    const containers: Record<string, unknown> = {};
    for (const name of Object.keys(registry.containers).sort()) {
      const record = registry.containers[name];
      containers[name] = { ...record, frozenConfig: toProfileDocument(record.frozenConfig) };
    }
    atomicWriteJsonSync(this.filePath, {
      version: registry.version,
      defaultContainer: registry.defaultContainer,
      containers,
    });
  }
}

/**
 * In-memory registry for tests. Stores deep copies so callers cannot
 * mutate saved state.
 */
export class MemoryRegistryStore implements RegistryStore {
  private registry: ProjectRegistry;

  constructor(readonly projectDir: string, initial: ProjectRegistry = createEmptyRegistry()) {
    this.registry = structuredClone(initial);
  }

  load(): ProjectRegistry {
    return structuredClone(this.registry);
  }

  save(registry: ProjectRegistry): void {
    this.registry = structuredClone(registry);
  }
}
