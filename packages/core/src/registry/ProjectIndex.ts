/**
 * ProjectIndex - Host-wide index of projects with containers
 *
 * The per-project registry stays authoritative; this index mirrors it under
 * the data directory so every project on the host can be listed from
 * anywhere.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { Digest } from '../digest/canonical.js';
import { IOError, describeError } from '../errors.js';
import { atomicWriteJsonSync } from '../fs/atomicWrite.js';

export const PROJECT_INDEX_FILE = 'projects.json';
export const PROJECT_INDEX_VERSION = 1;

export interface ProjectIndexEntry {
  identity: string;
  profileName: string;
  imageTag: string;
  digest: Digest;
  createdAt: string;
  /** Last time a command ran in the container */
  lastUsed?: string;
}

export interface ProjectIndex {
  version: typeof PROJECT_INDEX_VERSION;
  /** Project directory, then logical container name */
  projects: Record<string, Record<string, ProjectIndexEntry>>;
}

export interface IndexedContainer extends ProjectIndexEntry {
  projectDir: string;
  logicalName: string;
}

export interface ProjectIndexStore {
  load(): ProjectIndex;
  save(index: ProjectIndex): void;
}

export function createEmptyProjectIndex(): ProjectIndex {
  return { version: PROJECT_INDEX_VERSION, projects: {} };
}

export function getIndexEntry(
  index: ProjectIndex,
  projectDir: string,
  logicalName: string
): ProjectIndexEntry | undefined {
  if (!Object.hasOwn(index.projects, projectDir) || !Object.hasOwn(index.projects[projectDir], logicalName)) {
    return undefined;
  }
  return index.projects[projectDir][logicalName];
}

export function setIndexEntry(
  index: ProjectIndex,
  projectDir: string,
  logicalName: string,
  entry: ProjectIndexEntry
): void {
  const containers = Object.hasOwn(index.projects, projectDir) ? index.projects[projectDir] : {};
  containers[logicalName] = entry;
  index.projects[projectDir] = containers;
}

/**
 * Drop one container, and its project once it has none left.
 *
 * @returns whether an entry was removed
 */
export function removeIndexEntry(index: ProjectIndex, projectDir: string, logicalName: string): boolean {
  if (!Object.hasOwn(index.projects, projectDir)) {
    return false;
  }
  const containers = index.projects[projectDir];
  if (!Object.hasOwn(containers, logicalName)) {
    return false;
  }
  delete containers[logicalName];
  if (Object.keys(containers).length === 0) {
    delete index.projects[projectDir];
  }
  return true;
}

/**
 * Nearest indexed project at or above `startDir`.
 */
export function findIndexedProject(index: ProjectIndex, startDir: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    if (Object.hasOwn(index.projects, current)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Every indexed container, ordered by project directory and then name.
 */
export function listIndexEntries(index: ProjectIndex): IndexedContainer[] {
  const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
  const result: IndexedContainer[] = [];
  for (const projectDir of Object.keys(index.projects).sort(byName)) {
    const containers = index.projects[projectDir];
    for (const logicalName of Object.keys(containers).sort(byName)) {
      result.push({ projectDir, logicalName, ...containers[logicalName] });
    }
  }
  return result;
}

const EntryDocumentSchema = z.object({
  identity: z.string().min(1),
  profileName: z.string().min(1),
  imageTag: z.string().min(1),
  digest: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.string(),
  lastUsed: z.string().optional(),
});

const IndexDocumentSchema = z.object({
  version: z.literal(PROJECT_INDEX_VERSION),
  projects: z.record(z.record(EntryDocumentSchema)),
});

export class FileProjectIndexStore implements ProjectIndexStore {
  constructor(readonly filePath: string) {}

  load(): ProjectIndex {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return createEmptyProjectIndex();
      }
      throw new IOError(this.filePath, `Failed to read project index: ${describeError(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new IOError(this.filePath, 'Project index is not valid JSON', { cause: error });
    }

    const result = IndexDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new IOError(this.filePath, 'Project index is malformed', { cause: result.error });
    }
    return { version: PROJECT_INDEX_VERSION, projects: result.data.projects };
  }

  save(index: ProjectIndex): void {
    const projects: Record<string, Record<string, ProjectIndexEntry>> = {};
    for (const projectDir of Object.keys(index.projects).sort()) {
      projects[projectDir] = index.projects[projectDir];
    }
    atomicWriteJsonSync(this.filePath, { version: index.version, projects });
  }
}

export class MemoryProjectIndexStore implements ProjectIndexStore {
  private index: ProjectIndex;

  constructor(initial: ProjectIndex = createEmptyProjectIndex()) {
    this.index = structuredClone(initial);
  }

  load(): ProjectIndex {
    return structuredClone(this.index);
  }

  save(index: ProjectIndex): void {
    this.index = structuredClone(index);
  }
}
