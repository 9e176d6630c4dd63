/**
 * Container identity
 *
 * The engine-level name of a project's container is derived from the
 * project's absolute path and the container's logical name, so two
 * projects (or two containers of one project) never share a name and the
 * same pair always maps to the same name.
 */

import { createHash } from 'node:crypto';
import * as path from 'node:path';

export const CONTAINER_NAME_PREFIX = 'kiln';

export const DEFAULT_LOGICAL_NAME = 'main';

const LOGICAL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function isValidLogicalName(name: string): boolean {
  return LOGICAL_NAME_PATTERN.test(name);
}

export function containerIdentity(projectPath: string, logicalName: string): string {
  const hash = createHash('sha256')
    .update(path.resolve(projectPath))
    .update('\0')
    .update(logicalName)
    .digest('hex');
  return `${CONTAINER_NAME_PREFIX}-${hash.slice(0, 12)}`;
}
