/**
 * KilnPaths - Where kiln keeps its files on the host
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { PROJECT_INDEX_FILE } from '../registry/ProjectIndex.js';

export interface KilnPaths {
  configDir: string;
  profilesDir: string;
  settingsFile: string;
  dataDir: string;
  buildDir: string;
  locksDir: string;
  logDir: string;
  /** Host-wide project index */
  projectsFile: string;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

export function resolveKilnPaths(env: Environment = process.env, homeDir: string = os.homedir()): KilnPaths {
  const xdgConfig = nonEmpty(env.XDG_CONFIG_HOME);
  const xdgData = nonEmpty(env.XDG_DATA_HOME);

  const configDir =
    nonEmpty(env.KILN_CONFIG_DIR) ??
    (xdgConfig ? path.join(xdgConfig, 'kiln') : path.join(homeDir, '.config', 'kiln'));
  const dataDir =
    nonEmpty(env.KILN_DATA_DIR) ??
    (xdgData ? path.join(xdgData, 'kiln') : path.join(homeDir, '.local', 'share', 'kiln'));

  return {
    configDir,
    profilesDir: path.join(configDir, 'profiles'),
    settingsFile: path.join(configDir, 'settings.json'),
    dataDir,
    buildDir: path.join(dataDir, 'build'),
    locksDir: path.join(dataDir, 'locks'),
    logDir: path.join(dataDir, 'logs'),
    projectsFile: path.join(dataDir, PROJECT_INDEX_FILE),
  };
}

export function buildContextDir(paths: KilnPaths, profileName: string): string {
  return path.join(paths.buildDir, profileName);
}

export function lockFilePath(paths: KilnPaths, profileName: string): string {
  return path.join(paths.locksDir, `${profileName}.lock.json`);
}
