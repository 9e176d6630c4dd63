/**
 * FileSettingsAdapter - File-based tool settings
 *
 * Settings are merged with the following priority (highest last):
 * 1. DEFAULT_SETTINGS
 * 2. <configDir>/settings.json (user global)
 * 3. <project>/.kiln/settings.json (project-local)
 * 4. KILN_LOG_LEVEL from the environment (logLevel only)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ConfigError,
  DEFAULT_SETTINGS,
  PROJECT_STATE_DIR,
  SETTING_KEYS,
  SettingsFileSchema,
  atomicWriteJsonSync,
  formatIssues,
  isLogLevel,
  isSettingKey,
  type Environment,
  type Settings,
  type SettingsFile,
} from '@kiln/core';

export type SettingsScope = 'user' | 'project';

export const SETTINGS_FILE_NAME = 'settings.json';

function readSettingsFile(filePath: string): SettingsFile {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError('settings file is not valid JSON', filePath, { cause: error });
  }

  const result = SettingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), filePath);
  }
  return result.data;
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`expected true or false, got '${value}'`, key);
  }
}

export class FileSettingsAdapter {
  private settings: Settings;
  readonly userPath: string;
  readonly projectPath: string | null;

  /**
   * @param userSettingsFile - Global settings file
   * @param projectDir - Project directory for project-local settings
   * @param env - Environment consulted for overrides
   */
  constructor(
    userSettingsFile: string,
    projectDir: string | null = null,
    private readonly env: Environment = process.env
  ) {
    this.userPath = userSettingsFile;
    this.projectPath = projectDir ? path.join(projectDir, PROJECT_STATE_DIR, SETTINGS_FILE_NAME) : null;
    this.settings = this.load();
  }

  private load(): Settings {
    const merged: Settings = {
      ...DEFAULT_SETTINGS,
      ...readSettingsFile(this.userPath),
      ...(this.projectPath ? readSettingsFile(this.projectPath) : {}),
    };

    const envLevel = this.env.KILN_LOG_LEVEL;
    if (envLevel !== undefined && envLevel !== '') {
      if (!isLogLevel(envLevel)) {
        throw new ConfigError(`must be one of debug, info, warn, error (got '${envLevel}')`, 'KILN_LOG_LEVEL');
      }
      merged.logLevel = envLevel;
    }
    return merged;
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.settings[key];
  }

  getAll(): Settings {
    return { ...this.settings };
  }

  /**
   * Set one key in a settings file and reload.
   *
   * @param value - Text as typed on the command line
   * @throws ConfigError for unknown keys or invalid values
   */
  update(key: string, value: string, scope: SettingsScope = 'user'): void {
    if (!isSettingKey(key)) {
      throw new ConfigError(`unknown setting '${key}' (available: ${SETTING_KEYS.join(', ')})`);
    }

    const filePath = scope === 'project' ? this.projectPath : this.userPath;
    if (!filePath) {
      throw new ConfigError('no project directory for project settings');
    }

    const candidate: Record<string, unknown> = {
      ...readSettingsFile(filePath),
      [key]: key === 'strict' ? parseBoolean(key, value) : value,
    };
    const result = SettingsFileSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigError(formatIssues(result.error), filePath);
    }

    atomicWriteJsonSync(filePath, result.data);
    this.settings = this.load();
  }

  refresh(): void {
    this.settings = this.load();
  }
}
