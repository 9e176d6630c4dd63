/**
 * Settings - Tool-level preferences, separate from profiles
 *
 * Settings never influence what gets built; they only change how kiln
 * behaves (log verbosity, strictness, naming).
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../services/Logger.js';

export interface Settings {
  logLevel: LogLevel;
  /** Treat a stale or missing lock as an error on `run` */
  strict: boolean;
  defaultProfile: string;
  /** Image tags are `<imagePrefix>-<profile>:latest` */
  imagePrefix: string;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  logLevel: 'info',
  strict: false,
  defaultProfile: 'default',
  imagePrefix: 'kiln',
};

export const SETTING_KEYS: readonly (keyof Settings)[] = ['logLevel', 'strict', 'defaultProfile', 'imagePrefix'];

/**
 * A settings file may set any subset of keys.
 */
export const SettingsFileSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    strict: z.boolean(),
    defaultProfile: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be a valid profile name'),
    imagePrefix: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'must be a lowercase image name'),
  })
  .partial()
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export function isSettingKey(key: string): key is keyof Settings {
  return SETTING_KEYS.some((k) => k === key);
}

export function imageTagFor(settings: Pick<Settings, 'imagePrefix'>, profileName: string): string {
  return `${settings.imagePrefix}-${profileName.toLowerCase()}:latest`;
}
