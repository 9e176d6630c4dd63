/**
 * ProfileStore - Loading, validating and saving profiles
 *
 * Profiles are TOML files named `<profile>.toml` in the profiles directory.
 * They are read fresh on every invocation and never mutated by build or run.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseToml, stringify as stringifyToml, TomlError } from 'smol-toml';
import { validateCommandTable } from '../commands/CommandResolver.js';
import { ConfigError, IOError, ProfileNotFoundError, describeError } from '../errors.js';
import { atomicWriteFileSync } from '../fs/atomicWrite.js';
import { createDefaultProfile } from './defaults.js';
import { ProfileDocumentSchema, formatIssues, fromProfileDocument, toProfileDocument } from './schema.js';
import type { Profile } from './types.js';

const PROFILE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Validate an already-parsed document (TOML table or JSON snapshot).
 */
export function profileFromDocument(raw: unknown, source: string): Profile {
  const result = ProfileDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), source);
  }
  const profile = fromProfileDocument(result.data);
  validateCommandTable(profile.commands, source);
  return profile;
}

/**
 * Parse and validate profile TOML.
 *
 * @param source - Where the text came from, used in error messages
 * @throws ConfigError on TOML syntax errors, schema violations or an
 *   unresolvable default command
 */
export function parseProfile(text: string, source = 'profile'): Profile {
  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigError(`invalid TOML at line ${error.line}, column ${error.column}: ${error.message}`, source, {
        cause: error,
      });
    }
    throw new ConfigError(`invalid TOML: ${describeError(error)}`, source, { cause: error });
  }
  return profileFromDocument(raw, source);
}

export function serializeProfile(profile: Profile): string {
  return stringifyToml(toProfileDocument(profile)) + '\n';
}

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME_PATTERN.test(name);
}

export interface IProfileStore {
  load(name: string): Profile;
  exists(name: string): boolean;
  list(): string[];
  save(name: string, profile: Profile): void;
  /** Write the built-in default profile if no `default` profile exists */
  ensureDefault(): void;
  /** File the profile is read from, for messages */
  pathFor(name: string): string;
}

export const DEFAULT_PROFILE_NAME = 'default';

export class FileProfileStore implements IProfileStore {
  constructor(private readonly profilesDir: string) {}

  pathFor(name: string): string {
    if (!isValidProfileName(name)) {
      throw new ConfigError(`invalid profile name '${name}'`);
    }
    return path.join(this.profilesDir, `${name}.toml`);
  }

  exists(name: string): boolean {
    return fs.existsSync(this.pathFor(name));
  }

  load(name: string): Profile {
    const profilePath = this.pathFor(name);
    let text: string;
    try {
      text = fs.readFileSync(profilePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ProfileNotFoundError(name, profilePath);
      }
      throw new IOError(profilePath, `Failed to read profile: ${describeError(error)}`, { cause: error });
    }
    return parseProfile(text, profilePath);
  }

  list(): string[] {
    if (!fs.existsSync(this.profilesDir)) {
      return [];
    }
    return fs
      .readdirSync(this.profilesDir)
      .filter((file) => file.endsWith('.toml'))
      .map((file) => file.slice(0, -'.toml'.length))
      .filter(isValidProfileName)
      .sort();
  }

  save(name: string, profile: Profile): void {
    atomicWriteFileSync(this.pathFor(name), serializeProfile(profile));
  }

  ensureDefault(): void {
    if (!this.exists(DEFAULT_PROFILE_NAME)) {
      this.save(DEFAULT_PROFILE_NAME, createDefaultProfile());
    }
  }
}
