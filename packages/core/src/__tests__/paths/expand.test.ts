/**
 * Tests for path placeholder expansion and host directories
 */

import { describe, it, expect } from 'vitest';
import { expandPathTemplate, pathVariables } from '../../paths/expand.js';
import { buildContextDir, lockFilePath, resolveKilnPaths } from '../../paths/KilnPaths.js';
import { ConfigError } from '../../errors.js';

describe('expandPathTemplate', () => {
  const vars = pathVariables({ HOME: '/home/tester', CACHE: '/var/cache/tester' }, '/srv/project');

  it('expands bare and braced variables', () => {
    expect(expandPathTemplate('$HOME/.ssh', vars)).toBe('/home/tester/.ssh');
    expect(expandPathTemplate('${CACHE}/pip', vars)).toBe('/var/cache/tester/pip');
  });

  it('expands PWD to the project directory', () => {
    expect(expandPathTemplate('$PWD/.venv', vars)).toBe('/srv/project/.venv');
  });

  it('expands a leading tilde only', () => {
    expect(expandPathTemplate('~', vars)).toBe('/home/tester');
    expect(expandPathTemplate('~/.gitconfig', vars)).toBe('/home/tester/.gitconfig');
    expect(expandPathTemplate('~other/file', vars)).toBe('~other/file');
    expect(expandPathTemplate('/data/~/x', vars)).toBe('/data/~/x');
  });

  it('leaves plain paths alone', () => {
    expect(expandPathTemplate('/opt/data', vars)).toBe('/opt/data');
  });

  it('rejects unknown variables', () => {
    expect(() => expandPathTemplate('$MISSING/x', vars)).toThrow(ConfigError);
    expect(() => expandPathTemplate('$MISSING/x', vars)).toThrow(
      "runtime.volumes: unknown variable 'MISSING' in path '$MISSING/x'"
    );
  });
});

describe('resolveKilnPaths', () => {
  it('uses XDG-style defaults under the home directory', () => {
    const paths = resolveKilnPaths({}, '/home/tester');

    expect(paths).toEqual({
      configDir: '/home/tester/.config/kiln',
      profilesDir: '/home/tester/.config/kiln/profiles',
      settingsFile: '/home/tester/.config/kiln/settings.json',
      dataDir: '/home/tester/.local/share/kiln',
      buildDir: '/home/tester/.local/share/kiln/build',
      locksDir: '/home/tester/.local/share/kiln/locks',
      logDir: '/home/tester/.local/share/kiln/logs',
      projectsFile: '/home/tester/.local/share/kiln/projects.json',
    });
    expect(buildContextDir(paths, 'dev')).toBe('/home/tester/.local/share/kiln/build/dev');
    expect(lockFilePath(paths, 'dev')).toBe('/home/tester/.local/share/kiln/locks/dev.lock.json');
  });

  it('follows XDG variables', () => {
    const paths = resolveKilnPaths({ XDG_CONFIG_HOME: '/xdg/config', XDG_DATA_HOME: '/xdg/data' }, '/home/tester');

    expect(paths.configDir).toBe('/xdg/config/kiln');
    expect(paths.dataDir).toBe('/xdg/data/kiln');
  });

  it('lets explicit directories win', () => {
    const paths = resolveKilnPaths(
      { KILN_CONFIG_DIR: '/etc/kiln', KILN_DATA_DIR: '/var/lib/kiln', XDG_CONFIG_HOME: '/xdg/config' },
      '/home/tester'
    );

    expect(paths.profilesDir).toBe('/etc/kiln/profiles');
    expect(paths.locksDir).toBe('/var/lib/kiln/locks');
  });
});
