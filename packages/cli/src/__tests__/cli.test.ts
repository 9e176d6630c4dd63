/**
 * CLI command tests
 *
 * Drives the real command tree in-process against temporary host
 * directories, with the engine client replaced by a scripted runner.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { containerIdentity, createDefaultProfile, digestProfile, shortDigest } from '@kiln/core';
import { createCliEnv, type CliEnv } from './fixtures/cliEnv.js';

const IMAGE_ID = 'sha256:0123456789abcdef';
const DEFAULT_DIGEST = digestProfile(createDefaultProfile());

describe('kiln CLI', () => {
  let env: CliEnv;

  const lockFile = (): string => path.join(env.dataDir, 'locks', 'default.lock.json');

  const build = async (): Promise<void> => {
    env.runner.respond(['image', 'inspect'], { stdout: `${IMAGE_ID}\n` });
    const result = await env.run(['build']);
    expect(result.exitCode).toBe(0);
  };

  const buildAndInit = async (): Promise<string> => {
    await build();
    env.runner.respond(['container', 'inspect'], { exitCode: 1 });
    const result = await env.run(['init']);
    expect(result.exitCode).toBe(0);
    env.runner.respond(['container', 'inspect'], { exitCode: 0 });
    env.runner.respond(['container', 'inspect', '--format'], { stdout: 'true\n' });
    return containerIdentity(env.projectDir, 'main');
  };

  beforeEach(() => {
    env = createCliEnv();
  });

  afterEach(() => {
    env.cleanup();
  });

  it('prints the version', async () => {
    const result = await env.run(['--version']);

    expect(result).toEqual({ stdout: '0.3.0', stderr: '', exitCode: 0 });
  });

  describe('profiles', () => {
    it('creates and lists the default profile', async () => {
      const result = await env.run(['profiles']);

      expect(result.stdout).toBe(
        ['Profiles', '', '* default', '', `Profiles live in ${path.join(env.configDir, 'profiles')}`].join('\n')
      );
      expect(fs.existsSync(path.join(env.configDir, 'profiles', 'default.toml'))).toBe(true);
    });

    it('lists every profile in name order', async () => {
      env.writeProfile('web', '');
      env.writeProfile('api', '');

      const result = await env.run(['profiles']);

      expect(result.stdout.split('\n').slice(2, 5)).toEqual(['  api', '* default', '  web']);
    });
  });

  describe('check', () => {
    it('reports an unbuilt profile', async () => {
      const result = await env.run(['check']);

      expect(result.stdout).toBe(
        ["Profile 'default'", '  Config: valid', '  Lock: not built yet', '  Image: missing'].join('\n')
      );
      expect(result.stderr).toBe('Warning: Run `kiln build --profile default` to build the image.');
      expect(result.exitCode).toBe(0);
    });

    it('shows lock details after a build', async () => {
      await build();

      const result = await env.run(['check', '--verbose']);

      expect(result.stdout).toBe(
        [
          "Profile 'default'",
          '  Config: valid',
          '  Lock: up to date',
          `  Digest: ${DEFAULT_DIGEST}`,
          `  Locked digest: ${DEFAULT_DIGEST}`,
          '  Built: 2026-06-01T09:00:00.000Z',
          `  Image id: ${IMAGE_ID}`,
          '  Image: present',
        ].join('\n')
      );
      expect(result.stderr).toBe('');
    });

    it('fails on an invalid profile', async () => {
      env.writeProfile('broken', '[runtime]\nengine = "lxc"\n');

      const result = await env.run(['check', '--profile', 'broken']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr.startsWith(`Error: ${path.join(env.configDir, 'profiles', 'broken.toml')}: `)).toBe(true);
    });

    it('fails on an unknown profile', async () => {
      const result = await env.run(['check', '--profile', 'nope']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        [
          `Error: Profile 'nope' not found at ${path.join(env.configDir, 'profiles', 'nope.toml')}`,
          'Run `kiln profiles` to list available profiles.',
        ].join('\n')
      );
    });
  });

  describe('build', () => {
    it('builds the image and records the lock', async () => {
      env.runner.respond(['image', 'inspect'], { stdout: `${IMAGE_ID}\n` });

      const result = await env.run(['build']);

      expect(result.stdout).toBe(
        [
          "Building image for profile 'default'...",
          `✓ Built kiln-default:latest (${shortDigest(DEFAULT_DIGEST)})`,
        ].join('\n')
      );
      const buildArgs = env.runner.argsOf('build')[0];
      expect(buildArgs.slice(0, 3)).toEqual(['build', '-t', 'kiln-default:latest']);
      expect(buildArgs[buildArgs.length - 1]).toBe(path.join(env.dataDir, 'build', 'default'));
      expect(fs.existsSync(path.join(env.dataDir, 'build', 'default', 'Dockerfile'))).toBe(true);
      expect(JSON.parse(fs.readFileSync(lockFile(), 'utf-8'))).toEqual({
        version: 1,
        digest: DEFAULT_DIGEST,
        createdAt: '2026-06-01T09:00:00.000Z',
        imageTag: 'kiln-default:latest',
        imageId: IMAGE_ID,
      });
    });

    it('skips an up-to-date image', async () => {
      await build();

      const result = await env.run(['build']);

      expect(result.stdout.split('\n').slice(1)).toEqual([
        `✓ Image kiln-default:latest is up to date (${shortDigest(DEFAULT_DIGEST)})`,
        'Use --force to rebuild.',
      ]);
      expect(env.runner.argsOf('build')).toHaveLength(1);
    });

    it('leaves the lock alone with --no-lock', async () => {
      env.runner.respond(['image', 'inspect'], { stdout: `${IMAGE_ID}\n` });

      const result = await env.run(['build', '--no-lock']);

      expect(result.stdout.split('\n')[2]).toBe('Lock not updated (--no-lock).');
      expect(fs.existsSync(lockFile())).toBe(false);
    });

    it('propagates the engine exit code on failure', async () => {
      env.runner.respond(['build'], { exitCode: 2, stderr: 'boom\n' });

      const result = await env.run(['build']);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe('Error: podman build exited with code 2: boom');
      expect(fs.existsSync(lockFile())).toBe(false);
    });

    it('uses the configured image prefix', async () => {
      await env.run(['config', 'set', 'imagePrefix', 'dev']);
      env.runner.respond(['image', 'inspect'], { stdout: `${IMAGE_ID}\n` });

      await env.run(['build']);

      expect(env.runner.argsOf('build')[0].slice(0, 3)).toEqual(['build', '-t', 'dev-default:latest']);
    });
  });

  describe('init', () => {
    it('requires a built profile', async () => {
      const result = await env.run(['init']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        [
          "Error: Profile 'default' has not been built yet",
          'Run `kiln build --profile default` to build the image.',
        ].join('\n')
      );
      expect(env.runner.argsOf('create')).toEqual([]);
    });

    it('creates the container and registers it', async () => {
      await build();
      const identity = containerIdentity(env.projectDir, 'main');

      const result = await env.run(['init']);

      expect(result.stdout).toBe(
        [
          `✓ Created container 'main' (${identity}) from profile 'default'`,
          'Run `kiln` to open a shell in it.',
        ].join('\n')
      );
      expect(env.runner.argsOf('create')[0].slice(0, 4)).toEqual(['create', '--name', identity, '--userns=keep-id']);
      expect(env.runner.argsOf('start')).toEqual([['start', identity]]);
      expect(fs.existsSync(path.join(env.projectDir, '.kiln', 'containers.json'))).toBe(true);
    });

    it('refuses to replace a container without --force', async () => {
      await buildAndInit();

      const result = await env.run(['init']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr.split('\n')[0]).toBe("Error: Container 'main' already exists for this project");
    });
  });

  describe('list and reset', () => {
    it('reports an empty project', async () => {
      const result = await env.run(['list']);

      expect(result.stdout).toBe(['No containers in this project.', 'Run `kiln init` to create one.'].join('\n'));
    });

    it('lists registered containers', async () => {
      const identity = await buildAndInit();

      const result = await env.run(['list']);

      expect(result.stdout).toBe(
        [
          'Containers',
          '',
          `main ${identity} profile=default image=kiln-default:latest created=2026-06-01T09:00:00.000Z`,
        ].join('\n')
      );
    });

    it('removes the container and its record', async () => {
      const identity = await buildAndInit();

      const result = await env.run(['reset']);

      expect(result.stdout).toBe("✓ Removed container 'main'");
      expect(env.runner.argsOf('rm')).toEqual([['rm', '-f', identity]]);
      expect((await env.run(['list'])).stdout.split('\n')[0]).toBe('No containers in this project.');
    });

    it('lists containers of every project with --all', async () => {
      const identity = await buildAndInit();
      const otherDir = path.join(env.root, 'other');
      fs.mkdirSync(otherDir);
      env.runner.respond(['container', 'inspect'], { exitCode: 1 });
      expect((await env.run(['init', '--container', 'tests'], otherDir)).exitCode).toBe(0);

      const result = await env.run(['list', '--all'], env.home);

      expect(result.stdout).toBe(
        [
          'Containers on this host',
          '',
          otherDir,
          `  tests ${containerIdentity(otherDir, 'tests')} profile=default image=kiln-default:latest last-used=never`,
          '',
          env.projectDir,
          `  main ${identity} profile=default image=kiln-default:latest last-used=never`,
        ].join('\n')
      );
    });

    it('records the last run and forgets reset containers in the host index', async () => {
      const identity = await buildAndInit();
      expect((await env.run([])).exitCode).toBe(0);

      const listed = await env.run(['list', '--all']);
      expect(listed.stdout.split('\n')[3]).toBe(
        `  main ${identity} profile=default image=kiln-default:latest last-used=2026-06-01T09:00:00.000Z`
      );

      expect((await env.run(['reset'])).exitCode).toBe(0);

      expect((await env.run(['list', '--all'])).stdout).toBe('No containers on this host.');
      const index: unknown = JSON.parse(fs.readFileSync(path.join(env.dataDir, 'projects.json'), 'utf-8'));
      expect(index).toEqual({ version: 1, projects: {} });
    });

    it('rejects --container together with --all', async () => {
      const result = await env.run(['reset', '--all', '--container', 'main']);

      expect(result).toEqual({
        stdout: '',
        stderr: 'Error: use either --container or --all, not both',
        exitCode: 1,
      });
    });
  });

  describe('run', () => {
    it('fails outside a project', async () => {
      const result = await env.run([]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        [
          `Error: No kiln project found at or above ${env.projectDir}`,
          'Run `kiln init` in the project directory first.',
        ].join('\n')
      );
    });

    it('opens the default shell and returns its exit code', async () => {
      const identity = await buildAndInit();
      env.runner.respond(['exec'], { exitCode: 3 });

      const result = await env.run([]);

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('');
      expect(env.runner.argsOf('exec')).toEqual([
        ['exec', '-i', identity, '/usr/local/bin/kiln-entrypoint', '--workdir', env.projectDir, '--', 'bash'],
      ]);
    });

    it('runs the shell in the caller subdirectory', async () => {
      await buildAndInit();
      const subdir = path.join(env.projectDir, 'src');
      fs.mkdirSync(subdir);

      await env.run([], subdir);

      expect(env.runner.argsOf('exec')[0].slice(4, 6)).toEqual(['--workdir', subdir]);
    });

    it('passes caller options through to the command', async () => {
      await buildAndInit();
      const subdir = path.join(env.projectDir, 'src');
      fs.mkdirSync(subdir);

      await env.run(['node', '--version'], subdir);

      expect(env.runner.argsOf('exec')[0].slice(4)).toEqual(['--workdir', env.projectDir, '--', 'node', '--version']);
    });

    it('reports an unknown command', async () => {
      await buildAndInit();

      const result = await env.run(['run', 'nope']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Unknown command 'nope' (nope)");
      expect(env.runner.argsOf('exec')).toEqual([]);
    });

    it('warns about profile drift and still runs', async () => {
      await buildAndInit();
      env.writeProfile('default', '[environment]\nEDITOR = "vim"\n');

      const result = await env.run([]);

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toBe(
        [
          "Warning: Profile 'default' has changed since container 'main' was created; " +
            'run `kiln build` and `kiln init --force --container main` to apply the changes.',
          "Warning: Profile 'default' has changed since its image was last built",
        ].join('\n')
      );
      expect(env.runner.argsOf('exec')).toHaveLength(1);
    });

    it('refuses a stale lock in strict mode', async () => {
      await buildAndInit();
      env.writeProfile('default', '[environment]\nEDITOR = "vim"\n');

      const result = await env.run(['run', '--strict']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        [
          "Error: Profile 'default' has changed since its image was last built",
          'Run `kiln build --profile default` to build the image.',
        ].join('\n')
      );
      expect(env.runner.argsOf('exec')).toEqual([]);
    });

    it('starts a stopped container before running', async () => {
      const identity = await buildAndInit();
      env.runner.respond(['container', 'inspect', '--format'], { stdout: 'false\n' });

      await env.run([]);

      expect(env.runner.argsOf('start')).toEqual([
        ['start', identity],
        ['start', identity],
      ]);
    });
  });

  describe('config', () => {
    it('sets and shows settings', async () => {
      const set = await env.run(['config', 'set', 'strict', 'yes']);
      const show = await env.run(['config', 'show']);

      expect(set.stdout).toBe('✓ Set strict = yes');
      expect(show.stdout).toBe(
        [
          'Settings',
          '',
          '  logLevel: info',
          '  strict: true',
          '  defaultProfile: default',
          '  imagePrefix: kiln',
          '',
          'Use `kiln config set <key> <value>` to change values.',
        ].join('\n')
      );
    });

    it('rejects unknown settings', async () => {
      const result = await env.run(['config', 'set', 'color', 'red']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: unknown setting 'color' (available: logLevel, strict, defaultProfile, imagePrefix)"
      );
    });
  });
});
