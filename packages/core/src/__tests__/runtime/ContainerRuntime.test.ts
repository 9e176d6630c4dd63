/**
 * Tests for engine argument construction and the CLI-backed runtime
 */

import { describe, it, expect } from 'vitest';
import {
  CliContainerRuntime,
  buildBuildArgs,
  buildCreateArgs,
  buildExecArgs,
  type CreateContainerSpec,
} from '../../runtime/ContainerRuntime.js';
import { signalExitCode } from '../../runtime/ProcessRunner.js';
import { RuntimeProcessError } from '../../errors.js';
import { MockProcessRunner } from '../fixtures/mockRuntime.js';

function createSpec(overrides: Partial<CreateContainerSpec> = {}): CreateContainerSpec {
  return {
    name: 'kiln-632950e83105',
    image: 'kiln-default:latest',
    projectDir: '/home/user/app',
    volumes: [{ host: '/home/user/.ssh', container: '/home/code/.ssh', readonly: true }],
    tmpfs: [],
    environment: { TERM: 'xterm-256color' },
    enableGpu: false,
    gpuDriver: 'all',
    extraArgs: [],
    labels: { 'kiln.container': 'main' },
    ...overrides,
  };
}

describe('buildBuildArgs', () => {
  it('passes build args sorted by name', () => {
    expect(
      buildBuildArgs({ contextDir: '/data/build/dev', tag: 'kiln-dev:latest', buildArgs: { USER_UID: '1000', USER_GID: '1001' } })
    ).toEqual([
      'build',
      '-t',
      'kiln-dev:latest',
      '--build-arg',
      'USER_GID=1001',
      '--build-arg',
      'USER_UID=1000',
      '/data/build/dev',
    ]);
  });
});

describe('buildCreateArgs', () => {
  it('mounts the project at its own path and keeps the container alive', () => {
    expect(buildCreateArgs('docker', createSpec())).toEqual([
      'create',
      '--name',
      'kiln-632950e83105',
      '--label',
      'kiln.container=main',
      '-v',
      '/home/user/app:/home/user/app',
      '-v',
      '/home/user/.ssh:/home/code/.ssh:ro',
      '-e',
      'TERM=xterm-256color',
      'kiln-default:latest',
      'sleep',
      'infinity',
    ]);
  });

  it('maps user ids on podman', () => {
    expect(buildCreateArgs('podman', createSpec()).slice(0, 4)).toEqual([
      'create',
      '--name',
      'kiln-632950e83105',
      '--userns=keep-id',
    ]);
  });

  it('adds tmpfs mounts, GPU access and extra args', () => {
    const spec = createSpec({
      volumes: [],
      environment: {},
      labels: {},
      tmpfs: [{ path: '/tmp/build', size: '256m', readonly: false }],
      enableGpu: true,
      extraArgs: ['--shm-size=1g'],
    });

    expect(buildCreateArgs('docker', spec)).toContain('--gpus');
    expect(buildCreateArgs('docker', spec).slice(3, 11)).toEqual([
      '-v',
      '/home/user/app:/home/user/app',
      '--tmpfs',
      '/tmp/build:size=256m',
      '--gpus',
      'all',
      '--shm-size=1g',
      'kiln-default:latest',
    ]);
    expect(buildCreateArgs('podman', spec)).toContain('nvidia.com/gpu=all');
  });

  it('marks read-only tmpfs mounts', () => {
    const spec = createSpec({ tmpfs: [{ path: '/scratch', size: '1m', readonly: true }] });

    expect(buildCreateArgs('docker', spec)).toContain('/scratch:size=1m,ro');
  });
});

describe('buildExecArgs', () => {
  it('runs argv through the entrypoint in the requested directory', () => {
    expect(
      buildExecArgs({
        name: 'kiln-632950e83105',
        interactive: true,
        tty: true,
        workdir: '/home/user/app/src',
        argv: ['bash', '-l'],
      })
    ).toEqual([
      'exec',
      '-i',
      '-t',
      'kiln-632950e83105',
      '/usr/local/bin/kiln-entrypoint',
      '--workdir',
      '/home/user/app/src',
      '--',
      'bash',
      '-l',
    ]);
  });

  it('omits terminal flags for non-interactive runs', () => {
    expect(
      buildExecArgs({ name: 'c', interactive: false, tty: false, workdir: '/w', argv: ['make'] }).slice(0, 3)
    ).toEqual(['exec', 'c', '/usr/local/bin/kiln-entrypoint']);
  });
});

describe('CliContainerRuntime', () => {
  it('invokes the engine binary with live stdio for builds', async () => {
    const runner = new MockProcessRunner();
    const runtime = new CliContainerRuntime('podman', runner);

    await runtime.build({ contextDir: '/ctx', tag: 'kiln-dev:latest', buildArgs: {} });

    expect(runner.calls).toEqual([
      { command: 'podman', args: ['build', '-t', 'kiln-dev:latest', '/ctx'], options: { stdio: 'inherit' } },
    ]);
  });

  it('turns a failed build into RuntimeProcessError with the exit code', async () => {
    const runner = new MockProcessRunner().respond(['build'], { exitCode: 2, stderr: 'step 3 failed\n' });
    const runtime = new CliContainerRuntime('docker', runner);

    const error = await runtime.build({ contextDir: '/ctx', tag: 't', buildArgs: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RuntimeProcessError);
    expect(error).toMatchObject({ exitCode: 2, message: 'docker build exited with code 2: step 3 failed' });
  });

  it('reads image ids and treats a failed inspect as missing', async () => {
    const runner = new MockProcessRunner()
      .respond(['image', 'inspect'], { exitCode: 0, stdout: 'sha256:abc\n' });
    const runtime = new CliContainerRuntime('docker', runner);

    expect(await runtime.imageId('kiln-dev:latest')).toBe('sha256:abc');

    runner.respond(['image', 'inspect'], { exitCode: 1, stderr: 'no such image' });
    expect(await runtime.imageId('kiln-dev:latest')).toBeNull();
  });

  it('reports running state from inspect output', async () => {
    const runner = new MockProcessRunner().respond(['container', 'inspect', '--format'], { stdout: 'false\n' });
    const runtime = new CliContainerRuntime('podman', runner);

    expect(await runtime.isRunning('c')).toBe(false);
    expect(runner.calls[0].args).toEqual(['container', 'inspect', '--format', '{{.State.Running}}', 'c']);
  });

  it('skips removal of a container that does not exist', async () => {
    const runner = new MockProcessRunner().respond(['container', 'inspect'], { exitCode: 1 });
    const runtime = new CliContainerRuntime('podman', runner);

    await runtime.remove('gone');

    expect(runner.calls.map((call) => call.args[0])).toEqual(['container']);
  });

  it('returns the exec exit code without throwing', async () => {
    const runner = new MockProcessRunner().respond(['exec'], { exitCode: 42 });
    const runtime = new CliContainerRuntime('podman', runner);

    const exitCode = await runtime.exec({ name: 'c', interactive: false, tty: false, workdir: '/w', argv: ['false'] });

    expect(exitCode).toBe(42);
    expect(runner.calls[0].options).toEqual({ stdio: 'inherit' });
  });

  it('reports an engine that cannot be started', async () => {
    const runtime = new CliContainerRuntime('podman', {
      run: () => Promise.reject(new Error('spawn podman ENOENT')),
    });

    await expect(runtime.start('c')).rejects.toMatchObject({
      exitCode: 127,
      message: 'podman exited with code 127: could not start podman: spawn podman ENOENT',
    });
  });
});

describe('signalExitCode', () => {
  it('follows the shell convention', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });
});
