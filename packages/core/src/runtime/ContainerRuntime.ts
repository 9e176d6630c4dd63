/**
 * ContainerRuntime - The container engine as seen by kiln
 *
 * CliContainerRuntime drives the podman or docker CLI through a
 * ProcessRunner. Argument lists are built by pure functions so their shape
 * can be checked without an engine.
 */

import type { ContainerEngine, TmpfsMount, VolumeMount } from '../config/types.js';
import { RuntimeProcessError, describeError } from '../errors.js';
import { ENTRYPOINT_PATH } from '../generator/ArtifactGenerator.js';
import type { ILogger } from '../services/Logger.js';
import type { ProcessResult, ProcessRunner, RunOptions } from './ProcessRunner.js';

export interface BuildImageSpec {
  contextDir: string;
  tag: string;
  buildArgs: Record<string, string>;
}

/**
 * Everything needed to create a project container. Paths are already
 * expanded.
 */
export interface CreateContainerSpec {
  name: string;
  image: string;
  /** Mounted at the same path inside the container */
  projectDir: string;
  volumes: VolumeMount[];
  tmpfs: TmpfsMount[];
  environment: Record<string, string>;
  enableGpu: boolean;
  gpuDriver: string;
  extraArgs: string[];
  labels: Record<string, string>;
}

export interface ExecSpec {
  name: string;
  /** Keep stdin open */
  interactive: boolean;
  /** Allocate a pseudo-terminal */
  tty: boolean;
  workdir: string;
  argv: string[];
}

export interface ContainerRuntime {
  readonly engine: ContainerEngine;
  build(spec: BuildImageSpec): Promise<void>;
  /** Image id for `tag`, or null when the image does not exist */
  imageId(tag: string): Promise<string | null>;
  create(spec: CreateContainerSpec): Promise<void>;
  start(name: string): Promise<void>;
  exists(name: string): Promise<boolean>;
  isRunning(name: string): Promise<boolean>;
  /** Force-remove; a missing container is not an error */
  remove(name: string): Promise<void>;
  /** Run with live stdio and return the child's exit code */
  exec(spec: ExecSpec): Promise<number>;
}

function sortedEntries(record: Record<string, string>): Array<[string, string]> {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function buildBuildArgs(spec: BuildImageSpec): string[] {
  const args = ['build', '-t', spec.tag];
  for (const [key, value] of sortedEntries(spec.buildArgs)) {
    args.push('--build-arg', `${key}=${value}`);
  }
  args.push(spec.contextDir);
  return args;
}

export function buildCreateArgs(engine: ContainerEngine, spec: CreateContainerSpec): string[] {
  const args = ['create', '--name', spec.name];

  if (engine === 'podman') {
    args.push('--userns=keep-id');
  }

  for (const [key, value] of sortedEntries(spec.labels)) {
    args.push('--label', `${key}=${value}`);
  }

  args.push('-v', `${spec.projectDir}:${spec.projectDir}`);
  for (const volume of spec.volumes) {
    args.push('-v', `${volume.host}:${volume.container}${volume.readonly ? ':ro' : ''}`);
  }

  for (const mount of spec.tmpfs) {
    args.push('--tmpfs', `${mount.path}:size=${mount.size}${mount.readonly ? ',ro' : ''}`);
  }

  if (spec.enableGpu) {
    if (engine === 'docker') {
      args.push('--gpus', spec.gpuDriver);
    } else {
      args.push('--device', `nvidia.com/gpu=${spec.gpuDriver}`);
    }
  }

  for (const [key, value] of sortedEntries(spec.environment)) {
    args.push('-e', `${key}=${value}`);
  }

  args.push(...spec.extraArgs);
  args.push(spec.image, 'sleep', 'infinity');
  return args;
}

export function buildExecArgs(spec: ExecSpec): string[] {
  const args = ['exec'];
  if (spec.interactive) {
    args.push('-i');
  }
  if (spec.tty) {
    args.push('-t');
  }
  args.push(spec.name, ENTRYPOINT_PATH, '--workdir', spec.workdir, '--', ...spec.argv);
  return args;
}

/**
 * ContainerRuntime backed by the engine's command-line client.
 */
export class CliContainerRuntime implements ContainerRuntime {
  constructor(
    readonly engine: ContainerEngine,
    private readonly runner: ProcessRunner,
    private readonly logger?: ILogger
  ) {}

  private async invoke(args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    try {
      return await this.runner.run(this.engine, args, options);
    } catch (error) {
      throw new RuntimeProcessError(this.engine, 127, `could not start ${this.engine}: ${describeError(error)}`);
    }
  }

  private async invokeChecked(args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    const result = await this.invoke(args, options);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      this.logger?.error({ args, exitCode: result.exitCode, stderr: detail }, 'Engine command failed');
      throw new RuntimeProcessError(`${this.engine} ${args[0]}`, result.exitCode, detail || undefined);
    }
    return result;
  }

  async build(spec: BuildImageSpec): Promise<void> {
    await this.invokeChecked(buildBuildArgs(spec), { stdio: 'inherit' });
  }

  async imageId(tag: string): Promise<string | null> {
    const result = await this.invoke(['image', 'inspect', '--format', '{{.Id}}', tag]);
    if (result.exitCode !== 0) {
      return null;
    }
    const id = result.stdout.trim();
    return id === '' ? null : id;
  }

  async create(spec: CreateContainerSpec): Promise<void> {
    await this.invokeChecked(buildCreateArgs(this.engine, spec));
  }

  async start(name: string): Promise<void> {
    await this.invokeChecked(['start', name]);
  }

  async exists(name: string): Promise<boolean> {
    const result = await this.invoke(['container', 'inspect', name]);
    return result.exitCode === 0;
  }

  async isRunning(name: string): Promise<boolean> {
    const result = await this.invoke(['container', 'inspect', '--format', '{{.State.Running}}', name]);
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async remove(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      return;
    }
    await this.invokeChecked(['rm', '-f', name]);
  }

  async exec(spec: ExecSpec): Promise<number> {
    const result = await this.invoke(buildExecArgs(spec), { stdio: 'inherit' });
    return result.exitCode;
  }
}
