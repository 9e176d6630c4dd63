/**
 * ContainerService - Project containers and their lifecycle
 *
 * A container is created once from a built profile and keeps a frozen copy
 * of that profile. Later edits to the profile are reported as drift but
 * never applied: the only way to pick them up is an explicit re-init, and
 * `reset` is the only operation that destroys a container.
 */

import type { Profile } from '../config/types.js';
import {
  resolveCommand,
  resolveDefaultCommand,
  type ResolvedCommand,
} from '../commands/CommandResolver.js';
import { digestProfile, shortDigest } from '../digest/canonical.js';
import {
  ConfigError,
  ContainerExistsError,
  ContainerNotFoundError,
  LockStateWarning,
} from '../errors.js';
import { reconcileLock, type LockStore } from '../lock/LockStore.js';
import { expandPathTemplate, pathVariables, type PathVariables } from '../paths/expand.js';
import { DEFAULT_LOGICAL_NAME, containerIdentity, isValidLogicalName } from '../registry/identity.js';
import {
  getIndexEntry,
  removeIndexEntry,
  setIndexEntry,
  type ProjectIndex,
  type ProjectIndexStore,
} from '../registry/ProjectIndex.js';
import type { ContainerRecord, ProjectRegistry, RegistryStore } from '../registry/RegistryStore.js';
import type { CreateContainerSpec, ExecSpec } from '../runtime/ContainerRuntime.js';
import type { RuntimeFactory } from './BuildService.js';
import type { ILogger } from './Logger.js';

export interface ContainerServiceOptions {
  registry: RegistryStore;
  /** Host-wide index kept in step with the registry */
  projectIndex?: ProjectIndexStore;
  lockStoreFor: (profileName: string) => LockStore;
  runtimeFor: RuntimeFactory;
  logger: ILogger;
  /** Variables for volume path templates, usually the caller's environment */
  env: PathVariables;
  /** Whether the caller is attached to a terminal */
  tty: boolean;
  now?: () => Date;
}

export interface InitOptions {
  logicalName?: string;
  /** Replace an existing container of the same name */
  force?: boolean;
}

export type ResetTarget = { logicalName: string } | { all: true };

export interface RunPlan {
  record: ContainerRecord;
  command: ResolvedCommand;
  exec: ExecSpec;
}

export interface PreflightOptions {
  /** Turn lock warnings into errors */
  strict?: boolean;
}

export class ContainerService {
  private readonly logger: ILogger;
  private readonly now: () => Date;

  constructor(private readonly options: ContainerServiceOptions) {
    this.logger = options.logger.child({ component: 'ContainerService' });
    this.now = options.now ?? (() => new Date());
  }

  get projectDir(): string {
    return this.options.registry.projectDir;
  }

  /**
   * Create the project's container for a built profile.
   *
   * @throws ContainerExistsError when the name is taken and force is off
   * @throws LockStateWarning when the profile has no current build
   */
  async init(profileName: string, profile: Profile, options: InitOptions = {}): Promise<ContainerRecord> {
    const logicalName = options.logicalName ?? DEFAULT_LOGICAL_NAME;
    if (!isValidLogicalName(logicalName)) {
      throw new ConfigError(`invalid container name '${logicalName}'`);
    }

    const registry = this.options.registry.load();
    const existing = Object.hasOwn(registry.containers, logicalName) ? registry.containers[logicalName] : undefined;
    if (existing && !options.force) {
      throw new ContainerExistsError(logicalName);
    }

    const digest = digestProfile(profile);
    const lock = this.options.lockStoreFor(profileName).load();
    const state = reconcileLock(lock, digest);
    if (state !== 'current' || !lock) {
      throw new LockStateWarning(state === 'current' ? 'no-lock' : state, profileName);
    }

    const identity = containerIdentity(this.projectDir, logicalName);
    // Expands path templates, so a bad profile fails before anything is removed
    const spec = this.createSpec(identity, lock.imageTag, profileName, logicalName, profile);

    if (existing) {
      this.logger.info({ logicalName, identity: existing.identity }, 'Removing container before re-init');
      await this.options.runtimeFor(existing.frozenConfig.runtime.engine).remove(existing.identity);
    }

    const runtime = this.options.runtimeFor(profile.runtime.engine);
    // A container left behind without a record carries the same name
    await runtime.remove(identity);

    try {
      await runtime.create(spec);
      await runtime.start(identity);
    } catch (error) {
      if (existing) {
        // The old container is gone; its record must not outlive it
        delete registry.containers[logicalName];
        this.options.registry.save(registry);
        this.updateIndex((index) => removeIndexEntry(index, this.projectDir, logicalName));
        this.logger.warn({ logicalName, identity }, 'Re-init failed, dropped record of removed container');
      }
      throw error;
    }

    const record: ContainerRecord = {
      logicalName,
      identity,
      profileName,
      createdAt: this.now().toISOString(),
      imageTag: lock.imageTag,
      digest,
      frozenConfig: structuredClone(profile),
    };
    registry.containers[logicalName] = record;
    this.options.registry.save(registry);
    this.updateIndex((index) =>
      setIndexEntry(index, this.projectDir, logicalName, {
        identity,
        profileName,
        imageTag: record.imageTag,
        digest,
        createdAt: record.createdAt,
      })
    );

    this.logger.info({ logicalName, identity, profileName, digest: shortDigest(digest) }, 'Container created');
    return record;
  }

  /**
   * Build the engine-level create spec, expanding path placeholders
   * against the project directory.
   */
  createSpec(
    identity: string,
    imageTag: string,
    profileName: string,
    logicalName: string,
    profile: Profile
  ): CreateContainerSpec {
    const vars = pathVariables(this.options.env, this.projectDir);
    const { runtime } = profile;
    return {
      name: identity,
      image: imageTag,
      projectDir: this.projectDir,
      volumes: runtime.volumes.map((volume) => ({
        host: expandPathTemplate(volume.host, vars),
        container: expandPathTemplate(volume.container, vars),
        readonly: volume.readonly,
      })),
      tmpfs: runtime.tmpfs.map((mount) => ({
        ...mount,
        path: expandPathTemplate(mount.path, vars, 'runtime.tmpfs'),
      })),
      environment: { ...profile.environment },
      enableGpu: runtime.enableGpu,
      gpuDriver: runtime.gpuDriver,
      extraArgs: [...runtime.extraArgs],
      labels: {
        'kiln.container': logicalName,
        'kiln.profile': profileName,
        'kiln.project': this.projectDir,
      },
    };
  }

  /**
   * Warning text when the live profile no longer matches the frozen config
   * the container was created from.
   */
  checkDrift(record: ContainerRecord, liveProfile: Profile): string | null {
    if (digestProfile(liveProfile) === digestProfile(record.frozenConfig)) {
      return null;
    }
    return (
      `Profile '${record.profileName}' has changed since container '${record.logicalName}' was created; ` +
      `run \`kiln build\` and \`kiln init --force --container ${record.logicalName}\` to apply the changes.`
    );
  }

  /**
   * Warnings to show before running in a container. In strict mode a
   * missing or stale lock is thrown instead.
   */
  preflight(record: ContainerRecord, liveProfile: Profile | null, options: PreflightOptions = {}): string[] {
    if (!liveProfile) {
      return [
        `Profile '${record.profileName}' is no longer available; using the configuration frozen at init.`,
      ];
    }

    const warnings: string[] = [];
    const drift = this.checkDrift(record, liveProfile);
    if (drift) {
      warnings.push(drift);
    }

    const state = reconcileLock(this.options.lockStoreFor(record.profileName).load(), digestProfile(liveProfile));
    if (state !== 'current') {
      const warning = new LockStateWarning(state, record.profileName);
      if (options.strict) {
        throw warning;
      }
      warnings.push(warning.message);
    }
    return warnings;
  }

  list(): ContainerRecord[] {
    const registry = this.options.registry.load();
    return Object.values(registry.containers).sort((a, b) =>
      a.logicalName < b.logicalName ? -1 : a.logicalName > b.logicalName ? 1 : 0
    );
  }

  /**
   * Look up a record, defaulting to the project's default container.
   */
  get(logicalName?: string): ContainerRecord {
    const registry = this.options.registry.load();
    const name = logicalName ?? registry.defaultContainer;
    if (!Object.hasOwn(registry.containers, name)) {
      throw new ContainerNotFoundError(
        `No container '${name}' in ${this.projectDir}`,
        'Run `kiln init` to create one, or `kiln list` to see existing containers.'
      );
    }
    return registry.containers[name];
  }

  /**
   * Remove runtime containers and then their records.
   *
   * @returns logical names removed
   */
  async reset(target: ResetTarget): Promise<string[]> {
    const registry = this.options.registry.load();
    const names = 'all' in target ? Object.keys(registry.containers).sort() : [target.logicalName];

    for (const name of names) {
      if (!Object.hasOwn(registry.containers, name)) {
        throw new ContainerNotFoundError(`No container '${name}' in ${this.projectDir}`);
      }
    }

    for (const name of names) {
      await this.removeOne(registry, name);
    }
    return names;
  }

  private async removeOne(registry: ProjectRegistry, name: string): Promise<void> {
    const record = registry.containers[name];
    await this.options.runtimeFor(record.frozenConfig.runtime.engine).remove(record.identity);
    delete registry.containers[name];
    this.options.registry.save(registry);
    this.updateIndex((index) => removeIndexEntry(index, this.projectDir, name));
    this.logger.info({ logicalName: name, identity: record.identity }, 'Container removed');
  }

  /**
   * Apply a change to the host-wide index. The project registry has
   * already been written, so a failure here is logged and not thrown.
   */
  private updateIndex(change: (index: ProjectIndex) => void): void {
    const store = this.options.projectIndex;
    if (!store) {
      return;
    }
    try {
      const index = store.load();
      change(index);
      store.save(index);
    } catch (error) {
      this.logger.warn({ err: error, projectDir: this.projectDir }, 'Project index not updated');
    }
  }

  /**
   * Resolve a command against the container's frozen command table and
   * make sure the container is running.
   *
   * @param commandName - undefined runs the table's default entry
   * @throws ContainerNotFoundError when the engine no longer has the
   *   container; it is never recreated here
   */
  async prepareRun(
    record: ContainerRecord,
    commandName: string | undefined,
    callerArgs: readonly string[],
    callerCwd: string
  ): Promise<RunPlan> {
    const table = record.frozenConfig.commands;
    const command =
      commandName === undefined
        ? resolveDefaultCommand(table, callerArgs)
        : resolveCommand(commandName, table, callerArgs);

    const runtime = this.options.runtimeFor(record.frozenConfig.runtime.engine);
    if (!(await runtime.exists(record.identity))) {
      throw new ContainerNotFoundError(
        `Container '${record.logicalName}' (${record.identity}) no longer exists in ${runtime.engine}`,
        `Run \`kiln reset --container ${record.logicalName}\` and then \`kiln init\` to recreate it.`
      );
    }
    if (!(await runtime.isRunning(record.identity))) {
      this.logger.info({ identity: record.identity }, 'Starting stopped container');
      await runtime.start(record.identity);
    }

    const interactive = record.frozenConfig.runtime.interactive;
    const exec: ExecSpec = {
      name: record.identity,
      interactive,
      tty: interactive && this.options.tty,
      workdir: command.workingDirPolicy === 'caller' ? callerCwd : this.projectDir,
      argv: [command.executable, ...command.args],
    };
    this.logger.debug({ chain: command.chain, workdir: exec.workdir }, 'Resolved command');
    return { record, command, exec };
  }

  /**
   * Execute a prepared plan with live stdio.
   *
   * @returns the child's exit code
   */
  async run(plan: RunPlan): Promise<number> {
    const { record } = plan;
    this.updateIndex((index) => {
      const entry = getIndexEntry(index, this.projectDir, record.logicalName) ?? {
        identity: record.identity,
        profileName: record.profileName,
        imageTag: record.imageTag,
        digest: record.digest,
        createdAt: record.createdAt,
      };
      setIndexEntry(index, this.projectDir, record.logicalName, { ...entry, lastUsed: this.now().toISOString() });
    });

    const runtime = this.options.runtimeFor(record.frozenConfig.runtime.engine);
    const exitCode = await runtime.exec(plan.exec);
    this.logger.info({ identity: record.identity, argv: plan.exec.argv, exitCode }, 'Command finished');
    return exitCode;
  }
}
