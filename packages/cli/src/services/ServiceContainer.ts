/**
 * ServiceContainer - Composition root for the CLI
 *
 * Creates and wires settings, logging, stores and services for one CLI
 * invocation. Tests pass overrides to swap the process runner, logger or
 * clock for in-process fakes.
 */

import * as os from 'node:os';
import {
  BuildService,
  CliContainerRuntime,
  ContainerNotFoundError,
  ContainerService,
  FileLockStore,
  FileProfileStore,
  FileProjectIndexStore,
  FileRegistryStore,
  NodeProcessRunner,
  buildContextDir,
  createLogger,
  findProjectRoot,
  imageTagFor,
  loadTemplates,
  lockFilePath,
  resolveKilnPaths,
  type ContainerEngine,
  type ContainerRuntime,
  type Environment,
  type ILogger,
  type IProfileStore,
  type KilnPaths,
  type LockStore,
  type ProcessRunner,
  type ProjectIndexStore,
  type TemplateSet,
} from '@kiln/core';
import { FileSettingsAdapter } from '../adapters/FileSettingsAdapter.js';

export interface ServiceOverrides {
  runner?: ProcessRunner;
  logger?: ILogger;
  templates?: TemplateSet;
  /** Whether stdin and stdout are a terminal */
  tty?: boolean;
  now?: () => Date;
}

export interface ServiceContainerOptions {
  cwd: string;
  env: Environment;
  overrides?: ServiceOverrides;
}

/**
 * Container for all services of one CLI invocation.
 */
export class ServiceContainer {
  readonly cwd: string;
  readonly env: Environment;
  readonly paths: KilnPaths;
  /** Nearest directory with a container registry, if any */
  readonly projectRoot: string | null;

  readonly settings: FileSettingsAdapter;
  readonly logger: ILogger;
  readonly profiles: IProfileStore;
  readonly runner: ProcessRunner;
  readonly projectIndex: ProjectIndexStore;
  readonly buildService: BuildService;

  private readonly runtimes = new Map<ContainerEngine, ContainerRuntime>();
  private readonly overrides: ServiceOverrides;

  constructor(options: ServiceContainerOptions) {
    this.cwd = options.cwd;
    this.env = options.env;
    this.overrides = options.overrides ?? {};

    // 1. Locate files and read settings (needed for the log level)
    this.paths = resolveKilnPaths(this.env, this.env.HOME ?? os.homedir());
    this.projectRoot = findProjectRoot(this.cwd);
    this.settings = new FileSettingsAdapter(this.paths.settingsFile, this.projectRoot ?? this.cwd, this.env);

    // 2. Logging and process execution
    this.logger = this.overrides.logger ?? createLogger(this.paths.logDir, this.settings.get('logLevel'));
    this.runner = this.overrides.runner ?? new NodeProcessRunner(this.logger.child({ component: 'ProcessRunner' }));

    // 3. Stores and services
    this.profiles = new FileProfileStore(this.paths.profilesDir);
    this.projectIndex = new FileProjectIndexStore(this.paths.projectsFile);
    const imagePrefix = this.settings.get('imagePrefix');
    this.buildService = new BuildService({
      lockStoreFor: (profileName) => this.lockStoreFor(profileName),
      runtimeFor: (engine) => this.runtimeFor(engine),
      buildDirFor: (profileName) => buildContextDir(this.paths, profileName),
      imageTagFor: (profileName) => imageTagFor({ imagePrefix }, profileName),
      templates: this.overrides.templates ?? loadTemplates(),
      logger: this.logger,
      now: this.overrides.now,
    });
  }

  lockStoreFor(profileName: string): LockStore {
    return new FileLockStore(lockFilePath(this.paths, profileName));
  }

  runtimeFor(engine: ContainerEngine): ContainerRuntime {
    let runtime = this.runtimes.get(engine);
    if (!runtime) {
      runtime = new CliContainerRuntime(engine, this.runner, this.logger.child({ component: 'ContainerRuntime' }));
      this.runtimes.set(engine, runtime);
    }
    return runtime;
  }

  /**
   * Container service for a project directory.
   */
  containerService(projectDir: string): ContainerService {
    return new ContainerService({
      registry: new FileRegistryStore(projectDir),
      projectIndex: this.projectIndex,
      lockStoreFor: (profileName) => this.lockStoreFor(profileName),
      runtimeFor: (engine) => this.runtimeFor(engine),
      logger: this.logger,
      env: this.env,
      tty: this.overrides.tty ?? (process.stdin.isTTY === true && process.stdout.isTTY === true),
      now: this.overrides.now,
    });
  }

  /**
   * Container service for the project the caller is in.
   *
   * @throws ContainerNotFoundError outside a kiln project
   */
  requireProject(): ContainerService {
    if (!this.projectRoot) {
      throw new ContainerNotFoundError(
        `No kiln project found at or above ${this.cwd}`,
        'Run `kiln init` in the project directory first.'
      );
    }
    return this.containerService(this.projectRoot);
  }
}
