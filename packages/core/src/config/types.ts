/**
 * Profile types - the declarative description of a development container
 */

// ============================================================================
// Sections
// ============================================================================

export type ContainerEngine = 'podman' | 'docker';

export type NodeJsSource = 'nodesource' | 'apt' | 'nvm';

export interface ContainerSettings {
  baseImage: string;
  user: string;
  homeDir: string;
  workDir: string;
}

/**
 * Bind mount. `host` and `container` may contain path placeholders
 * ($PWD, ${HOME}, ~) that are expanded only when the container is created.
 */
export interface VolumeMount {
  host: string;
  container: string;
  readonly: boolean;
}

export interface TmpfsMount {
  path: string;
  size: string;
  readonly: boolean;
}

export interface RuntimeSettings {
  engine: ContainerEngine;
  enableGpu: boolean;
  gpuDriver: string;
  interactive: boolean;
  volumes: VolumeMount[];
  tmpfs: TmpfsMount[];
  extraArgs: string[];
}

export interface NodeJsInstaller {
  enabled: boolean;
  version: string;
  source: NodeJsSource;
}

export interface CustomDependency {
  name: string;
  /** Shell lines, run in order as a single layer */
  commands: string[];
}

export interface DependencySpec {
  apt: string[];
  nodejs: NodeJsInstaller;
  githubCli: { enabled: boolean };
  pip: string[];
  npm: string[];
  custom: CustomDependency[];
}

export interface GitIdentity {
  userName: string;
  userEmail: string;
}

export interface ShellSettings {
  aliases: Record<string, string>;
  historySearch: boolean;
}

// ============================================================================
// Command table
// ============================================================================

/**
 * A command that runs an executable named after its table key.
 */
export interface DirectCommand {
  kind: 'direct';
  /** Shell step added to the image so the executable exists */
  install?: string;
  /** Arguments always passed before the caller's own */
  args: string;
  /** Run in the caller's directory, like an interactive shell */
  shell?: boolean;
}

/**
 * A command that forwards to another entry of the same table.
 */
export interface AliasCommand {
  kind: 'alias';
  target: string;
}

export type CommandDefinition = DirectCommand | AliasCommand;

export interface CommandTable {
  /** Entry run when no command name is given */
  default: string;
  entries: Record<string, CommandDefinition>;
}

// ============================================================================
// Profile
// ============================================================================

/**
 * Descriptive fields that never influence the image or the container.
 */
export interface ProfileMeta {
  description?: string;
  generatedAt?: string;
}

export interface Profile {
  container: ContainerSettings;
  runtime: RuntimeSettings;
  environment: Record<string, string>;
  dependencies: DependencySpec;
  git: GitIdentity;
  shell: ShellSettings;
  commands: CommandTable;
  meta?: ProfileMeta;
}
