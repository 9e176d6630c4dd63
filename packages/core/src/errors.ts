/**
 * Errors - Failure taxonomy shared by core and the CLI
 *
 * Every failure kiln reports deliberately is a KilnError with a stable code.
 * Validation and resolution errors are raised before any external process
 * runs; RuntimeProcessError carries the child's exit code so the CLI can
 * propagate it unchanged.
 */

export type KilnErrorCode =
  | 'CONFIG_INVALID'
  | 'PROFILE_NOT_FOUND'
  | 'UNKNOWN_COMMAND'
  | 'COMMAND_CYCLE'
  | 'COMMAND_CHAIN_TOO_DEEP'
  | 'LOCK_STALE'
  | 'LOCK_MISSING'
  | 'CONTAINER_EXISTS'
  | 'CONTAINER_NOT_FOUND'
  | 'RUNTIME_FAILED'
  | 'STATE_IO';

export class KilnError extends Error {
  readonly code: KilnErrorCode;
  /** Suggested next step, printed under the message */
  readonly hint?: string;

  constructor(code: KilnErrorCode, message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.hint = hint;
  }

  /** Process exit code the CLI should use for this error */
  get exitCode(): number {
    return 1;
  }
}

export class ConfigError extends KilnError {
  /** File or logical source the problem was found in */
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', source ? `${source}: ${message}` : message, undefined, options);
    this.source = source;
  }
}

export class ProfileNotFoundError extends KilnError {
  constructor(readonly profileName: string, profilePath: string) {
    super(
      'PROFILE_NOT_FOUND',
      `Profile '${profileName}' not found at ${profilePath}`,
      'Run `kiln profiles` to list available profiles.'
    );
  }
}

/**
 * Base for command-table resolution failures. `chain` is the sequence of
 * names visited, starting with the name the caller asked for.
 */
export abstract class CommandResolutionError extends KilnError {
  constructor(code: KilnErrorCode, message: string, readonly chain: readonly string[]) {
    super(code, `${message} (${chain.join(' -> ')})`);
  }
}

export class UnknownCommandError extends CommandResolutionError {
  constructor(readonly commandName: string, chain: readonly string[]) {
    super('UNKNOWN_COMMAND', `Unknown command '${commandName}'`, chain);
  }
}

export class CycleDetectedError extends CommandResolutionError {
  constructor(chain: readonly string[]) {
    super('COMMAND_CYCLE', 'Circular command alias', chain);
  }
}

export class ChainDepthExceededError extends CommandResolutionError {
  constructor(readonly maxDepth: number, chain: readonly string[]) {
    super('COMMAND_CHAIN_TOO_DEEP', `Command alias chain longer than ${maxDepth} names`, chain);
  }
}

/**
 * A missing or stale lock record. Advisory: callers print it, and only
 * throw it when the user opted into strict mode.
 */
export class LockStateWarning extends KilnError {
  constructor(readonly state: 'no-lock' | 'stale', profileName: string) {
    super(
      state === 'stale' ? 'LOCK_STALE' : 'LOCK_MISSING',
      state === 'stale'
        ? `Profile '${profileName}' has changed since its image was last built`
        : `Profile '${profileName}' has not been built yet`,
      `Run \`kiln build --profile ${profileName}\` to build the image.`
    );
  }
}

export class ContainerExistsError extends KilnError {
  constructor(readonly logicalName: string) {
    super(
      'CONTAINER_EXISTS',
      `Container '${logicalName}' already exists for this project`,
      'Use --force to replace it, or `kiln reset` to remove it first.'
    );
  }
}

export class ContainerNotFoundError extends KilnError {
  constructor(message: string, hint?: string) {
    super('CONTAINER_NOT_FOUND', message, hint);
  }
}

export class RuntimeProcessError extends KilnError {
  constructor(
    readonly command: string,
    readonly processExitCode: number,
    detail?: string
  ) {
    super(
      'RUNTIME_FAILED',
      `${command} exited with code ${processExitCode}${detail ? `: ${detail}` : ''}`
    );
  }

  override get exitCode(): number {
    return this.processExitCode === 0 ? 1 : this.processExitCode;
  }
}

export class IOError extends KilnError {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super('STATE_IO', `${message}: ${filePath}`, undefined, options);
  }
}

/**
 * Describe an unknown thrown value for logs and wrapped errors.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
