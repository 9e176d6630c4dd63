/**
 * CommandResolver - Turns a command name into an executable invocation
 *
 * Follows alias entries through the command table until a direct entry is
 * reached. The walk is iterative with an explicit visited list, so a cycle
 * or a runaway chain is reported as an error carrying the chain instead of
 * overflowing the stack.
 */

import { parse as parseShellWords } from 'shell-quote';
import type { CommandTable, DirectCommand } from '../config/types.js';
import {
  ChainDepthExceededError,
  ConfigError,
  CycleDetectedError,
  UnknownCommandError,
} from '../errors.js';

/** Maximum number of names in an alias chain, the terminal entry included */
export const MAX_CHAIN_DEPTH = 10;

/**
 * Executables that behave like interactive shells: they run in the
 * caller's current directory rather than the project directory.
 */
export const SHELL_NAMES: ReadonlySet<string> = new Set([
  'sh',
  'bash',
  'zsh',
  'fish',
  'dash',
  'ksh',
  'tcsh',
]);

/**
 * Where the resolved command should run.
 * - 'caller': the directory the user invoked kiln from
 * - 'project': the directory holding the project's .kiln state
 */
export type WorkingDirPolicy = 'caller' | 'project';

export interface ResolvedCommand {
  /** Name the caller asked for */
  name: string;
  /** Terminal entry name, used as the executable */
  executable: string;
  /** Configured default args followed by the caller's args */
  args: string[];
  /** Every name visited, first to last */
  chain: string[];
  definition: DirectCommand;
  workingDirPolicy: WorkingDirPolicy;
}

/**
 * Split a configured argument string into words.
 *
 * Variables are kept literally so they expand inside the container, not on
 * the host. Shell operators (pipes, redirects, `;`) are rejected: default
 * args are arguments, not a script.
 */
export function splitArgs(args: string, commandName: string): string[] {
  const words: string[] = [];
  for (const entry of parseShellWords(args, (key) => `$${key}`)) {
    if (typeof entry === 'string') {
      words.push(entry);
    } else if ('comment' in entry) {
      break;
    } else if ('pattern' in entry) {
      words.push(entry.pattern);
    } else {
      throw new ConfigError(`args may not contain shell operator '${entry.op}'`, `commands.${commandName}`);
    }
  }
  return words;
}

function isShellLike(name: string, definition: DirectCommand): boolean {
  return definition.shell ?? SHELL_NAMES.has(name);
}

/**
 * Resolve `name` through `table`.
 *
 * @throws UnknownCommandError when a name in the chain has no entry
 * @throws CycleDetectedError when an alias points back into the chain
 * @throws ChainDepthExceededError when the chain exceeds MAX_CHAIN_DEPTH names
 */
export function resolveCommand(
  name: string,
  table: CommandTable,
  callerArgs: readonly string[] = []
): ResolvedCommand {
  const visited: string[] = [name];
  let current = name;

  for (;;) {
    const definition = Object.hasOwn(table.entries, current) ? table.entries[current] : undefined;
    if (definition === undefined) {
      throw new UnknownCommandError(current, visited);
    }

    if (definition.kind === 'direct') {
      return {
        name,
        executable: current,
        args: [...splitArgs(definition.args, current), ...callerArgs],
        chain: visited,
        definition,
        workingDirPolicy: isShellLike(current, definition) ? 'caller' : 'project',
      };
    }

    const target = definition.target;
    if (visited.includes(target)) {
      throw new CycleDetectedError([...visited, target]);
    }
    visited.push(target);
    if (visited.length > MAX_CHAIN_DEPTH) {
      throw new ChainDepthExceededError(MAX_CHAIN_DEPTH, visited);
    }
    current = target;
  }
}

/**
 * Resolve the table's `default` entry.
 */
export function resolveDefaultCommand(table: CommandTable, callerArgs: readonly string[] = []): ResolvedCommand {
  return resolveCommand(table.default, table, callerArgs);
}

/**
 * Check that the table's default entry resolves. Resolution errors are
 * rethrown as ConfigError so a bad table fails at load time.
 */
export function validateCommandTable(table: CommandTable, source?: string): void {
  try {
    resolveDefaultCommand(table);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`default command '${table.default}' does not resolve: ${message}`, source, {
      cause: error,
    });
  }
}
