/**
 * ProcessRunner - Runs external programs
 *
 * The container engine is only ever reached through this interface, so the
 * services above it can be exercised without podman or docker installed.
 */

import { spawn } from 'node:child_process';
import * as os from 'node:os';
import type { ILogger } from '../services/Logger.js';

export type StdioMode = 'inherit' | 'capture';

export interface RunOptions {
  cwd?: string;
  /** 'inherit' streams live to the terminal; 'capture' collects output */
  stdio?: StdioMode;
}

export interface ProcessResult {
  exitCode: number;
  /** Empty when stdio is 'inherit' */
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/** Passed on to the child explicitly */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM'];

/**
 * Ignored while a child runs. A terminal Ctrl-C already reaches the child
 * through the foreground process group; sending it again would make the
 * engine client treat it as a second interrupt and force-kill.
 */
export const IGNORED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT'];

/** Where process signals are observed; `process` outside tests */
export type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

/**
 * Exit code a shell reports for a child killed by `signal`.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const number = os.constants.signals[signal];
  return 128 + number;
}

/**
 * ProcessRunner over child_process.spawn.
 *
 * While a child runs, neither SIGINT nor SIGTERM kills kiln: SIGTERM is
 * passed on and SIGINT is left to reach the child from the terminal, so
 * the child decides how to exit and its exit code is what the caller sees.
 */
export class NodeProcessRunner implements ProcessRunner {
  constructor(
    private readonly logger?: ILogger,
    private readonly signals: SignalSource = process
  ) {}

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const stdio = options.stdio ?? 'capture';
    this.logger?.debug({ command, args, cwd: options.cwd, stdio }, 'Spawning process');

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      const forward = (signal: NodeJS.Signals): void => {
        child.kill(signal);
      };
      const ignore = (signal: NodeJS.Signals): void => {
        this.logger?.debug({ command, signal }, 'Signal left to the child');
      };
      for (const signal of FORWARDED_SIGNALS) {
        this.signals.on(signal, forward);
      }
      for (const signal of IGNORED_SIGNALS) {
        this.signals.on(signal, ignore);
      }
      const cleanup = (): void => {
        for (const signal of FORWARDED_SIGNALS) {
          this.signals.off(signal, forward);
        }
        for (const signal of IGNORED_SIGNALS) {
          this.signals.off(signal, ignore);
        }
      };

      child.on('error', (error) => {
        cleanup();
        reject(error);
      });

      child.on('close', (code, signal) => {
        cleanup();
        const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        this.logger?.debug({ command, exitCode }, 'Process exited');
        resolve({ exitCode, stdout, stderr });
      });
    });
  }
}
