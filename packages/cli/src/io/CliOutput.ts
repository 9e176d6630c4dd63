/**
 * CliOutput - Terminal CLI output handler
 *
 * This is the ONLY file in the repository where console.* is permitted.
 * Diagnostics belong in the pino log; this module is for text the user is
 * meant to read (results, warnings, errors).
 */

import { format } from 'node:util';

type Writer = (message: string) => void;

const ANSI_PATTERN = /\x1B\[[0-9;]*[a-zA-Z]/g;

const consoleStdout: Writer = (message) => console.log(message);
const consoleStderr: Writer = (message) => console.error(message);

let writeStdout: Writer = consoleStdout;
let writeStderr: Writer = consoleStderr;

/**
 * Remove color codes, for captured output and log lines.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Write a line to stdout (user-facing output).
 */
export function output(...args: unknown[]): void {
  writeStdout(format(...args));
}

/**
 * Write a line to stderr (warnings and errors).
 */
export function outputError(...args: unknown[]): void {
  writeStderr(format(...args));
}

/**
 * Capture output for testing purposes. Captured text has color codes
 * removed. Returns a function to restore original output.
 */
export function captureOutput(onStdout: (msg: string) => void, onStderr: (msg: string) => void): () => void {
  const previousStdout = writeStdout;
  const previousStderr = writeStderr;

  writeStdout = (message) => onStdout(stripAnsi(message));
  writeStderr = (message) => onStderr(stripAnsi(message));

  return () => {
    writeStdout = previousStdout;
    writeStderr = previousStderr;
  };
}
