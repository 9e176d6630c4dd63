/**
 * Logger - pino file logger
 *
 * Diagnostics go to `<logDir>/kiln.log` as JSON lines. Nothing here writes
 * to the terminal; user-facing text is the CLI's job.
 */

import pino from 'pino';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FILE_NAME = 'kiln.log';

/** Re-export pino's Logger type for use throughout the codebase */
export type { Logger as ILogger } from 'pino';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a pino logger that writes to a file.
 *
 * @param logDir - Directory for log files (creates kiln.log inside)
 * @param level - Minimum log level
 */
export function createLogger(logDir: string, level: LogLevel = 'info'): pino.Logger {
  // Fall back to the temp dir when the log dir cannot be created
  let effectiveDir = logDir;
  try {
    fs.mkdirSync(logDir, { recursive: true });
  } catch {
    effectiveDir = os.tmpdir();
  }

  const logPath = path.join(effectiveDir, LOG_FILE_NAME);

  return pino(
    {
      level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: logPath, sync: true })
  );
}

/**
 * Create a silent logger for testing.
 */
export function createNullLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
