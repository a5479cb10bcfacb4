/**
 * Logger implementation for the CLI
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';
import type { Logger } from '@tfscope/core';
import { CliError, errorMessage } from './cli-error.js';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Custom output function; routes all log output through this instead of console.log. */
  output?: (msg: string) => void;
  /** Colour the level tags (default: chalk's terminal detection) */
  color?: boolean;
}

/**
 * Create a logger instance
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output } = opts;
  const paint: ChalkInstance = opts.color === undefined ? chalk : new Chalk({ level: opts.color ? 1 : 0 });
  const write = output ?? ((msg: string) => console.log(msg));
  const writeErr = output ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose && !quiet) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        write(paint.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      if (!quiet) {
        const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
        write(paint.blue(`[info] ${msg}${dataStr}`));
      }
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(paint.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      writeErr(paint.red(`[error] ${msg}${dataStr}`));
    },
  };
}

/**
 * Silent logger (for tests, or when no log file is configured)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface FileLogger {
  logger: Logger;
  close(): Promise<void>;
}

/**
 * The screen owns stdout, so diagnostics go to an append-mode log file with
 * a timestamp per line and no colour.
 */
export function createFileLogger(
  filePath: string,
  opts: Pick<LoggerOptions, 'verbose'> & { now?: () => Date } = {},
): FileLogger {
  const now = opts.now ?? (() => new Date());
  const stream = createWriteStream(filePath, { flags: 'a' });
  let failure: Error | null = null;
  stream.on('error', (error) => {
    failure = error;
  });

  const logger = createLogger({
    verbose: opts.verbose,
    color: false,
    output: (msg) => {
      if (failure === null) stream.write(`${now().toISOString()} ${msg}\n`);
    },
  });

  return {
    logger,
    close: async () => {
      stream.end();
      try {
        await finished(stream);
      } catch (error) {
        throw new CliError(`Cannot write log file ${filePath}`, { details: [errorMessage(failure ?? error)], cause: error });
      }
    },
  };
}
