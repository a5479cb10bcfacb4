import chalk from 'chalk';

interface CliErrorOptions {
  exitCode?: number;
  /** Extra lines printed under the message */
  details?: string[];
  cause?: unknown;
}

/**
 * Failure the entry point reports once and exits on. Everything below the
 * CLI layer recovers locally instead of throwing.
 */
export class CliError extends Error {
  readonly exitCode: number;
  readonly details: string[];

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CliError';
    this.exitCode = options.exitCode ?? 1;
    this.details = options.details ?? [];
  }
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function renderCliError(error: CliError, write: (line: string) => void = console.error): void {
  write(chalk.red(`✗ ${error.message}`));
  for (const detail of error.details) {
    write(`  ${detail}`);
  }
}
