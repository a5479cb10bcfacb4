#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { runViewer } from '../lib/app.js';
import { CliError, errorMessage, isCliError, renderCliError } from '../lib/cli-error.js';

interface CliOptions {
  config?: string;
  logFile?: string;
  tickMs?: string;
  prompt: string[];
  verbose?: boolean;
}

// src/bin and dist/bin both sit two levels below the package root.
function readVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : '0.0.0';
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command()
  .name('tfscope')
  .description('Interactive viewer for terraform plan and apply output')
  .version(readVersion(), '-V, --version', 'Print version')
  .argument('[command...]', 'command to run on a pseudo-terminal; without one, read stdin')
  .option('-c, --config <path>', 'JSON config file')
  .option('--log-file <path>', 'append diagnostics to this file')
  .option('--tick-ms <ms>', 'screen refresh interval in milliseconds')
  .option('-p, --prompt <regex>', 'extra pattern that marks an interactive prompt (repeatable)', collect, [])
  .option('-v, --verbose', 'log debug detail to the log file')
  .passThroughOptions()
  .addHelpText(
    'after',
    `
Examples:
  $ terraform plan 2>&1 | tfscope
  $ tfscope terraform apply
  $ tfscope --prompt 'Password:\\s*$' ./deploy.sh
`,
  )
  .action(async (command: string[], options: CliOptions) => {
    process.exitCode = await runViewer(command, options);
  });

try {
  await program.parseAsync();
} catch (error) {
  const cliError = isCliError(error) ? error : new CliError(errorMessage(error));
  renderCliError(cliError);
  process.exitCode = cliError.exitCode;
}
// The screen and the PTY leave handles behind on some terminals.
process.exit(process.exitCode ?? 0);
