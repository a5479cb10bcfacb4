/**
 * Viewer configuration.
 *
 * Layers, later wins: built-in defaults, the JSON file given by `--config`,
 * environment variables, command-line flags.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { DEFAULT_PROMPT_PATTERNS } from '@tfscope/core';
import { CliError, errorMessage } from './cli-error.js';

export interface ViewerConfig {
  /** Batched rebuild interval */
  tickMs: number;
  /** Messages buffered between reader and screen before the reader waits */
  queueCapacity: number;
  /** Wait after SIGTERM before SIGKILL */
  shutdownTimeoutMs: number;
  /** Regex sources tested against the unterminated tail of child output */
  promptPatterns: string[];
  mouseScrollLines: number;
  logFile?: string;
  verbose: boolean;
}

export const DEFAULT_VIEWER_CONFIG: ViewerConfig = {
  tickMs: 50,
  queueCapacity: 100,
  shutdownTimeoutMs: 5000,
  promptPatterns: [...DEFAULT_PROMPT_PATTERNS],
  mouseScrollLines: 3,
  verbose: false,
};

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const regexSource = z.string().min(1).refine(isValidRegex, { message: 'Invalid regular expression' });

export const configFileSchema = z
  .object({
    tickMs: z.number().int().positive(),
    queueCapacity: z.number().int().positive(),
    shutdownTimeoutMs: z.number().int().nonnegative(),
    promptPatterns: z.array(regexSource).min(1),
    mouseScrollLines: z.number().int().positive(),
    logFile: z.string().min(1),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Flags as commander hands them over. */
export interface ConfigFlags {
  config?: string;
  logFile?: string;
  tickMs?: string;
  /** Extra prompt patterns, added to the ones already configured */
  prompt?: string[];
  verbose?: boolean;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliError(`${name} must be a positive integer, got "${value}"`, { exitCode: 2 });
  }
  return parsed;
}

export function readConfigFile(filePath: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new CliError(`Cannot read config file ${filePath}`, { exitCode: 2, details: [errorMessage(error)], cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CliError(`Config file ${filePath} is not valid JSON`, { exitCode: 2, details: [errorMessage(error)], cause: error });
  }

  const result = configFileSchema.safeParse(json);
  if (!result.success) {
    throw new CliError(`Invalid config file ${filePath}`, {
      exitCode: 2,
      details: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ViewerConfig> {
  const layer: Partial<ViewerConfig> = {};
  if (env.TFSCOPE_LOG_FILE) layer.logFile = env.TFSCOPE_LOG_FILE;
  if (env.TFSCOPE_TICK_MS) layer.tickMs = parsePositiveInt('TFSCOPE_TICK_MS', env.TFSCOPE_TICK_MS);
  return layer;
}

/**
 * Flag layer. `basePatterns` are the prompt patterns from the layers below;
 * `--prompt` adds to them rather than replacing them.
 */
export function configFromFlags(flags: ConfigFlags, basePatterns: readonly string[] = []): Partial<ViewerConfig> {
  const layer: Partial<ViewerConfig> = {};
  if (flags.logFile) layer.logFile = flags.logFile;
  if (flags.tickMs !== undefined) layer.tickMs = parsePositiveInt('--tick-ms', flags.tickMs);
  if (flags.prompt && flags.prompt.length > 0) {
    for (const source of flags.prompt) {
      if (!isValidRegex(source)) {
        throw new CliError(`--prompt is not a valid regular expression: ${source}`, { exitCode: 2 });
      }
    }
    layer.promptPatterns = [...new Set([...basePatterns, ...flags.prompt])];
  }
  if (flags.verbose) layer.verbose = true;
  return layer;
}

export function resolveConfig(flags: ConfigFlags = {}, env: NodeJS.ProcessEnv = process.env): ViewerConfig {
  const file = flags.config ? readConfigFile(flags.config) : {};
  const base: ViewerConfig = { ...DEFAULT_VIEWER_CONFIG, ...file, ...configFromEnv(env) };
  return { ...base, ...configFromFlags(flags, base.promptPatterns) };
}
