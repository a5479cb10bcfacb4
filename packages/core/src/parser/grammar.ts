/**
 * Fixed grammar of the plan/apply text output. Compiled once at module load
 * and never mutated; only the prompt sentinels are configurable.
 */

import type { ResourceAction } from './types.js';

export const BLOCK_OPEN = '╷';
export const BLOCK_CLOSE = '╵';
const BLOCK_LINE = '│';

/** Opening token of a resource body: `  + resource "aws_instance" "web" {` */
export const RESOURCE_BODY_TOKEN = ' resource "';

export const RESOURCE_HEADER_PATTERN =
  /^\s*# (.+?) (will be created|will be destroyed|will be updated in-place|must be replaced|will be imported)/;

export const SEVERITY_PATTERN = /^(Error|Warning):\s*(\S.*)$/;

export const MARKER_LINE_PATTERN = /^\s*on \S.* line \d+/;

const BLOCK_LINE_PREFIX = new RegExp(`^((?:\\x1b\\[[0-9;]*m)*)${BLOCK_LINE} ?`);

export const DEFAULT_PROMPT_PATTERNS: readonly string[] = ['Enter a value:\\s*$'];

const ACTIONS: ReadonlyMap<string, ResourceAction> = new Map<string, ResourceAction>([
  ['will be created', 'create'],
  ['will be updated in-place', 'update'],
  ['will be destroyed', 'destroy'],
  ['must be replaced', 'replace'],
  ['will be imported', 'import'],
]);

/** Map an action phrase to its action; unrecognised phrases are `unknown`. */
export function parseAction(actionText: string): ResourceAction | 'unknown' {
  return ACTIONS.get(actionText) ?? 'unknown';
}

/**
 * Remove the block-line marker and the single space after it. Emphasis codes
 * in front of the marker are kept.
 */
export function stripBlockLinePrefix(line: string): string {
  return line.replace(BLOCK_LINE_PREFIX, '$1');
}

/** Compile prompt sentinel sources; throws on an invalid pattern. */
export function compilePromptPatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source));
}

/** Count of `{` minus count of `}` in a line. */
export function netBraces(line: string): number {
  let depth = 0;
  for (const char of line) {
    if (char === '{') depth++;
    else if (char === '}') depth--;
  }
  return depth;
}
