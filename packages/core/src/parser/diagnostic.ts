/**
 * Diagnostic block decoding.
 *
 * Turns the lines buffered between the block-open and block-close markers
 * into a severity, a summary and detail lines. Blocks without an
 * `Error:`/`Warning:` line are still surfaced: the provider or plugin text the
 * block carries is not known in advance, so nothing is dropped.
 */

import { stripAnsi } from '../text/ansi.js';
import { MARKER_LINE_PATTERN, SEVERITY_PATTERN } from './grammar.js';
import type { Diagnostic, DiagnosticLine, Severity } from './types.js';

function isBlank(plain: string): boolean {
  return plain.trim() === '';
}

function toDetail(rich: string, plain: string): DiagnosticLine {
  return {
    content: rich.trimEnd(),
    isMarker: MARKER_LINE_PATTERN.test(plain),
  };
}

/**
 * Decode one block. `lines` are sanitized (emphasis codes may remain) and have
 * their block-line prefix removed. Returns null only for an all-blank block.
 */
export function decodeDiagnosticBlock(lines: readonly string[]): Diagnostic | null {
  const plain = lines.map(stripAnsi);

  let start = 0;
  while (start < plain.length && isBlank(plain[start])) start++;
  if (start === plain.length) return null;

  let severity: Severity = 'error';
  let summary = '';
  let summaryIndex = -1;

  for (let i = start; i < plain.length; i++) {
    const match = SEVERITY_PATTERN.exec(plain[i].trim());
    if (match) {
      severity = match[1] === 'Warning' ? 'warning' : 'error';
      summary = match[2].trim();
      summaryIndex = i;
      break;
    }
  }

  // No recognised prefix: first non-empty line stands in as the summary.
  if (summaryIndex === -1) {
    summaryIndex = start;
    summary = plain[start].trim();
  }

  const detail: DiagnosticLine[] = [];
  for (let i = start; i < lines.length; i++) {
    if (i === summaryIndex || isBlank(plain[i])) continue;
    detail.push(toDetail(lines[i], plain[i]));
  }

  return { severity, summary, detail, expanded: false };
}
