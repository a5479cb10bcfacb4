/**
 * ANSI escape handling for line-oriented tool output.
 *
 * Two passes over a single line:
 * - stripAnsi: drop every CSI sequence so structural markers match
 * - sanitizeEmphasis: keep only bold/dim/italic/underline SGR codes so the
 *   source tool's emphasis survives into diagnostic detail lines
 *
 * Neither pass interprets cursor movement; non-SGR CSI sequences are dropped.
 */

// eslint-disable-next-line no-control-regex
const CSI_PATTERN = /\x1b\[[0-9;?]*[ -/]*[@-~]/g;
// eslint-disable-next-line no-control-regex
const CSI_WITH_PARTS = /\x1b\[([0-9;?]*)([ -/]*)([@-~])/g;

/** SGR parameters that carry emphasis rather than colour. */
const EMPHASIS_CODES = new Set([1, 2, 3, 4, 22, 23, 24]);

/**
 * Re-emit after rendering sanitized content. Resets emphasis only, so the
 * renderer's own colour state is left alone.
 */
export const EMPHASIS_RESET = '\x1b[22;23;24m';

/** Remove every CSI escape sequence (`ESC [ params letter`). */
export function stripAnsi(text: string): string {
  return text.replace(CSI_PATTERN, '');
}

/**
 * Reduce SGR sequences to their emphasis parameters. Colour codes (including
 * the arguments of extended 38/48 colours) and full resets are removed; other
 * CSI sequences are removed entirely. The result never contains `ESC[0m`.
 */
export function sanitizeEmphasis(text: string): string {
  return text.replace(CSI_WITH_PARTS, (_seq, params: string, intermediates: string, final: string) => {
    if (final !== 'm' || intermediates !== '' || params.includes('?')) return '';
    const kept = emphasisParams(params);
    return kept.length > 0 ? `\x1b[${kept.join(';')}m` : '';
  });
}

/** SGR codes in order, with the arguments of extended colours skipped. */
function sgrCodes(params: string): number[] {
  if (params === '') return [0];
  const codes = params.split(';').map((p) => (p === '' ? 0 : Number.parseInt(p, 10)));
  const out: number[] = [];
  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    out.push(code);
    if (code === 38 || code === 48 || code === 58) {
      // 38;5;n or 38;2;r;g;b
      const mode = codes[i + 1];
      i += mode === 5 ? 2 : mode === 2 ? 4 : 1;
    }
  }
  return out;
}

function emphasisParams(params: string): number[] {
  return sgrCodes(params).filter((code) => EMPHASIS_CODES.has(code));
}

// eslint-disable-next-line no-control-regex
const SGR_SEQUENCE = /^\x1b\[([0-9;]*)m$/;

/**
 * Update the set of open emphasis codes (1-4) after one escape sequence.
 * Anything other than an SGR sequence leaves the set alone.
 */
export function trackEmphasis(open: Set<number>, sequence: string): void {
  const match = SGR_SEQUENCE.exec(sequence);
  if (!match) return;
  for (const code of sgrCodes(match[1])) {
    if (code === 0) open.clear();
    else if (code >= 1 && code <= 4) open.add(code);
    else if (code === 22) {
      open.delete(1);
      open.delete(2);
    } else if (code === 23) open.delete(3);
    else if (code === 24) open.delete(4);
  }
}

/** SGR sequence that re-opens `open`, or '' when nothing is open. */
export function reopenEmphasis(open: ReadonlySet<number>): string {
  if (open.size === 0) return '';
  return `\x1b[${[...open].sort((a, b) => a - b).join(';')}m`;
}
