/**
 * Width-aware hard wrapping with hanging indentation.
 *
 * Widths are terminal columns: wide (CJK, box-drawing in wide contexts) code
 * points count 2, combining marks 0. ANSI escape sequences are carried along
 * with zero width, and emphasis open at a break is re-opened after the
 * indent of the next line. There is no word-boundary logic; lines break
 * mid-token.
 */

import stringWidth from 'string-width';
import { reopenEmphasis, trackEmphasis } from './ansi.js';

// eslint-disable-next-line no-control-regex
const ESCAPE_AT = /\x1b\[[0-9;?]*[ -/]*[@-~]/y;

const DIFF_MARKERS = ['+', '-', '~'];

interface Unit {
  text: string;
  width: number;
}

function* units(text: string): Generator<Unit> {
  let i = 0;
  while (i < text.length) {
    if (text.charCodeAt(i) === 0x1b) {
      ESCAPE_AT.lastIndex = i;
      const match = ESCAPE_AT.exec(text);
      if (match) {
        yield { text: match[0], width: 0 };
        i += match[0].length;
        continue;
      }
    }
    const codePoint = text.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    yield { text: char, width: stringWidth(char) };
    i += char.length;
  }
}

/**
 * Split `text` into lines no wider than `maxWidth` columns. Continuation lines
 * start with `hangingIndent` spaces (clamped to `maxWidth - 1`).
 *
 * `maxWidth <= 0` returns the input unsplit; empty input returns `['']`.
 */
export function wrapText(text: string, maxWidth: number, hangingIndent = 0): string[] {
  if (maxWidth <= 0) return [text];
  if (text.length === 0) return [''];

  const indent = Math.max(0, Math.min(hangingIndent, maxWidth - 1));
  const indentStr = ' '.repeat(indent);
  const lines: string[] = [];
  let current = '';
  let currentWidth = 0;
  // Visible units placed on the current line; a unit wider than the room
  // left on an otherwise empty line is placed anyway so wrapping always
  // makes progress.
  let placed = 0;
  const emphasis = new Set<number>();

  for (const unit of units(text)) {
    if (unit.width > 0 && placed > 0 && currentWidth + unit.width > maxWidth) {
      lines.push(current);
      current = indentStr + reopenEmphasis(emphasis);
      currentWidth = indent;
      placed = 0;
    }
    if (unit.width === 0) trackEmphasis(emphasis, unit.text);
    current += unit.text;
    currentWidth += unit.width;
    if (unit.width > 0) placed++;
  }

  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Hanging indent for a plan diff line: its leading spaces, plus 2 when the
 * content starts with a change marker (`+`, `-`, `~`) so continuation lines
 * align with the value after the marker.
 */
export function hangingIndentFor(line: string): number {
  let indent = 0;
  while (indent < line.length && line[indent] === ' ') indent++;
  const trimmed = line.trim();
  if (DIFF_MARKERS.some((marker) => trimmed.startsWith(marker))) {
    return indent + 2;
  }
  return indent;
}
