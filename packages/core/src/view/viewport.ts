/**
 * Cursor and scroll offset arithmetic.
 *
 * Invariants after every operation:
 *   0 <= cursor < lineCount   (0 when empty)
 *   0 <= offset <= max(0, lineCount - height)
 */

export interface ViewportPosition {
  cursor: number;
  offset: number;
}

export function clampCursor(cursor: number, lineCount: number): number {
  const maxCursor = Math.max(0, lineCount - 1);
  return Math.min(Math.max(0, cursor), maxCursor);
}

export function clampOffset(offset: number, lineCount: number, height: number): number {
  const maxOffset = Math.max(0, lineCount - height);
  return Math.min(Math.max(0, offset), maxOffset);
}

/** Clamp both values and scroll so the cursor row is on screen. */
export function ensureCursorVisible(
  position: ViewportPosition,
  lineCount: number,
  height: number,
): ViewportPosition {
  const cursor = clampCursor(position.cursor, lineCount);
  let offset = position.offset;
  if (cursor < offset) {
    offset = cursor;
  } else if (cursor >= offset + height) {
    offset = cursor - height + 1;
  }
  return { cursor, offset: clampOffset(offset, lineCount, height) };
}
