/**
 * Cursor Model
 *
 * The cursor is an absolute offset into the character sequence plus an
 * optional sticky column. The sticky column remembers how far right the
 * cursor wanted to be when a vertical move had to clamp it on a short line,
 * so that moving on to a long enough line restores the original column.
 *
 * Sticky column transitions:
 * - any horizontal move or applied edit clears it;
 * - a vertical move that clamps sets it to the desired column;
 * - a vertical move that fits leaves it unchanged.
 */

import { findLineIndex, isTerminated, spanLength, type LineSpan } from './line-index.ts';

export type HorizontalDirection = 'left' | 'right';
export type VerticalDirection = 'up' | 'down';

export interface CursorState {
  /** Absolute offset, 0..length inclusive */
  pos: number;
  /** Remembered column for vertical movement, null when not tracking */
  stickyColumn: number | null;
}

function assertDelta(delta: number): void {
  if (!Number.isInteger(delta) || delta < 0) {
    throw new RangeError(`Cursor delta must be a non-negative integer, got ${delta}`);
  }
}

/**
 * Line index of the cursor. The end-of-buffer offset belongs to the last line.
 */
export function currentLine(cursor: CursorState, lines: readonly LineSpan[], dataLength: number): number {
  return findLineIndex(lines, cursor.pos, dataLength);
}

/**
 * Move by `delta` characters. Truncated at 0 and at `dataLength`.
 */
export function moveHorizontal(
  cursor: CursorState,
  delta: number,
  direction: HorizontalDirection,
  dataLength: number
): CursorState {
  assertDelta(delta);

  const target = direction === 'left' ? cursor.pos - delta : cursor.pos + delta;
  return {
    pos: Math.max(0, Math.min(dataLength, target)),
    stickyColumn: null,
  };
}

/**
 * Move by `delta` lines, keeping the column where the target line allows.
 * Moving past the first or last line leaves the cursor where it is.
 */
export function moveVertical(
  cursor: CursorState,
  delta: number,
  direction: VerticalDirection,
  data: readonly string[],
  lines: readonly LineSpan[]
): CursorState {
  assertDelta(delta);

  const cur = currentLine(cursor, lines, data.length);
  if (direction === 'up' && cur < delta) return cursor;
  if (direction === 'down' && cur + delta >= lines.length) return cursor;

  const from = lines[cur];
  const target = lines[direction === 'up' ? cur - delta : cur + delta];
  if (!from || !target) return cursor;

  const desired = cursor.stickyColumn ?? cursor.pos - from.start;
  const length = spanLength(target, data.length);

  // A terminated line's last legal column is its newline; the final line
  // also admits the end-of-buffer position just past its last character.
  const past = isTerminated(target, data) ? desired >= length : desired > length;

  if (past) {
    return {
      pos: target.start + Math.max(length - 1, 0),
      stickyColumn: desired,
    };
  }

  return {
    pos: target.start + desired,
    stickyColumn: cursor.stickyColumn,
  };
}
