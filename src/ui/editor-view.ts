/**
 * Editor View
 *
 * Paints the visible window of a TextBuffer into a ScreenBuffer.
 */

import type { TextBuffer } from '../core/buffer.ts';
import { containsPosition, type Position } from '../core/viewport.ts';
import type { ScreenBuffer } from './screen-buffer.ts';

export interface EditorViewStyle {
  fg: string;
  bg: string;
}

export const DEFAULT_EDITOR_VIEW_STYLE: EditorViewStyle = {
  fg: 'default',
  bg: 'default',
};

/**
 * Cell text for one character. Tabs and other control characters have no
 * display width, so they take one blank cell to keep the cursor column
 * aligned with the drawn text.
 */
function displayChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return code < 32 || code === 127 ? ' ' : ch;
}

/**
 * Text shown for one line: characters from `offsetX`, at most `width`,
 * newline dropped, control characters blanked.
 */
export function visibleLineText(
  chars: readonly string[],
  start: number,
  end: number,
  offsetX: number,
  width: number
): string {
  let text = '';
  let taken = 0;
  for (let i = start + offsetX; i <= end && i < chars.length && taken < width; i++) {
    const ch = chars[i];
    if (ch === undefined || ch === '\n') break;
    text += displayChar(ch);
    taken++;
  }
  return text;
}

/**
 * Draw the buffer's viewport and return where the hardware cursor belongs,
 * or null when the cursor is scrolled out of view.
 */
export function drawEditor(
  screen: ScreenBuffer,
  buffer: TextBuffer,
  style: EditorViewStyle = DEFAULT_EDITOR_VIEW_STYLE
): Position | null {
  const viewport = buffer.getViewport();
  const chars = buffer.getCharacters();
  const visible = buffer.visibleLines();

  for (let row = 0; row < viewport.height; row++) {
    const y = viewport.y + row;
    const line = visible[row];
    const text = line
      ? visibleLineText(chars, line.span.start, line.span.end, viewport.offsetX, viewport.width)
      : '';

    const written = screen.writeString(viewport.x, y, text, style.fg, style.bg);
    screen.clearRect(
      { x: viewport.x + written, y, width: viewport.width - written, height: 1 },
      style.bg,
      style.fg
    );
  }

  const cursor = buffer.cursorScreenPosition();
  return containsPosition(viewport, cursor) ? cursor : null;
}
