/**
 * Status Line
 *
 * Single row under the editor: file name, modified marker, the latest
 * message, and the cursor position.
 */

import stringWidth from 'string-width';
import type { Rect } from './types.ts';
import type { ScreenBuffer } from './screen-buffer.ts';

// ============================================
// Types
// ============================================

export type StatusMessageType = 'info' | 'error';

export interface StatusMessage {
  text: string;
  type: StatusMessageType;
}

export interface StatusLineColors {
  fg: string;
  bg: string;
}

export const UNNAMED_FILE = '[No Name]';

// ============================================
// Width Helpers
// ============================================

/**
 * Truncate or pad `text` to exactly `width` terminal cells. Truncated text
 * ends with an ellipsis.
 */
export function fitToWidth(text: string, width: number): string {
  if (width <= 0) return '';

  const textWidth = stringWidth(text);
  if (textWidth <= width) {
    return text + ' '.repeat(width - textWidth);
  }

  let result = '';
  let used = 0;
  for (const char of text) {
    const charWidth = stringWidth(char);
    if (used + charWidth > width - 1) break;
    result += char;
    used += charWidth;
  }
  return result + '…' + ' '.repeat(width - 1 - used);
}

// ============================================
// Status Line Class
// ============================================

export class StatusLine {
  private bounds: Rect = { x: 0, y: 0, width: 0, height: 1 };
  private filename = UNNAMED_FILE;
  private modified = false;
  private position = { line: 0, column: 0 };
  private message: StatusMessage | null = null;

  setBounds(bounds: Rect): void {
    this.bounds = { ...bounds, height: 1 };
  }

  getBounds(): Rect {
    return { ...this.bounds };
  }

  setFilename(filename: string | null): void {
    this.filename = filename ?? UNNAMED_FILE;
  }

  setModified(modified: boolean): void {
    this.modified = modified;
  }

  /**
   * Zero-based cursor line and column; shown one-based.
   */
  setPosition(line: number, column: number): void {
    this.position = { line, column };
  }

  showMessage(text: string, type: StatusMessageType = 'info'): void {
    this.message = { text, type };
  }

  clearMessage(): void {
    this.message = null;
  }

  getMessage(): StatusMessage | null {
    return this.message;
  }

  /**
   * The full row of text, exactly `bounds.width` cells wide.
   */
  getText(): string {
    const width = this.bounds.width;
    const right = `Ln ${this.position.line + 1}, Col ${this.position.column + 1} `;

    let left = ` ${this.filename}${this.modified ? ' [+]' : ''}`;
    if (this.message) {
      left += ` | ${this.message.text}`;
    }

    const rightWidth = stringWidth(right);
    if (rightWidth >= width) {
      return fitToWidth(left, width);
    }
    return fitToWidth(left, width - rightWidth) + right;
  }

  render(screen: ScreenBuffer, colors: StatusLineColors): void {
    if (this.bounds.width <= 0) return;
    screen.writeString(
      this.bounds.x,
      this.bounds.y,
      this.getText(),
      colors.fg,
      colors.bg,
      this.message?.type === 'error'
    );
  }
}

export function createStatusLine(): StatusLine {
  return new StatusLine();
}
