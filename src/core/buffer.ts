/**
 * Text Buffer
 *
 * Owns the character sequence of the open file together with everything
 * derived from it: the line index, the cursor, and the viewport scroll
 * state. All mutation goes through this class; the line index is rebuilt
 * after every applied edit so layout reads never see stale spans.
 */

import { computeLineSpans, spanText, type LineSpan } from './line-index.ts';
import {
  currentLine,
  moveHorizontal,
  moveVertical,
  type CursorState,
  type HorizontalDirection,
  type VerticalDirection,
} from './cursor.ts';
import { cursorScreenPosition, scrollToReveal, type Position, type Viewport } from './viewport.ts';

export interface BufferGeometry {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface BufferOptions {
  /** Initial content. Carriage returns are stripped. */
  content?: string;
  /** File the buffer saves to; null for a scratch buffer */
  path?: string | null;
  geometry?: Partial<BufferGeometry>;
}

/**
 * Split text into Unicode scalar values, dropping every `\r`.
 */
export function toCharacters(text: string): string[] {
  const chars: string[] = [];
  for (const ch of text) {
    if (ch !== '\r') chars.push(ch);
  }
  return chars;
}

export class TextBuffer {
  private data: string[];
  private _lines: LineSpan[];
  private cursor: CursorState = { pos: 0, stickyColumn: null };
  private viewport: Viewport;
  private _path: string | null;
  private _modified = false;

  constructor(options: BufferOptions = {}) {
    this.data = toCharacters(options.content ?? '');
    this._lines = computeLineSpans(this.data);
    this._path = options.path ?? null;
    this.viewport = {
      x: options.geometry?.x ?? 0,
      y: options.geometry?.y ?? 0,
      width: options.geometry?.width ?? 80,
      height: options.geometry?.height ?? 24,
      offsetX: 0,
      offsetY: 0,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Content
  // ─────────────────────────────────────────────────────────────────────────

  get length(): number {
    return this.data.length;
  }

  get lines(): readonly LineSpan[] {
    return this._lines;
  }

  get lineCount(): number {
    return this._lines.length;
  }

  get path(): string | null {
    return this._path;
  }

  get modified(): boolean {
    return this._modified;
  }

  getText(): string {
    return this.data.join('');
  }

  getCharacters(): readonly string[] {
    return this.data;
  }

  /**
   * Text of a line without its newline. Empty string when out of range.
   */
  getLine(index: number): string {
    const span = this._lines[index];
    if (!span) return '';
    const text = spanText(this.data, span);
    return text.endsWith('\n') ? text.slice(0, -1) : text;
  }

  markSaved(): void {
    this._modified = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────────────────

  get cursorPos(): number {
    return this.cursor.pos;
  }

  get stickyColumn(): number | null {
    return this.cursor.stickyColumn;
  }

  /**
   * Place the cursor at an absolute offset, clamped to the data.
   */
  setCursorPos(pos: number): void {
    this.cursor = {
      pos: Math.max(0, Math.min(this.data.length, Math.trunc(pos))),
      stickyColumn: null,
    };
  }

  currentLine(): number {
    return currentLine(this.cursor, this._lines, this.data.length);
  }

  /**
   * Zero-based column of the cursor within its line.
   */
  currentColumn(): number {
    const span = this._lines[this.currentLine()];
    return span ? this.cursor.pos - span.start : 0;
  }

  moveHorizontal(delta: number, direction: HorizontalDirection): void {
    this.cursor = moveHorizontal(this.cursor, delta, direction, this.data.length);
  }

  moveVertical(delta: number, direction: VerticalDirection): void {
    this.cursor = moveVertical(this.cursor, delta, direction, this.data, this._lines);
  }

  moveLeft(delta = 1): void {
    this.moveHorizontal(delta, 'left');
  }

  moveRight(delta = 1): void {
    this.moveHorizontal(delta, 'right');
  }

  moveUp(delta = 1): void {
    this.moveVertical(delta, 'up');
  }

  moveDown(delta = 1): void {
    this.moveVertical(delta, 'down');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert a single character at the cursor and step past it.
   */
  insertChar(ch: string): boolean {
    if ([...ch].length !== 1) {
      throw new RangeError(`insertChar expects exactly one character, got ${JSON.stringify(ch)}`);
    }
    if (ch === '\r') return false;

    this.data.splice(this.cursor.pos, 0, ch);
    this.afterEdit(this.cursor.pos + 1);
    return true;
  }

  /**
   * Insert every character of `text` in order. Carriage returns are dropped.
   */
  insertText(text: string): boolean {
    const chars = toCharacters(text);
    if (chars.length === 0) return false;

    this.data.splice(this.cursor.pos, 0, ...chars);
    this.afterEdit(this.cursor.pos + chars.length);
    return true;
  }

  /**
   * Remove the character under the cursor. No-op at the end of the data.
   */
  deleteForward(): boolean {
    if (this.cursor.pos >= this.data.length) return false;

    this.data.splice(this.cursor.pos, 1);
    this.afterEdit(this.cursor.pos);
    return true;
  }

  /**
   * Remove the character before the cursor. No-op at offset 0.
   */
  backspace(): boolean {
    if (this.cursor.pos === 0) return false;

    const pos = this.cursor.pos - 1;
    this.data.splice(pos, 1);
    this.afterEdit(pos);
    return true;
  }

  private afterEdit(pos: number): void {
    this._lines = computeLineSpans(this.data);
    this.cursor = { pos, stickyColumn: null };
    this._modified = true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Viewport
  // ─────────────────────────────────────────────────────────────────────────

  getViewport(): Readonly<Viewport> {
    return { ...this.viewport };
  }

  get offsetX(): number {
    return this.viewport.offsetX;
  }

  get offsetY(): number {
    return this.viewport.offsetY;
  }

  moveTo(x: number, y: number): void {
    this.viewport.x = x;
    this.viewport.y = y;
  }

  resize(width: number, height: number): void {
    this.viewport.width = Math.max(0, width);
    this.viewport.height = Math.max(0, height);
  }

  /**
   * Screen cell of the cursor, possibly outside the viewport.
   */
  cursorScreenPosition(): Position {
    return cursorScreenPosition(this.viewport, this.currentLine(), this.currentColumn());
  }

  /**
   * Adjust the scroll offsets so the cursor is inside the viewport.
   */
  scroll(): void {
    const { offsetX, offsetY } = scrollToReveal(this.viewport, this.currentLine(), this.currentColumn());
    this.viewport.offsetX = offsetX;
    this.viewport.offsetY = offsetY;
  }

  /**
   * Line spans currently inside the viewport, top to bottom.
   */
  visibleLines(): Array<{ index: number; span: LineSpan }> {
    const result: Array<{ index: number; span: LineSpan }> = [];
    const end = Math.min(this._lines.length, this.viewport.offsetY + this.viewport.height);
    for (let index = this.viewport.offsetY; index < end; index++) {
      const span = this._lines[index];
      if (span) result.push({ index, span });
    }
    return result;
  }
}

/**
 * Create a text buffer.
 */
export function createTextBuffer(options?: BufferOptions): TextBuffer {
  return new TextBuffer(options);
}
