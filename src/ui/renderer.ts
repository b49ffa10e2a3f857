/**
 * Renderer
 *
 * Writes the ScreenBuffer to the terminal using ANSI escape sequences.
 * Supports both real terminal output and captured output for testing.
 */

import stringWidth from 'string-width';
import type { Size, Cell } from './types.ts';
import { ScreenBuffer } from './screen-buffer.ts';
import { CURSOR, SCREEN, STYLE, bgColor, cursorTo, fgColor, type CursorShape } from '../terminal/ansi.ts';

// ============================================
// Types
// ============================================

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Enable alternate screen buffer */
  alternateScreen?: boolean;
  /** Cursor shape while the editor runs */
  cursorShape?: CursorShape;
}

/**
 * Style sequence for moving from one cell's attributes to the next.
 */
function transitionStyle(prev: Cell | null, next: Cell): string {
  let out = '';
  const bold = next.bold ?? false;
  if (!prev || (prev.bold ?? false) !== bold) {
    // SGR 22 turns bold off without touching colors
    out += bold ? '\x1b[1m' : '\x1b[22m';
  }
  if (!prev || prev.fg !== next.fg) {
    out += fgColor(next.fg);
  }
  if (!prev || prev.bg !== next.bg) {
    out += bgColor(next.bg);
  }
  return out;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private buffer: ScreenBuffer;
  private size: Size;
  private output: (data: string) => void;
  private initialized = false;
  private alternateScreen: boolean;
  private cursorShape: CursorShape;

  // Track last rendered cell for style optimization
  private lastCell: Cell | null = null;

  constructor(size: Size, options: RendererOptions = {}) {
    this.size = size;
    this.buffer = new ScreenBuffer(size);
    this.output = options.output ?? ((data: string) => {
      process.stdout.write(data);
    });
    this.alternateScreen = options.alternateScreen ?? true;
    this.cursorShape = options.cursorShape ?? 'blinkingBar';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Prepare the terminal for full-screen drawing.
   */
  initialize(): void {
    if (this.initialized) return;

    let initSequence = CURSOR.hide;
    if (this.alternateScreen) {
      initSequence += SCREEN.enterAlt;
    }
    initSequence += SCREEN.wrapOff + SCREEN.clear + SCREEN.home + CURSOR.shape[this.cursorShape];

    this.output(initSequence);
    this.initialized = true;
  }

  /**
   * Restore terminal state.
   */
  cleanup(): void {
    if (!this.initialized) return;

    let cleanupSequence = STYLE.reset + SCREEN.wrapOn;
    if (this.alternateScreen) {
      cleanupSequence += SCREEN.exitAlt;
    }
    cleanupSequence += CURSOR.shape.blinkingBlock + CURSOR.show;

    this.output(cleanupSequence);
    this.initialized = false;
  }

  setCursorShape(shape: CursorShape): void {
    this.cursorShape = shape;
    if (this.initialized) {
      this.output(CURSOR.shape[shape]);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { ...this.size };
  }

  /**
   * Resize the renderer and buffer.
   */
  resize(size: Size): void {
    this.size = size;
    this.buffer.resize(size);
    this.lastCell = null; // Reset style tracking
    if (this.initialized) {
      this.output(SCREEN.clear);
    }
  }

  getBuffer(): ScreenBuffer {
    return this.buffer;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Flush dirty cells to the terminal.
   */
  flush(): void {
    const dirtyCells = this.buffer.getDirtyCells();
    if (dirtyCells.length === 0) {
      return;
    }

    this.output(CURSOR.hide + this.buildOutput(dirtyCells));
    this.buffer.clearDirty();
  }

  /**
   * Build output for the dirty cells, skipping cursor moves between
   * adjacent cells and repeating no unchanged style.
   */
  private buildOutput(cells: Array<{ x: number; y: number; cell: Cell }>): string {
    let output = '';
    let lastY = -1;
    let cursorX = -1; // Track actual terminal cursor position

    for (const { x, y, cell } of cells) {
      // Placeholder for the right half of a wide character
      if (cell.char === '') {
        const prev = this.buffer.get(x - 1, y);
        if (prev && stringWidth(prev.char) === 2) {
          continue;
        }
        output += cursorTo(x, y) + ' ';
        cursorX = x + 1;
        lastY = y;
        continue;
      }

      // Non-ASCII widths vary between terminals; always reposition
      const isNonAscii = (cell.char.codePointAt(0) ?? 0) > 127;

      if (y !== lastY || x !== cursorX || isNonAscii) {
        output += cursorTo(x, y);
        cursorX = x;
      }

      output += transitionStyle(this.lastCell, cell);
      output += cell.char;

      cursorX = isNonAscii ? -1 : cursorX + 1;
      this.lastCell = cell;
      lastY = y;
    }

    return output;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor Control
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Show the hardware cursor at a screen cell.
   */
  showCursor(x: number, y: number): void {
    this.output(cursorTo(x, y) + CURSOR.show);
  }

  hideCursor(): void {
    this.output(CURSOR.hide);
  }
}

// ============================================
// Factory Functions
// ============================================

export function createRenderer(size: Size, options?: RendererOptions): Renderer {
  return new Renderer(size, options);
}

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    output: (data: string) => {
      captured += data;
    },
    alternateScreen: false,
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
