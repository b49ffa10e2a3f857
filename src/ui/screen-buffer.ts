/**
 * Screen Buffer
 *
 * Cell grid mirroring the terminal. Tracks dirty cells so the renderer only
 * writes what changed since the last flush.
 */

import stringWidth from 'string-width';
import {
  type Cell,
  type Rect,
  type Size,
  createEmptyCell,
  cellsEqual,
  cloneCell,
} from './types.ts';

export class ScreenBuffer {
  private width: number;
  private height: number;
  private cells: Cell[][];
  private dirty: boolean[][];

  constructor(size: Size) {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true); // Initially all dirty
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Grid Creation
  // ─────────────────────────────────────────────────────────────────────────

  private createGrid(): Cell[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => createEmptyCell())
    );
  }

  private createDirtyGrid(initialValue: boolean): boolean[][] {
    return Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => initialValue)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Size Management
  // ─────────────────────────────────────────────────────────────────────────

  getSize(): Size {
    return { width: this.width, height: this.height };
  }

  /**
   * Resize the buffer. Contents are cleared.
   */
  resize(size: Size): void {
    this.width = size.width;
    this.height = size.height;
    this.cells = this.createGrid();
    this.dirty = this.createDirtyGrid(true);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cell Access
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Get a cell at position. Returns null if out of bounds.
   */
  get(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Set a cell at position. Marks as dirty if changed.
   * Out of bounds writes are silently ignored.
   */
  set(x: number, y: number, cell: Cell): void {
    const row = this.cells[y];
    const existing = row?.[x];
    if (!row || !existing) return;

    if (!cellsEqual(existing, cell)) {
      row[x] = cloneCell(cell);
      this.markCellDirty(x, y);
    }
  }

  private markCellDirty(x: number, y: number): void {
    const row = this.dirty[y];
    if (row && x >= 0 && x < row.length) {
      row[x] = true;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bulk Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write a string starting at position. Wide characters take two cells;
   * the second holds an empty placeholder. Returns the cells written.
   */
  writeString(x: number, y: number, text: string, fg: string, bg: string, bold = false): number {
    let px = x;

    for (const char of text) {
      if (px >= this.width) break;

      const charWidth = stringWidth(char);

      // Skip zero-width characters (variation selectors, combining marks)
      if (charWidth === 0) {
        continue;
      }

      if (px < 0) {
        px += charWidth;
        continue;
      }

      this.set(px, y, { char, fg, bg, bold });
      px++;

      // Second cell of a wide char: placeholder so stale content is cleared
      if (charWidth === 2 && px < this.width) {
        this.set(px, y, { char: '', fg, bg, bold });
        px++;
      }
    }

    return px - Math.max(x, 0);
  }

  fillRect(rect: Rect, cell: Cell): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.set(x, y, cell);
      }
    }
  }

  clearRect(rect: Rect, bg = 'default', fg = 'default'): void {
    this.fillRect(rect, createEmptyCell(bg, fg));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Dirty Tracking
  // ─────────────────────────────────────────────────────────────────────────

  isDirty(x: number, y: number): boolean {
    return this.dirty[y]?.[x] ?? false;
  }

  clearDirty(): void {
    this.dirty = this.createDirtyGrid(false);
  }

  /**
   * All dirty cells in row-major order.
   */
  getDirtyCells(): Array<{ x: number; y: number; cell: Cell }> {
    const result: Array<{ x: number; y: number; cell: Cell }> = [];

    this.cells.forEach((row, y) => {
      row.forEach((cell, x) => {
        if (this.dirty[y]?.[x]) {
          result.push({ x, y, cell });
        }
      });
    });

    return result;
  }

  /**
   * Text of one row, placeholders skipped. Used by tests and debugging.
   */
  getRowText(y: number): string {
    return (this.cells[y] ?? []).map((cell) => cell.char).join('');
  }
}

export function createScreenBuffer(size: Size): ScreenBuffer {
  return new ScreenBuffer(size);
}
