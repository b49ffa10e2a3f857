/**
 * UI Core Types
 */

// ============================================
// Geometry
// ============================================

export interface Rect {
  x: number; // Column (0-indexed)
  y: number; // Row (0-indexed)
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

// ============================================
// Rendering
// ============================================

export interface Cell {
  char: string;
  fg: string; // Foreground color (hex or 'default')
  bg: string; // Background color
  bold?: boolean;
}

/**
 * Create an empty (space) cell.
 */
export function createEmptyCell(bg = 'default', fg = 'default'): Cell {
  return {
    char: ' ',
    fg,
    bg,
  };
}

export function cloneCell(cell: Cell): Cell {
  return { ...cell };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && a.fg === b.fg && a.bg === b.bg && (a.bold ?? false) === (b.bold ?? false);
}

// ============================================
// Input
// ============================================

export interface KeyEvent {
  key: string; // e.g., 'a', 'Enter', 'ArrowUp'
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}
