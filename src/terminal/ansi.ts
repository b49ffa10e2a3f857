/**
 * ANSI Escape Code Constants and Utilities
 *
 * Low-level escape sequences for terminal control.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

export type CursorShape =
  | 'block'
  | 'underline'
  | 'bar'
  | 'blinkingBlock'
  | 'blinkingUnderline'
  | 'blinkingBar';

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  // Position: row and col are 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  // Cursor shapes (DECSCUSR)
  shape: {
    block: `${CSI}2 q`,
    underline: `${CSI}4 q`,
    bar: `${CSI}6 q`,
    blinkingBlock: `${CSI}1 q`,
    blinkingUnderline: `${CSI}3 q`,
    blinkingBar: `${CSI}5 q`,
  } satisfies Record<CursorShape, string>,
};

/**
 * Move the cursor using 0-indexed screen coordinates.
 */
export function cursorTo(x: number, y: number): string {
  return CURSOR.moveTo(y + 1, x + 1);
}

// Screen control
export const SCREEN = {
  clear: `${CSI}2J`,
  home: `${CSI}H`,
  // Alternate screen buffer (for fullscreen apps)
  enterAlt: `${CSI}?1049h`,
  exitAlt: `${CSI}?1049l`,
  // Auto-wrap at the right margin
  wrapOff: `${CSI}?7l`,
  wrapOn: `${CSI}?7h`,
};

// Bracketed paste mode
export const PASTE = {
  enable: `${CSI}?2004h`,
  disable: `${CSI}?2004l`,
  start: `${CSI}200~`,
  end: `${CSI}201~`,
};

export const STYLE = {
  reset: `${CSI}0m`,
};

// ============================================
// Colors
// ============================================

export interface RGB {
  r: number;
  g: number;
  b: number;
}

/**
 * Parse a hex color string to RGB.
 * Supports formats: #RGB, #RRGGBB
 */
export function hexToRgb(hex: string): RGB | null {
  const long = /^#([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  if (long) {
    return {
      r: parseInt(long[1] ?? '0', 16),
      g: parseInt(long[2] ?? '0', 16),
      b: parseInt(long[3] ?? '0', 16),
    };
  }

  const short = /^#([a-f\d])([a-f\d])([a-f\d])$/i.exec(hex);
  if (short) {
    const expand = (c: string | undefined) => parseInt((c ?? '0') + (c ?? '0'), 16);
    return { r: expand(short[1]), g: expand(short[2]), b: expand(short[3]) };
  }

  return null;
}

/**
 * Whether a color string is 'default' or a hex color.
 */
export function isColor(value: string): boolean {
  return value === 'default' || hexToRgb(value) !== null;
}

/**
 * Foreground color sequence. 'default' and unparseable colors reset to the
 * terminal default.
 */
export function fgColor(color: string): string {
  const rgb = color === 'default' ? null : hexToRgb(color);
  return rgb ? `${CSI}38;2;${rgb.r};${rgb.g};${rgb.b}m` : `${CSI}39m`;
}

/**
 * Background color sequence. 'default' and unparseable colors reset to the
 * terminal default.
 */
export function bgColor(color: string): string {
  const rgb = color === 'default' ? null : hexToRgb(color);
  return rgb ? `${CSI}48;2;${rgb.r};${rgb.g};${rgb.b}m` : `${CSI}49m`;
}
