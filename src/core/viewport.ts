/**
 * Viewport / Scroll Controller
 *
 * Maps a cursor (line, column) to screen cells and adjusts the scroll
 * offsets by the smallest amount that brings the cursor back inside the
 * visible rectangle. No re-centering.
 */

export interface Position {
  x: number;
  y: number;
}

export interface Viewport {
  /** Screen column of the top left corner (0-indexed) */
  x: number;
  /** Screen row of the top left corner (0-indexed) */
  y: number;
  width: number;
  height: number;
  /** Lines scrolled off the top */
  offsetY: number;
  /** Columns scrolled off the left */
  offsetX: number;
}

export interface ScrollOffsets {
  offsetX: number;
  offsetY: number;
}

/**
 * Screen cell of the cursor. May lie outside the viewport, which tells the
 * caller a scroll is due.
 */
export function cursorScreenPosition(viewport: Viewport, line: number, column: number): Position {
  return {
    x: column - viewport.offsetX + viewport.x,
    y: line - viewport.offsetY + viewport.y,
  };
}

/**
 * New offset along one axis for a coordinate relative to the viewport
 * origin. Extents below 1 leave the offset alone.
 */
function scrollAxis(offset: number, coord: number, extent: number): number {
  if (extent < 1) return offset;
  if (coord < 0) return Math.max(0, offset + coord);
  if (coord >= extent) return offset + (coord - extent + 1);
  return offset;
}

/**
 * Offsets that keep the cursor at (line, column) visible.
 */
export function scrollToReveal(viewport: Viewport, line: number, column: number): ScrollOffsets {
  const { x, y } = cursorScreenPosition(viewport, line, column);

  return {
    offsetX: scrollAxis(viewport.offsetX, x - viewport.x, viewport.width),
    offsetY: scrollAxis(viewport.offsetY, y - viewport.y, viewport.height),
  };
}

/**
 * Whether a screen cell lies inside the viewport.
 */
export function containsPosition(viewport: Viewport, position: Position): boolean {
  return (
    position.x >= viewport.x &&
    position.x < viewport.x + viewport.width &&
    position.y >= viewport.y &&
    position.y < viewport.y + viewport.height
  );
}
