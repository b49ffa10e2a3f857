/**
 * Line Index
 *
 * Derives line spans from a flat character sequence. The buffer rebuilds
 * the whole index after every edit; nothing here is incremental.
 */

import { LineIndexError } from './errors.ts';

/**
 * One logical line. `start` and `end` are inclusive offsets.
 *
 * `end` is the index of the line's `\n`, or the last character of an
 * unterminated final line. An empty final line (empty data, or data ending
 * in `\n`) is the degenerate span `{ start: len, end: len }`, which covers
 * no characters.
 */
export interface LineSpan {
  start: number;
  end: number;
}

/**
 * Build the line spans for `data`. Always returns at least one span.
 */
export function computeLineSpans(data: readonly string[]): LineSpan[] {
  const lines: LineSpan[] = [];
  let start = 0;

  for (let i = 0; i < data.length; i++) {
    if (data[i] === '\n') {
      lines.push({ start, end: i });
      start = i + 1;
    }
  }

  if (start < data.length) {
    lines.push({ start, end: data.length - 1 });
  } else {
    lines.push({ start: data.length, end: data.length });
  }

  return lines;
}

/**
 * Number of characters a span covers, newline included. 0 for the
 * degenerate empty last line.
 */
export function spanLength(span: LineSpan, dataLength: number): number {
  if (span.start >= dataLength) return 0;
  return Math.min(span.end, dataLength - 1) - span.start + 1;
}

/**
 * Whether the span ends in a newline character.
 */
export function isTerminated(span: LineSpan, data: readonly string[]): boolean {
  return span.start < data.length && data[span.end] === '\n';
}

/**
 * The characters a span covers, newline included.
 */
export function spanText(data: readonly string[], span: LineSpan): string {
  return data.slice(span.start, span.start + spanLength(span, data.length)).join('');
}

/**
 * Locate the line containing `offset`.
 *
 * `offset === dataLength` (end of buffer) resolves to the last line even
 * when that line is unterminated and its `end` is `dataLength - 1`.
 */
export function findLineIndex(lines: readonly LineSpan[], offset: number, dataLength: number): number {
  const last = lines.length - 1;
  const lastSpan = lines[last];

  if (lastSpan && offset === dataLength && offset >= lastSpan.start) {
    return last;
  }

  let lo = 0;
  let hi = last;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const span = lines[mid];
    if (!span) break;
    if (offset < span.start) {
      hi = mid - 1;
    } else if (offset > span.end) {
      lo = mid + 1;
    } else {
      return mid;
    }
  }

  throw new LineIndexError(offset, dataLength);
}
