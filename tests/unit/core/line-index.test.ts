/**
 * Line Index Tests
 */

import { describe, test, expect } from 'vitest';
import {
  computeLineSpans,
  findLineIndex,
  isTerminated,
  spanLength,
  spanText,
} from '../../../src/core/line-index.ts';
import { LineIndexError } from '../../../src/core/errors.ts';

const chars = (text: string): string[] => [...text];

describe('computeLineSpans', () => {
  test('empty data has one degenerate span', () => {
    expect(computeLineSpans([])).toEqual([{ start: 0, end: 0 }]);
  });

  test('splits after each newline', () => {
    expect(computeLineSpans(chars('ab\ncd'))).toEqual([
      { start: 0, end: 2 },
      { start: 3, end: 4 },
    ]);
  });

  test('trailing newline yields an empty last line', () => {
    expect(computeLineSpans(chars('ab\n'))).toEqual([
      { start: 0, end: 2 },
      { start: 3, end: 3 },
    ]);
  });

  test('consecutive newlines give single-character lines', () => {
    expect(computeLineSpans(chars('\n\n'))).toEqual([
      { start: 0, end: 0 },
      { start: 1, end: 1 },
      { start: 2, end: 2 },
    ]);
  });

  test('spans are contiguous and cover the data', () => {
    const data = chars('one\ntwo\n\nfour');
    const lines = computeLineSpans(data);
    for (let i = 1; i < lines.length; i++) {
      expect(lines[i]?.start).toBe((lines[i - 1]?.end ?? -2) + 1);
    }
    expect(lines.map((span) => spanText(data, span)).join('')).toBe('one\ntwo\n\nfour');
  });
});

describe('span helpers', () => {
  const data = chars('ab\ncd');
  const [first, second] = computeLineSpans(data);

  test('spanLength counts the newline', () => {
    expect(first && spanLength(first, data.length)).toBe(3);
    expect(second && spanLength(second, data.length)).toBe(2);
  });

  test('spanLength is 0 for the degenerate span', () => {
    expect(spanLength({ start: 0, end: 0 }, 0)).toBe(0);
    expect(spanLength({ start: 3, end: 3 }, 3)).toBe(0);
  });

  test('isTerminated', () => {
    expect(first && isTerminated(first, data)).toBe(true);
    expect(second && isTerminated(second, data)).toBe(false);
    expect(isTerminated({ start: 0, end: 0 }, [])).toBe(false);
  });

  test('spanText', () => {
    expect(first && spanText(data, first)).toBe('ab\n');
    expect(second && spanText(data, second)).toBe('cd');
  });
});

describe('findLineIndex', () => {
  test('empty data: offset 0 is line 0', () => {
    expect(findLineIndex(computeLineSpans([]), 0, 0)).toBe(0);
  });

  test('offsets map to their lines', () => {
    const data = chars('ab\ncd');
    const lines = computeLineSpans(data);
    expect(findLineIndex(lines, 0, data.length)).toBe(0);
    expect(findLineIndex(lines, 2, data.length)).toBe(0);
    expect(findLineIndex(lines, 3, data.length)).toBe(1);
    expect(findLineIndex(lines, 4, data.length)).toBe(1);
  });

  test('end of buffer belongs to the last line', () => {
    const data = chars('ab\ncd');
    expect(findLineIndex(computeLineSpans(data), 5, data.length)).toBe(1);

    const terminated = chars('ab\n');
    expect(findLineIndex(computeLineSpans(terminated), 3, terminated.length)).toBe(1);
  });

  test('offsets past the end throw LineIndexError', () => {
    const data = chars('ab');
    const lines = computeLineSpans(data);
    expect(() => findLineIndex(lines, 7, data.length)).toThrow(LineIndexError);
    expect(() => findLineIndex(lines, 7, data.length)).toThrow('No line contains offset 7 (data length 2)');
  });
});
