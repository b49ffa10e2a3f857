/**
 * Debug Logging Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  debugLog,
  getDebugLogPath,
  isDebugEnabled,
  setDebugEnabled,
  setDebugLogPath,
} from '../../src/debug.ts';

describe('debugLog', () => {
  let dir: string;
  let originalPath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'tenon-debug-'));
    originalPath = getDebugLogPath();
    setDebugLogPath(path.join(dir, 'debug.log'));
  });

  afterEach(() => {
    setDebugEnabled(false);
    setDebugLogPath(originalPath);
    rmSync(dir, { recursive: true, force: true });
  });

  test('writes nothing while disabled', () => {
    debugLog('[Test] hidden');
    expect(existsSync(path.join(dir, 'debug.log'))).toBe(false);
  });

  test('appends timestamped lines when enabled', () => {
    setDebugEnabled(true);
    debugLog('[Test] first');
    debugLog('[Test] second');

    const lines = readFileSync(path.join(dir, 'debug.log'), 'utf8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Test\] first$/);
    expect(lines[1]?.endsWith('] [Test] second')).toBe(true);
    expect(lines[2]).toBe('');
  });

  test('an unwritable path turns logging off', () => {
    setDebugLogPath(path.join(dir, 'missing', 'debug.log'));
    setDebugEnabled(true);
    debugLog('[Test] lost');
    expect(isDebugEnabled()).toBe(false);
  });
});
