/**
 * Debug Logging
 *
 * Opt-in file logger. The terminal belongs to the editor while it runs,
 * so diagnostics go to debug.log instead of stdout/stderr.
 */

import * as fs from 'fs';
import * as path from 'path';

let debugEnabled = false;
let logPath = path.join(process.cwd(), 'debug.log');

/**
 * Enable or disable debug logging.
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Check whether debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Change the file debug output is appended to.
 */
export function setDebugLogPath(filePath: string): void {
  logPath = filePath;
}

export function getDebugLogPath(): string {
  return logPath;
}

/**
 * Append a timestamped line to the debug log. No-op unless enabled.
 */
export function debugLog(message: string): void {
  if (!debugEnabled) return;

  try {
    fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${message}\n`);
  } catch {
    // Unwritable log path: stop logging for the rest of the session
    debugEnabled = false;
  }
}
