/**
 * Editor Settings
 *
 * Typed settings with built-in defaults. User files may override any key;
 * values of the wrong shape are ignored.
 */

import { debugLog } from '../debug.ts';
import { CURSOR, isColor, type CursorShape } from '../terminal/ansi.ts';

export interface EditorSettings {
  'editor.cursorStyle': CursorShape;
  'editor.background': string;
  'editor.foreground': string;
  'statusLine.visible': boolean;
  'statusLine.background': string;
  'statusLine.foreground': string;
}

export const DEFAULT_SETTINGS: Readonly<EditorSettings> = {
  'editor.cursorStyle': 'blinkingBar',
  'editor.background': 'default',
  'editor.foreground': 'default',
  'statusLine.visible': true,
  'statusLine.background': '#282828',
  'statusLine.foreground': '#d2d2d2',
};

// ============================================
// Validation
// ============================================

type SettingValidators = {
  [K in keyof EditorSettings]: (value: unknown) => value is EditorSettings[K];
};

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isColorString(value: unknown): value is string {
  return typeof value === 'string' && isColor(value);
}

function isCursorShape(value: unknown): value is CursorShape {
  return typeof value === 'string' && Object.keys(CURSOR.shape).includes(value);
}

const VALIDATORS: SettingValidators = {
  'editor.cursorStyle': isCursorShape,
  'editor.background': isColorString,
  'editor.foreground': isColorString,
  'statusLine.visible': isBoolean,
  'statusLine.background': isColorString,
  'statusLine.foreground': isColorString,
};

export function isSettingKey(key: string): key is keyof EditorSettings {
  return key in VALIDATORS;
}

function pick<K extends keyof EditorSettings>(
  key: K,
  raw: Record<string, unknown>,
  base: EditorSettings,
  source: string
): EditorSettings[K] {
  if (!(key in raw)) return base[key];

  const value = raw[key];
  if (VALIDATORS[key](value)) {
    return value;
  }

  debugLog(`[Settings] Ignoring invalid value for '${key}' in ${source}: ${JSON.stringify(value)}`);
  return base[key];
}

/**
 * Overlay `raw` (parsed from a settings file) on `base`.
 */
export function mergeSettings(base: EditorSettings, raw: unknown, source: string): EditorSettings {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    debugLog(`[Settings] Ignoring ${source}: expected an object`);
    return { ...base };
  }

  const record: Record<string, unknown> = { ...raw };
  for (const key of Object.keys(record)) {
    if (!isSettingKey(key)) {
      debugLog(`[Settings] Unknown setting '${key}' in ${source}`);
    }
  }

  return {
    'editor.cursorStyle': pick('editor.cursorStyle', record, base, source),
    'editor.background': pick('editor.background', record, base, source),
    'editor.foreground': pick('editor.foreground', record, base, source),
    'statusLine.visible': pick('statusLine.visible', record, base, source),
    'statusLine.background': pick('statusLine.background', record, base, source),
    'statusLine.foreground': pick('statusLine.foreground', record, base, source),
  };
}
