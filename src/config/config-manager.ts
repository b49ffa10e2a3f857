/**
 * Config Manager
 *
 * Loads user configuration from ~/.tenon/:
 * - settings.jsonc     overrides for DEFAULT_SETTINGS
 * - keybindings.jsonc  extra bindings, taking precedence over the defaults
 *
 * Both files accept // and /* *\/ comments. A missing or malformed file
 * leaves the defaults in place.
 */

import { readFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import { DEFAULT_SETTINGS, mergeSettings, type EditorSettings } from './settings.ts';
import { DEFAULT_KEYBINDINGS, parseKeybindings, type KeyBinding } from '../input/keybindings.ts';

// ============================================
// Types
// ============================================

export interface ConfigPaths {
  /** User config directory (~/.tenon/) */
  userDir: string;
  /** User settings file (~/.tenon/settings.jsonc) */
  userSettings: string;
  /** User keybindings file (~/.tenon/keybindings.jsonc) */
  userKeybindings: string;
}

export const CONFIG_DIR_NAME = '.tenon';

/**
 * Remove // line comments and /* block comments *\/ outside of strings.
 */
export function stripJsonComments(content: string): string {
  let result = '';
  let inString = false;
  let i = 0;

  while (i < content.length) {
    const ch = content[i];
    const next = content[i + 1];
    if (ch === undefined) break;

    if (inString) {
      result += ch;
      if (ch === '\\' && next !== undefined) {
        result += next;
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      i++;
      continue;
    }

    if (ch === '"') {
      inString = true;
      result += ch;
      i++;
    } else if (ch === '/' && next === '/') {
      while (i < content.length && content[i] !== '\n') i++;
    } else if (ch === '/' && next === '*') {
      const close = content.indexOf('*/', i + 2);
      i = close === -1 ? content.length : close + 2;
    } else {
      result += ch;
      i++;
    }
  }

  return result;
}

// ============================================
// Config Manager
// ============================================

export class ConfigManager {
  private settings: EditorSettings = { ...DEFAULT_SETTINGS };
  private keybindings: KeyBinding[] = [...DEFAULT_KEYBINDINGS];
  private paths: ConfigPaths;
  private loaded = false;

  constructor(baseDir: string = os.homedir()) {
    const userDir = path.join(baseDir, CONFIG_DIR_NAME);
    this.paths = {
      userDir,
      userSettings: path.join(userDir, 'settings.jsonc'),
      userKeybindings: path.join(userDir, 'keybindings.jsonc'),
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load all configuration. Later calls are no-ops.
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    const userSettings = await this.loadJsonFile(this.paths.userSettings);
    if (userSettings !== undefined) {
      this.settings = mergeSettings(this.settings, userSettings, this.paths.userSettings);
    }

    const userKeybindings = await this.loadJsonFile(this.paths.userKeybindings);
    if (userKeybindings !== undefined) {
      const parsed = parseKeybindings(userKeybindings, this.paths.userKeybindings);
      this.keybindings = [...parsed, ...DEFAULT_KEYBINDINGS];
      debugLog(`[ConfigManager] Loaded ${parsed.length} user keybindings`);
    }

    this.loaded = true;
    debugLog('[ConfigManager] Configuration loaded');
  }

  /**
   * Read and parse a JSONC file. Undefined when missing or malformed.
   */
  private async loadJsonFile(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      debugLog(`[ConfigManager] No config at ${filePath}: ${error}`);
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(stripJsonComments(content));
      debugLog(`[ConfigManager] Parsed ${filePath}`);
      return parsed;
    } catch (error) {
      debugLog(`[ConfigManager] Error parsing ${filePath}: ${error}`);
      return undefined;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Access
  // ─────────────────────────────────────────────────────────────────────────

  get<K extends keyof EditorSettings>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  getAll(): EditorSettings {
    return { ...this.settings };
  }

  getKeybindings(): KeyBinding[] {
    return [...this.keybindings];
  }

  getPaths(): ConfigPaths {
    return { ...this.paths };
  }

  isLoaded(): boolean {
    return this.loaded;
  }
}

export function createConfigManager(baseDir?: string): ConfigManager {
  return new ConfigManager(baseDir);
}
