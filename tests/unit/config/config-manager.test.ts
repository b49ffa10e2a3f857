/**
 * Config Manager Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, createConfigManager, stripJsonComments } from '../../../src/config/config-manager.ts';
import { DEFAULT_SETTINGS } from '../../../src/config/settings.ts';
import { DEFAULT_KEYBINDINGS } from '../../../src/input/keybindings.ts';

describe('stripJsonComments', () => {
  test('removes line and block comments', () => {
    const input = '{\n  // note\n  "a": 1, /* inline */ "b": 2\n}';
    expect(JSON.parse(stripJsonComments(input))).toEqual({ a: 1, b: 2 });
  });

  test('leaves comment markers inside strings', () => {
    const input = '{ "url": "http://example.com", "glob": "src/*.ts" }';
    expect(stripJsonComments(input)).toBe(input);
  });

  test('handles escaped quotes in strings', () => {
    const input = '{ "q": "say \\"//hi\\"" } // trailing';
    expect(JSON.parse(stripJsonComments(input))).toEqual({ q: 'say "//hi"' });
  });
});

describe('ConfigManager', () => {
  let home: string;
  let configDir: string;
  let config: ConfigManager;

  beforeEach(async () => {
    home = await mkdtemp(path.join(os.tmpdir(), 'tenon-config-'));
    configDir = path.join(home, '.tenon');
    config = createConfigManager(home);
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  test('paths live under the .tenon directory', () => {
    expect(config.getPaths()).toEqual({
      userDir: configDir,
      userSettings: path.join(configDir, 'settings.jsonc'),
      userKeybindings: path.join(configDir, 'keybindings.jsonc'),
    });
  });

  test('defaults apply without user files', async () => {
    await config.load();
    expect(config.isLoaded()).toBe(true);
    expect(config.getAll()).toEqual(DEFAULT_SETTINGS);
    expect(config.getKeybindings()).toEqual(DEFAULT_KEYBINDINGS);
  });

  test('user settings with comments are merged', async () => {
    await mkdir(configDir);
    await writeFile(
      path.join(configDir, 'settings.jsonc'),
      '{\n  // prefer a block cursor\n  "editor.cursorStyle": "block",\n  "statusLine.visible": "no"\n}'
    );

    await config.load();
    expect(config.get('editor.cursorStyle')).toBe('block');
    expect(config.get('statusLine.visible')).toBe(true);
  });

  test('user keybindings take precedence over the defaults', async () => {
    await mkdir(configDir);
    await writeFile(
      path.join(configDir, 'keybindings.jsonc'),
      '[\n  { "key": "ctrl+w", "command": "app.quit" },\n  { "key": "ctrl+x", "command": "no.such.command" }\n]'
    );

    await config.load();
    const bindings = config.getKeybindings();
    expect(bindings[0]).toEqual({ key: 'ctrl+w', command: 'app.quit' });
    expect(bindings).toHaveLength(DEFAULT_KEYBINDINGS.length + 1);
  });

  test('malformed files fall back to the defaults', async () => {
    await mkdir(configDir);
    await writeFile(path.join(configDir, 'settings.jsonc'), '{ "editor.cursorStyle": ');

    await config.load();
    expect(config.getAll()).toEqual(DEFAULT_SETTINGS);
  });

  test('getAll returns a copy', async () => {
    await config.load();
    const all = config.getAll();
    all['editor.cursorStyle'] = 'bar';
    expect(config.get('editor.cursorStyle')).toBe('blinkingBar');
  });
});
