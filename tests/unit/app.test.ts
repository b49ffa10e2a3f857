/**
 * Editor Application Tests
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EditorApp, createEditorApp, type EditorAppOptions, type InputSource } from '../../src/app.ts';
import { DEFAULT_SETTINGS } from '../../src/config/settings.ts';
import { createTestRenderer } from '../../src/ui/renderer.ts';
import type { Renderer } from '../../src/ui/renderer.ts';
import type { KeyEvent } from '../../src/ui/types.ts';

// ============================================
// Test Helpers
// ============================================

class FakeInput implements InputSource {
  private keyCallbacks = new Set<(event: KeyEvent) => void>();
  private resizeCallbacks = new Set<(width: number, height: number) => void>();
  private pasteCallbacks = new Set<(text: string) => void>();
  active = false;

  start(): void {
    this.active = true;
  }

  stop(): void {
    this.active = false;
  }

  onKey(callback: (event: KeyEvent) => void): () => void {
    this.keyCallbacks.add(callback);
    return () => this.keyCallbacks.delete(callback);
  }

  onResize(callback: (width: number, height: number) => void): () => void {
    this.resizeCallbacks.add(callback);
    return () => this.resizeCallbacks.delete(callback);
  }

  onPaste(callback: (text: string) => void): () => void {
    this.pasteCallbacks.add(callback);
    return () => this.pasteCallbacks.delete(callback);
  }

  paste(text: string): void {
    for (const callback of this.pasteCallbacks) callback(text);
  }

  press(name: string, mods: Partial<Omit<KeyEvent, 'key'>> = {}): void {
    const event = { key: name, ctrl: false, alt: false, shift: false, meta: false, ...mods };
    for (const callback of this.keyCallbacks) callback(event);
  }

  type(text: string): void {
    for (const ch of text) this.press(ch);
  }

  resize(width: number, height: number): void {
    for (const callback of this.resizeCallbacks) callback(width, height);
  }
}

// ============================================
// Tests
// ============================================

describe('EditorApp', () => {
  let input: FakeInput;
  let renderer: Renderer;
  let getOutput: () => string;
  let clearOutput: () => void;
  let app: EditorApp;

  function createApp(options: Partial<EditorAppOptions> = {}, width = 30, height = 3): EditorApp {
    ({ renderer, getOutput, clearOutput } = createTestRenderer({ width, height }));
    app = createEditorApp({ renderer, input, ...options });
    return app;
  }

  const row = (y: number): string => renderer.getBuffer().getRowText(y);

  beforeEach(() => {
    input = new FakeInput();
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  describe('lifecycle', () => {
    test('start draws the document and the status line', async () => {
      createApp({ document: { path: null, content: 'ab' } });
      await app.start();

      expect(input.active).toBe(true);
      expect(app.isRunning()).toBe(true);
      expect(row(0)).toBe('ab' + ' '.repeat(28));
      expect(row(1)).toBe(' '.repeat(30));
      expect(row(2)).toBe(' [No Name]        Ln 1, Col 1 ');
      expect(getOutput().endsWith('\x1b[1;1H\x1b[?25h')).toBe(true);
    });

    test('quit restores the terminal and ignores later input', async () => {
      const onExit = vi.fn();
      createApp({ document: { path: null, content: 'ab' }, onExit });
      await app.start();
      clearOutput();

      input.press('q', { ctrl: true });
      input.type('zz');
      await app.idle();

      expect(onExit).toHaveBeenCalledTimes(1);
      expect(app.isRunning()).toBe(false);
      expect(input.active).toBe(false);
      expect(app.getBuffer().getText()).toBe('ab');
      expect(getOutput()).toBe('\x1b[0m\x1b[?7h\x1b[1 q\x1b[?25h');
    });

    test('the configured cursor style is used', async () => {
      createApp({ settings: { ...DEFAULT_SETTINGS, 'editor.cursorStyle': 'block' } });
      await app.start();
      expect(getOutput().startsWith('\x1b[?25l\x1b[?7l\x1b[2J\x1b[H\x1b[2 q')).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  describe('editing', () => {
    beforeEach(async () => {
      createApp({ document: { path: null, content: 'ab' } });
      await app.start();
    });

    test('typing inserts at the cursor', async () => {
      input.type('x');
      input.press('y', { shift: true });
      await app.idle();

      expect(app.getBuffer().getText()).toBe('xYab');
      expect(row(0).startsWith('xYab ')).toBe(true);
      expect(row(2)).toBe(' [No Name] [+]    Ln 1, Col 3 ');
    });

    test('enter splits the line', async () => {
      input.press('ArrowRight');
      input.press('Enter');
      await app.idle();

      expect(app.getBuffer().getText()).toBe('a\nb');
      expect(row(0).startsWith('a ')).toBe(true);
      expect(row(1).startsWith('b ')).toBe(true);
      expect(row(2).endsWith('Ln 2, Col 1 ')).toBe(true);
      expect(getOutput().endsWith('\x1b[2;1H\x1b[?25h')).toBe(true);
    });

    test('backspace and delete', async () => {
      input.press('ArrowRight');
      input.press('Backspace');
      input.press('Delete');
      await app.idle();

      expect(app.getBuffer().getText()).toBe('');
      expect(app.getBuffer().modified).toBe(true);
    });

    test('arrow keys move the cursor', async () => {
      input.press('ArrowRight');
      input.press('ArrowRight');
      input.press('ArrowLeft');
      await app.idle();
      expect(app.getBuffer().cursorPos).toBe(1);

      input.press('ArrowDown');
      input.press('ArrowUp');
      await app.idle();
      expect(app.getBuffer().cursorPos).toBe(1);
    });

    test('pasted text is inserted in one edit with line breaks normalized', async () => {
      input.paste('x\r\ny\rz');
      await app.idle();

      expect(app.getBuffer().getText()).toBe('x\ny\nzab');
      expect(app.getBuffer().cursorPos).toBe(5);
      expect(row(2).endsWith('Ln 3, Col 2 ')).toBe(true);
    });

    test('modified keys without a binding insert nothing', async () => {
      input.press('x', { alt: true });
      input.press('Tab');
      await app.idle();
      expect(app.getBuffer().getText()).toBe('ab');
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Scrolling & Resize
  // ─────────────────────────────────────────────────────────────────────────

  describe('scrolling and resize', () => {
    test('moving below the viewport scrolls', async () => {
      createApp({ document: { path: null, content: 'l0\nl1\nl2\nl3' } });
      await app.start();

      input.press('ArrowDown');
      input.press('ArrowDown');
      input.press('ArrowDown');
      await app.idle();

      expect(app.getBuffer().offsetY).toBe(2);
      expect(row(0).startsWith('l2 ')).toBe(true);
      expect(row(1).startsWith('l3 ')).toBe(true);
      expect(getOutput().endsWith('\x1b[2;1H\x1b[?25h')).toBe(true);
    });

    test('resize relays out the editor and status line', async () => {
      createApp({ document: { path: null, content: 'hello' } });
      await app.start();

      input.resize(12, 4);
      await app.idle();

      expect(renderer.getSize()).toEqual({ width: 12, height: 4 });
      const viewport = app.getBuffer().getViewport();
      expect(viewport.width).toBe(12);
      expect(viewport.height).toBe(3);
      expect(row(0)).toBe('hello       ');
      // Too narrow for the position: only the file name is shown
      expect(row(3)).toBe(' [No Name]  ');
    });

    test('a hidden status line gives the editor every row', async () => {
      createApp({
        document: { path: null, content: 'a\nb\nc' },
        settings: { ...DEFAULT_SETTINGS, 'statusLine.visible': false },
      });
      await app.start();

      expect(app.getBuffer().getViewport().height).toBe(3);
      expect(row(2).startsWith('c ')).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Keybindings
  // ─────────────────────────────────────────────────────────────────────────

  describe('keybindings', () => {
    test('custom bindings replace the defaults', async () => {
      const onExit = vi.fn();
      createApp({
        document: { path: null, content: '' },
        keybindings: [{ key: 'ctrl+w', command: 'app.quit' }],
        onExit,
      });
      await app.start();

      input.press('q', { ctrl: true });
      await app.idle();
      expect(onExit).not.toHaveBeenCalled();

      input.press('w', { ctrl: true });
      await app.idle();
      expect(onExit).toHaveBeenCalledTimes(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Saving
  // ─────────────────────────────────────────────────────────────────────────

  describe('saving', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'tenon-app-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('ctrl+s writes the file and reports it', async () => {
      const file = path.join(dir, 'out.txt');
      createApp({ document: { path: file, content: 'hi' } }, 60, 3);
      await app.start();

      input.type('o');
      input.press('s', { ctrl: true });
      await app.idle();

      expect(await readFile(file, 'utf8')).toBe('ohi');
      expect(app.getBuffer().modified).toBe(false);
      expect(app.getStatusLine().getMessage()).toEqual({
        text: `Saved ${file} (3 bytes)`,
        type: 'info',
      });
    });

    test('keys typed during a save run after it completes', async () => {
      const file = path.join(dir, 'order.txt');
      createApp({ document: { path: file, content: '' } });
      await app.start();

      input.press('s', { ctrl: true });
      input.type('a');
      await app.idle();

      expect(await readFile(file, 'utf8')).toBe('');
      expect(app.getBuffer().getText()).toBe('a');
      expect(app.getBuffer().modified).toBe(true);
    });

    test('a failed save is shown and the session continues', async () => {
      const file = path.join(dir, 'missing', 'out.txt');
      createApp({ document: { path: file, content: 'x' } });
      await app.start();

      input.press('s', { ctrl: true });
      await app.idle();

      const message = app.getStatusLine().getMessage();
      expect(message?.type).toBe('error');
      expect(message?.text.startsWith(`Failed to save ${file}: `)).toBe(true);
      expect(app.isRunning()).toBe(true);
      expect(app.getBuffer().modified).toBe(false);

      input.type('y');
      await app.idle();
      expect(app.getBuffer().getText()).toBe('yx');
      expect(app.getStatusLine().getMessage()).toBeNull();
    });

    test('an unnamed buffer is not written', async () => {
      createApp({ document: { path: null, content: 'x' } }, 60, 3);
      await app.start();

      input.press('s', { ctrl: true });
      await app.idle();

      expect(app.getStatusLine().getMessage()).toEqual({ text: 'No file name; nothing saved', type: 'info' });
      expect(row(2)).toBe(' [No Name] | No file name; nothing saved'.padEnd(48) + 'Ln 1, Col 1 ');
    });
  });
});
