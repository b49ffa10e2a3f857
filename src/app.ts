/**
 * Editor Application
 *
 * Wires the text buffer, status line, renderer and input together. Key and
 * resize events are queued and run one at a time to completion; the screen
 * is repainted after each one.
 */

import { debugLog } from './debug.ts';
import { TextBuffer } from './core/buffer.ts';
import { saveDocument } from './core/document-file.ts';
import { TenonError } from './core/errors.ts';
import { DEFAULT_SETTINGS, type EditorSettings } from './config/settings.ts';
import {
  DEFAULT_KEYBINDINGS,
  KeybindingAdapter,
  printableCharacter,
  type CommandHandler,
  type CommandId,
  type KeyBinding,
} from './input/keybindings.ts';
import type { Renderer } from './ui/renderer.ts';
import { drawEditor, type EditorViewStyle } from './ui/editor-view.ts';
import { StatusLine } from './ui/status-line.ts';
import type { KeyEvent } from './ui/types.ts';

// ============================================
// Types
// ============================================

/**
 * Source of key and resize events. Implemented by InputHandler.
 */
export interface InputSource {
  start(): void;
  stop(): void;
  onKey(callback: (event: KeyEvent) => void): () => void;
  onResize(callback: (width: number, height: number) => void): () => void;
  onPaste(callback: (text: string) => void): () => void;
}

export interface InitialDocument {
  path: string | null;
  content: string;
}

export interface EditorAppOptions {
  renderer: Renderer;
  input: InputSource;
  document?: InitialDocument;
  settings?: EditorSettings;
  keybindings?: readonly KeyBinding[];
  /** Called once after quit has restored the terminal */
  onExit?: () => void;
}

// ============================================
// Editor Application
// ============================================

export class EditorApp {
  private readonly renderer: Renderer;
  private readonly input: InputSource;
  private readonly buffer: TextBuffer;
  private readonly statusLine = new StatusLine();
  private readonly keybindings = new KeybindingAdapter();
  private readonly settings: EditorSettings;
  private readonly onExit: (() => void) | undefined;

  private queue: Promise<void> = Promise.resolve();
  private unsubscribers: Array<() => void> = [];
  private running = false;
  private quitting = false;

  constructor(options: EditorAppOptions) {
    this.renderer = options.renderer;
    this.input = options.input;
    this.settings = options.settings ?? { ...DEFAULT_SETTINGS };
    this.onExit = options.onExit;

    this.buffer = new TextBuffer({
      content: options.document?.content ?? '',
      path: options.document?.path ?? null,
    });

    this.keybindings.setKeybindings(options.keybindings ?? DEFAULT_KEYBINDINGS);
    this.keybindings.registerCommands(this.createCommands());
    this.renderer.setCursorShape(this.settings['editor.cursorStyle']);
    this.layout();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Take over the terminal and draw the first frame.
   */
  start(): Promise<void> {
    if (this.running) return this.queue;
    this.running = true;

    this.renderer.initialize();
    this.unsubscribers.push(
      this.input.onKey((event) => {
        void this.handleKey(event);
      }),
      this.input.onResize((width, height) => {
        void this.handleResize(width, height);
      }),
      this.input.onPaste((text) => {
        void this.handlePaste(text);
      })
    );
    this.input.start();

    debugLog('[App] Started');
    return this.enqueue(() => {});
  }

  /**
   * Stop reading input and restore the terminal.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.input.stop();
    this.renderer.cleanup();
    debugLog('[App] Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolves once every queued event has been processed.
   */
  idle(): Promise<void> {
    return this.queue;
  }

  getBuffer(): TextBuffer {
    return this.buffer;
  }

  getStatusLine(): StatusLine {
    return this.statusLine;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────────────

  handleKey(event: KeyEvent): Promise<void> {
    return this.enqueue(async () => {
      this.statusLine.clearMessage();
      if (await this.keybindings.execute(event)) return;

      const ch = printableCharacter(event);
      if (ch !== null) {
        this.buffer.insertChar(ch);
      }
    });
  }

  /**
   * Insert pasted text in one edit. Terminals send line breaks as CR.
   */
  handlePaste(text: string): Promise<void> {
    return this.enqueue(() => {
      debugLog(`[App] Paste received: ${text.length} chars`);
      this.statusLine.clearMessage();
      this.buffer.insertText(text.replace(/\r\n?/g, '\n'));
    });
  }

  handleResize(width: number, height: number): Promise<void> {
    return this.enqueue(() => {
      debugLog(`[App] Resize to ${width}x${height}`);
      this.renderer.resize({ width, height });
      this.layout();
    });
  }

  /**
   * Run `task` after everything already queued. A failing task is logged
   * and reported in the status line; the queue keeps going.
   */
  private enqueue(task: () => void | Promise<void>): Promise<void> {
    this.queue = this.queue.then(async () => {
      if (this.quitting) return;

      try {
        await task();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        debugLog(`[App] Command failed: ${error instanceof TenonError ? `${error.code} ` : ''}${message}`);
        this.statusLine.showMessage(message, 'error');
      }

      if (!this.quitting && this.running) {
        this.buffer.scroll();
        this.render();
      }
    });
    return this.queue;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  private createCommands(): Record<CommandId, CommandHandler> {
    return {
      'app.quit': () => this.quit(),
      'file.save': () => this.save(),
      'cursor.left': () => this.buffer.moveLeft(),
      'cursor.right': () => this.buffer.moveRight(),
      'cursor.up': () => this.buffer.moveUp(),
      'cursor.down': () => this.buffer.moveDown(),
      'edit.newline': () => {
        this.buffer.insertChar('\n');
      },
      'edit.backspace': () => {
        this.buffer.backspace();
      },
      'edit.deleteForward': () => {
        this.buffer.deleteForward();
      },
    };
  }

  private async save(): Promise<void> {
    const result = await saveDocument(this.buffer.path, this.buffer.getText());
    if (result.status === 'skipped') {
      this.statusLine.showMessage('No file name; nothing saved');
      return;
    }

    this.buffer.markSaved();
    this.statusLine.showMessage(`Saved ${result.path} (${result.bytes} bytes)`);
  }

  private quit(): void {
    debugLog('[App] Quit');
    this.quitting = true;
    this.stop();
    this.onExit?.();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout & Rendering
  // ─────────────────────────────────────────────────────────────────────────

  private layout(): void {
    const { width, height } = this.renderer.getSize();
    const statusVisible = this.settings['statusLine.visible'];
    const editorHeight = statusVisible ? Math.max(0, height - 1) : height;

    this.buffer.moveTo(0, 0);
    this.buffer.resize(width, editorHeight);
    this.statusLine.setBounds({ x: 0, y: height - 1, width, height: 1 });
  }

  private render(): void {
    const screen = this.renderer.getBuffer();

    const style: EditorViewStyle = {
      fg: this.settings['editor.foreground'],
      bg: this.settings['editor.background'],
    };
    const cursor = drawEditor(screen, this.buffer, style);

    if (this.settings['statusLine.visible'] && this.renderer.getSize().height > 0) {
      this.statusLine.setFilename(this.buffer.path);
      this.statusLine.setModified(this.buffer.modified);
      this.statusLine.setPosition(this.buffer.currentLine(), this.buffer.currentColumn());
      this.statusLine.render(screen, {
        fg: this.settings['statusLine.foreground'],
        bg: this.settings['statusLine.background'],
      });
    }

    this.renderer.flush();
    if (cursor) {
      this.renderer.showCursor(cursor.x, cursor.y);
    } else {
      this.renderer.hideCursor();
    }
  }
}

export function createEditorApp(options: EditorAppOptions): EditorApp {
  return new EditorApp(options);
}
