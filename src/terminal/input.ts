/**
 * Terminal Input Handler
 *
 * Puts stdin into raw mode and parses the byte stream into key events.
 * Also relays terminal resize notifications.
 */

import { ESC, PASTE } from './ansi.ts';
import { debugLog } from '../debug.ts';
import type { KeyEvent } from '../ui/types.ts';

// ============================================
// Constants
// ============================================

type SequenceMapping = { key: string; shift?: boolean; ctrl?: boolean; alt?: boolean };

// Special key mappings for escape sequences (without the leading ESC)
const ESCAPE_SEQUENCES: Record<string, SequenceMapping> = {
  // Arrow keys
  '[A': { key: 'ArrowUp' },
  '[B': { key: 'ArrowDown' },
  '[C': { key: 'ArrowRight' },
  '[D': { key: 'ArrowLeft' },
  'OA': { key: 'ArrowUp' },
  'OB': { key: 'ArrowDown' },
  'OC': { key: 'ArrowRight' },
  'OD': { key: 'ArrowLeft' },
  // Arrow keys with modifiers
  '[1;2A': { key: 'ArrowUp', shift: true },
  '[1;2B': { key: 'ArrowDown', shift: true },
  '[1;2C': { key: 'ArrowRight', shift: true },
  '[1;2D': { key: 'ArrowLeft', shift: true },
  '[1;3A': { key: 'ArrowUp', alt: true },
  '[1;3B': { key: 'ArrowDown', alt: true },
  '[1;3C': { key: 'ArrowRight', alt: true },
  '[1;3D': { key: 'ArrowLeft', alt: true },
  '[1;5A': { key: 'ArrowUp', ctrl: true },
  '[1;5B': { key: 'ArrowDown', ctrl: true },
  '[1;5C': { key: 'ArrowRight', ctrl: true },
  '[1;5D': { key: 'ArrowLeft', ctrl: true },
  // Home/End
  '[H': { key: 'Home' },
  '[F': { key: 'End' },
  'OH': { key: 'Home' },
  'OF': { key: 'End' },
  '[1~': { key: 'Home' },
  '[4~': { key: 'End' },
  // Insert/Delete/PageUp/PageDown
  '[2~': { key: 'Insert' },
  '[3~': { key: 'Delete' },
  '[5~': { key: 'PageUp' },
  '[6~': { key: 'PageDown' },
  // Shift+Tab
  '[Z': { key: 'Tab', shift: true },
};

// Longest first so '[1;5A' wins over '[1~'-style prefixes
const SORTED_SEQUENCES = Object.entries(ESCAPE_SEQUENCES).sort((a, b) => b[0].length - a[0].length);

// Control character to key mappings
const CTRL_CHARS: Record<number, string> = {
  1: 'a', 2: 'b', 3: 'c', 4: 'd', 5: 'e', 6: 'f', 7: 'g',
  11: 'k', 12: 'l', 14: 'n', 15: 'o', 16: 'p', 17: 'q', 18: 'r',
  19: 's', 20: 't', 21: 'u', 22: 'v', 23: 'w', 24: 'x',
  25: 'y', 26: 'z',
};

const CSI_U_PATTERN = /^\x1b\[(\d+)(?:;(\d+))?(?::(\d+))?u/;

// xterm modifyOtherKeys: ESC [ 27 ; modifiers ; keycode ~
const MODIFY_OTHER_KEYS_PATTERN = /^\x1b\[27;(\d+);(\d+)~/;

// Any complete CSI sequence (parameters, intermediates, final byte) or SS3 key
const CSI_PATTERN = /^\x1b(?:\[[0-?]*[ -/]*[@-~]|O[@-~])/;

// ============================================
// Types
// ============================================

export type KeyEventCallback = (event: KeyEvent) => void;
export type ResizeCallback = (width: number, height: number) => void;
export type PasteCallback = (text: string) => void;

export interface InputStreams {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
}

function keyEvent(key: string, mods: Partial<Omit<KeyEvent, 'key'>> = {}): KeyEvent {
  return {
    key,
    ctrl: mods.ctrl ?? false,
    alt: mods.alt ?? false,
    shift: mods.shift ?? false,
    meta: mods.meta ?? false,
  };
}

/**
 * Decode the xterm modifier parameter (1 + bitmask of shift/alt/ctrl/meta).
 */
function decodeModifiers(param: number): Omit<KeyEvent, 'key'> {
  const bits = param - 1;
  return {
    shift: (bits & 1) !== 0,
    alt: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
    meta: (bits & 8) !== 0,
  };
}

// ============================================
// Input Handler
// ============================================

export class InputHandler {
  private keyCallbacks: Set<KeyEventCallback> = new Set();
  private resizeCallbacks: Set<ResizeCallback> = new Set();
  private pasteCallbacks: Set<PasteCallback> = new Set();

  private isRunning = false;
  private buffer = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly escapeTimeout = 50;  // ms to wait for the rest of a sequence
  private readonly streams: InputStreams;

  constructor(streams: InputStreams = { stdin: process.stdin, stdout: process.stdout }) {
    this.streams = streams;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start listening for input.
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    const { stdin, stdout } = this.streams;
    if (stdin.isTTY) {
      stdin.setRawMode(true);
    }
    stdin.resume();
    stdin.setEncoding('utf8');

    // Enable enhanced keyboard protocols
    stdout.write('\x1b[>4;2m');  // modifyOtherKeys
    stdout.write('\x1b[>1u');    // Kitty protocol
    stdout.write(PASTE.enable);

    stdin.on('readable', this.handleReadable);
    stdout.on('resize', this.handleResize);
  }

  /**
   * Stop listening for input and give the terminal back.
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }

    const { stdin, stdout } = this.streams;

    // Disable enhanced keyboard protocols
    stdout.write('\x1b[>4;0m');
    stdout.write('\x1b[<u');
    stdout.write(PASTE.disable);

    if (stdin.isTTY) {
      stdin.setRawMode(false);
    }
    stdin.pause();

    stdin.off('readable', this.handleReadable);
    stdout.off('resize', this.handleResize);
  }

  isActive(): boolean {
    return this.isRunning;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Registration
  // ─────────────────────────────────────────────────────────────────────────

  onKey(callback: KeyEventCallback): () => void {
    this.keyCallbacks.add(callback);
    return () => this.keyCallbacks.delete(callback);
  }

  onResize(callback: ResizeCallback): () => void {
    this.resizeCallbacks.add(callback);
    return () => this.resizeCallbacks.delete(callback);
  }

  /**
   * Text delivered through bracketed paste, as one string.
   */
  onPaste(callback: PasteCallback): () => void {
    this.pasteCallbacks.add(callback);
    return () => this.pasteCallbacks.delete(callback);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Handlers
  // ─────────────────────────────────────────────────────────────────────────

  private handleReadable = (): void => {
    let chunk: unknown;
    while ((chunk = this.streams.stdin.read()) !== null) {
      this.buffer += String(chunk);
      this.parseBuffer();
    }
  };

  private handleResize = (): void => {
    const width = this.streams.stdout.columns || 80;
    const height = this.streams.stdout.rows || 24;
    for (const callback of this.resizeCallbacks) {
      callback(width, height);
    }
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Parsing
  // ─────────────────────────────────────────────────────────────────────────

  private parseBuffer(): void {
    while (this.buffer.length > 0) {
      if (this.escapeTimer) {
        clearTimeout(this.escapeTimer);
        this.escapeTimer = null;
      }

      // Hold an unterminated paste until its end marker arrives
      if (this.buffer.startsWith(PASTE.start) && !this.buffer.includes(PASTE.end)) {
        return;
      }

      const consumed = this.tryParse();
      if (consumed === 0) {
        if (this.buffer.startsWith(ESC) && this.buffer.length < 20) {
          this.escapeTimer = setTimeout(() => {
            this.escapeTimer = null;
            if (this.buffer.startsWith(ESC)) {
              this.emitKey(keyEvent('Escape'));
              this.buffer = this.buffer.slice(1);
              this.parseBuffer();
            }
          }, this.escapeTimeout);
          return;
        }
        this.buffer = this.buffer.slice(1);
      } else {
        this.buffer = this.buffer.slice(consumed);
      }
    }
  }

  /**
   * Try to parse one event from the front of the buffer.
   * Returns the number of UTF-16 units consumed; 0 means wait for more.
   */
  private tryParse(): number {
    const firstChar = this.buffer[0];
    if (firstChar === undefined) return 0;
    const firstCode = firstChar.charCodeAt(0);

    // Bracketed paste: ESC [200~ text ESC [201~
    if (this.buffer.startsWith(PASTE.start)) {
      const end = this.buffer.indexOf(PASTE.end);
      if (end === -1) return 0;
      this.emitPaste(this.buffer.slice(PASTE.start.length, end));
      return end + PASTE.end.length;
    }

    if (this.buffer.startsWith(`${ESC}[`)) {
      // CSI u format: ESC [ keycode ; modifiers u
      const csiUMatch = this.buffer.match(CSI_U_PATTERN);
      if (csiUMatch) {
        const keycode = parseInt(csiUMatch[1] ?? '0', 10);
        const modifiers = csiUMatch[2] ? parseInt(csiUMatch[2], 10) : 1;
        const eventType = csiUMatch[3] ? parseInt(csiUMatch[3], 10) : 1;

        if (eventType === 3) return csiUMatch[0].length; // Skip release

        this.emitKey(keyEvent(this.getKeyName(keycode), decodeModifiers(modifiers)));
        return csiUMatch[0].length;
      }

      const otherKeysMatch = this.buffer.match(MODIFY_OTHER_KEYS_PATTERN);
      if (otherKeysMatch) {
        const modifiers = parseInt(otherKeysMatch[1] ?? '1', 10);
        const keycode = parseInt(otherKeysMatch[2] ?? '0', 10);
        this.emitKey(keyEvent(this.getKeyName(keycode), decodeModifiers(modifiers)));
        return otherKeysMatch[0].length;
      }
    }

    // Known escape sequences
    if (firstChar === ESC && this.buffer.length > 1) {
      for (const [seq, mapping] of SORTED_SEQUENCES) {
        if (this.buffer.startsWith(ESC + seq)) {
          this.emitKey(keyEvent(mapping.key, mapping));
          return 1 + seq.length;
        }
      }

      // Unrecognized sequences (function keys, reports) are dropped whole
      const csiMatch = this.buffer.match(CSI_PATTERN);
      if (csiMatch) {
        debugLog(`[Input] Ignoring sequence ${JSON.stringify(csiMatch[0])}`);
        return csiMatch[0].length;
      }

      // Alt+key
      const nextChar = this.buffer[1] ?? '';
      const nextCode = nextChar.charCodeAt(0);
      if (nextChar !== '[' && nextChar !== 'O' && nextCode >= 32 && nextCode < 127) {
        this.emitKey(keyEvent(nextChar, { alt: true, shift: nextChar !== nextChar.toLowerCase() }));
        return 2;
      }

      return 0; // Wait for more
    }

    // Lone ESC
    if (firstChar === ESC) {
      return 0;
    }

    // Control characters
    if (firstCode < 32) {
      const event = this.parseControlChar(firstCode);
      if (event) {
        this.emitKey(event);
      }
      return 1;
    }

    // DEL (backspace)
    if (firstCode === 127) {
      this.emitKey(keyEvent('Backspace'));
      return 1;
    }

    // Regular printable character, keeping surrogate pairs together
    const codePoint = this.buffer.codePointAt(0) ?? firstCode;
    const char = String.fromCodePoint(codePoint);
    this.emitKey(keyEvent(char, {
      shift: char !== char.toLowerCase() && char.toLowerCase() !== char.toUpperCase(),
    }));
    return char.length;
  }

  private getKeyName(keycode: number): string {
    const special: Record<number, string> = {
      9: 'Tab',
      13: 'Enter',
      27: 'Escape',
      127: 'Backspace',
    };
    return special[keycode] ?? String.fromCodePoint(keycode);
  }

  private parseControlChar(code: number): KeyEvent | null {
    switch (code) {
      case 8:
        return keyEvent('Backspace');
      case 9:
        return keyEvent('Tab');
      case 10:
      case 13:
        return keyEvent('Enter');
      default: {
        const char = CTRL_CHARS[code];
        return char ? keyEvent(char, { ctrl: true }) : null;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Event Emission
  // ─────────────────────────────────────────────────────────────────────────

  private emitKey(event: KeyEvent): void {
    for (const callback of this.keyCallbacks) {
      callback(event);
    }
  }

  private emitPaste(text: string): void {
    for (const callback of this.pasteCallbacks) {
      callback(text);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Testing Support
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Feed raw terminal input as if it had been read from stdin.
   */
  simulateInput(data: string): void {
    this.buffer += data;
    this.parseBuffer();
  }

  /**
   * Deliver a resize notification as if the terminal had changed size.
   */
  simulateResize(width: number, height: number): void {
    for (const callback of this.resizeCallbacks) {
      callback(width, height);
    }
  }
}

// ============================================
// Factory Function
// ============================================

export function createInputHandler(streams?: InputStreams): InputHandler {
  return new InputHandler(streams);
}
