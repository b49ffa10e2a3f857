/**
 * Keybindings
 *
 * Maps key events to editor commands. Bindings are strings such as
 * 'ctrl+s' or 'arrowup'; modifiers may come in any order.
 */

import { debugLog } from '../debug.ts';
import type { KeyEvent } from '../ui/types.ts';

// ============================================
// Types
// ============================================

export const COMMAND_IDS = [
  'app.quit',
  'file.save',
  'cursor.left',
  'cursor.right',
  'cursor.up',
  'cursor.down',
  'edit.newline',
  'edit.backspace',
  'edit.deleteForward',
] as const;

export type CommandId = (typeof COMMAND_IDS)[number];

export interface KeyBinding {
  key: string;
  command: CommandId;
}

export type CommandHandler = () => void | Promise<void>;

/**
 * Default keybindings.
 */
export const DEFAULT_KEYBINDINGS: readonly KeyBinding[] = [
  { key: 'ctrl+q', command: 'app.quit' },
  { key: 'ctrl+s', command: 'file.save' },
  { key: 'arrowleft', command: 'cursor.left' },
  { key: 'arrowright', command: 'cursor.right' },
  { key: 'arrowup', command: 'cursor.up' },
  { key: 'arrowdown', command: 'cursor.down' },
  { key: 'enter', command: 'edit.newline' },
  { key: 'backspace', command: 'edit.backspace' },
  { key: 'delete', command: 'edit.deleteForward' },
];

// ============================================
// Key Strings
// ============================================

const KEY_ALIASES: Record<string, string> = {
  up: 'arrowup',
  down: 'arrowdown',
  left: 'arrowleft',
  right: 'arrowright',
  return: 'enter',
  esc: 'escape',
  del: 'delete',
};

const MODIFIER_ALIASES: Record<string, string> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  cmd: 'ctrl',
  shift: 'shift',
  alt: 'alt',
  option: 'alt',
  meta: 'meta',
  win: 'meta',
  super: 'meta',
};

/**
 * Normalize a binding string: lower case, aliases resolved, modifiers
 * sorted ahead of the key.
 */
export function normalizeKeyString(keyString: string): string {
  const modifiers: string[] = [];
  let key = '';

  for (const part of keyString.toLowerCase().split('+')) {
    const trimmed = part.trim();
    const modifier = MODIFIER_ALIASES[trimmed];
    if (modifier) {
      modifiers.push(modifier);
    } else {
      key = KEY_ALIASES[trimmed] ?? trimmed;
    }
  }

  // A binding for the '+' key itself splits into empty parts
  if (key === '' && keyString.endsWith('+')) {
    key = '+';
  }

  modifiers.sort();
  return [...modifiers, key].join('+');
}

/**
 * Normalized string for a key event.
 */
export function eventToKeyString(event: KeyEvent): string {
  const modifiers: string[] = [];
  if (event.ctrl) modifiers.push('ctrl');
  if (event.shift) modifiers.push('shift');
  if (event.alt) modifiers.push('alt');
  if (event.meta) modifiers.push('meta');
  modifiers.sort();
  return [...modifiers, event.key.toLowerCase()].join('+');
}

/**
 * Character a key event types into the buffer, or null for keys that do
 * not insert text (named keys, control characters, modified keys).
 */
export function printableCharacter(event: KeyEvent): string | null {
  if (event.ctrl || event.alt || event.meta) return null;

  const chars = [...event.key];
  const ch = chars[0];
  if (chars.length !== 1 || ch === undefined) return null;

  const code = ch.codePointAt(0) ?? 0;
  if (code < 32 || code === 127) return null;

  if (!event.shift) return ch;
  // Some letters upper-case to more than one character ('ß' -> 'SS')
  const upper = ch.toUpperCase();
  return [...upper].length === 1 ? upper : ch;
}

export function isCommandId(value: unknown): value is CommandId {
  return typeof value === 'string' && COMMAND_IDS.some((id) => id === value);
}

/**
 * Validate keybindings parsed from a user file. Malformed entries are
 * dropped with a log line.
 */
export function parseKeybindings(raw: unknown, source: string): KeyBinding[] {
  if (!Array.isArray(raw)) {
    debugLog(`[Keybindings] Ignoring ${source}: expected an array`);
    return [];
  }

  const entries: unknown[] = raw;
  const bindings: KeyBinding[] = [];
  for (const entry of entries) {
    if (typeof entry === 'object' && entry !== null && 'key' in entry && 'command' in entry) {
      const { key, command } = entry;
      if (typeof key === 'string' && key.length > 0 && isCommandId(command)) {
        bindings.push({ key, command });
        continue;
      }
    }
    debugLog(`[Keybindings] Ignoring invalid entry in ${source}: ${JSON.stringify(entry)}`);
  }
  return bindings;
}

// ============================================
// Keybinding Adapter
// ============================================

export class KeybindingAdapter {
  private commandHandlers = new Map<CommandId, CommandHandler>();
  private bindings: KeyBinding[] = [...DEFAULT_KEYBINDINGS];

  /**
   * Register a command handler.
   */
  registerCommand(commandId: CommandId, handler: CommandHandler): () => void {
    this.commandHandlers.set(commandId, handler);
    return () => {
      this.commandHandlers.delete(commandId);
    };
  }

  /**
   * Register multiple command handlers.
   */
  registerCommands(commands: Partial<Record<CommandId, CommandHandler>>): () => void {
    const unsubscribes: Array<() => void> = [];
    for (const commandId of COMMAND_IDS) {
      const handler = commands[commandId];
      if (handler) {
        unsubscribes.push(this.registerCommand(commandId, handler));
      }
    }
    return () => {
      for (const unsub of unsubscribes) {
        unsub();
      }
    };
  }

  /**
   * Replace the binding table. Earlier entries win when keys collide.
   */
  setKeybindings(bindings: readonly KeyBinding[]): void {
    this.bindings = [...bindings];
  }

  getKeybindings(): KeyBinding[] {
    return [...this.bindings];
  }

  getBindingForCommand(commandId: CommandId): string | null {
    return this.bindings.find((b) => b.command === commandId)?.key ?? null;
  }

  /**
   * Command bound to a key event, if any.
   */
  resolve(event: KeyEvent): CommandId | null {
    const keyString = eventToKeyString(event);
    const binding = this.bindings.find((b) => normalizeKeyString(b.key) === keyString);
    return binding?.command ?? null;
  }

  /**
   * Run the command bound to `event`. Resolves to true when a handler ran.
   */
  async execute(event: KeyEvent): Promise<boolean> {
    const commandId = this.resolve(event);
    if (!commandId) return false;

    const handler = this.commandHandlers.get(commandId);
    if (!handler) return false;

    debugLog(`[Keybindings] ${eventToKeyString(event)} -> ${commandId}`);
    await handler();
    return true;
  }
}

export function createKeybindingAdapter(): KeybindingAdapter {
  return new KeybindingAdapter();
}
