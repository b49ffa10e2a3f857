#!/usr/bin/env tsx
/**
 * Tenon - Terminal Text Editor
 *
 * Entry point for the application.
 */

import { createEditorApp, type EditorApp, type InitialDocument } from './app.ts';
import { parseCliArgs } from './cli-args.ts';
import { createConfigManager } from './config/config-manager.ts';
import { loadDocument } from './core/document-file.ts';
import { setDebugEnabled, debugLog } from './debug.ts';
import { createInputHandler } from './terminal/input.ts';
import { createRenderer } from './ui/renderer.ts';

const VERSION = '0.1.0';

const USAGE = `
Tenon - Terminal Text Editor

Usage: tenon [options] [--] [file]

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log
  --                      End of options; the next argument is the file

Keys:
  ctrl+s                  Save
  ctrl+q                  Quit

Examples:
  tenon                   Start with an empty, unnamed buffer
  tenon notes.txt         Open notes.txt (created on first save)
  tenon --debug notes.txt Open with debug logging
`;

// Parse command line arguments
const command = parseCliArgs(process.argv.slice(2));

if (command.kind === 'help') {
  console.log(USAGE);
  process.exit(0);
}

if (command.kind === 'version') {
  console.log(`Tenon v${VERSION}`);
  process.exit(0);
}

if (command.kind === 'error') {
  console.error(`tenon: ${command.message}`);
  console.error(USAGE);
  process.exit(1);
}

const pathArg = command.kind === 'run' ? command.path : undefined;
setDebugEnabled(command.kind === 'run' && command.debug);

let app: EditorApp | null = null;

async function main(): Promise<void> {
  debugLog('[Main] Starting Tenon...');

  const config = createConfigManager();
  await config.load();

  let document: InitialDocument = { path: null, content: '' };
  if (pathArg !== undefined) {
    const loaded = await loadDocument(pathArg);
    document = { path: loaded.path, content: loaded.characters.join('') };
  }

  const renderer = createRenderer({
    width: process.stdout.columns || 80,
    height: process.stdout.rows || 24,
  });

  app = createEditorApp({
    renderer,
    input: createInputHandler(),
    document,
    settings: config.getAll(),
    keybindings: config.getKeybindings(),
    onExit: () => {
      debugLog('[Main] Editor exited, terminating process');
      process.exit(0);
    },
  });

  await app.start();
  debugLog('[Main] Tenon started');
}

function shutdown(): void {
  debugLog('[Main] Shutting down...');
  app?.stop();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Global error handlers
function crash(msg: string): void {
  debugLog(msg);
  app?.stop();
  console.error(msg);
  process.exit(1);
}

process.on('uncaughtException', (error: Error) => {
  crash(`[CRASH] Uncaught Exception:\n${error.stack ?? error.message}`);
});

process.on('unhandledRejection', (reason: unknown) => {
  crash(`[CRASH] Unhandled Rejection:\n${reason instanceof Error ? reason.stack : String(reason)}`);
});

main().catch((error: unknown) => {
  crash(`[Main] Fatal error: ${error instanceof Error ? error.message : String(error)}`);
});
