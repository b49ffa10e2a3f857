/**
 * Document File I/O
 *
 * Loads a file into a character sequence (CRLF normalized to LF) and writes
 * a sequence back verbatim.
 */

import { readFile, writeFile } from 'fs/promises';
import { debugLog } from '../debug.ts';
import { DocumentSaveError } from './errors.ts';
import { toCharacters } from './buffer.ts';

export interface LoadedDocument {
  path: string;
  characters: string[];
  /** False when the file was missing or unreadable */
  existed: boolean;
}

export type SaveResult =
  | { status: 'saved'; path: string; bytes: number }
  | { status: 'skipped' };

/**
 * Read `path` as UTF-8 with every `\r` removed. A missing or unreadable file
 * yields an empty document still tied to the path, so a later save creates it.
 */
export async function loadDocument(path: string): Promise<LoadedDocument> {
  try {
    const content = await readFile(path, 'utf8');
    debugLog(`[DocumentFile] Read ${content.length} chars from ${path}`);
    return { path, characters: toCharacters(content), existed: true };
  } catch (error) {
    debugLog(`[DocumentFile] Opening ${path} as a new file: ${error}`);
    return { path, characters: [], existed: false };
  }
}

/**
 * Write `text` as the full contents of `path`. Without a path nothing is
 * written.
 *
 * @throws DocumentSaveError when the write fails
 */
export async function saveDocument(path: string | null, text: string): Promise<SaveResult> {
  if (path === null) {
    debugLog('[DocumentFile] Save skipped: buffer has no path');
    return { status: 'skipped' };
  }

  try {
    await writeFile(path, text, 'utf8');
  } catch (error) {
    throw new DocumentSaveError(path, error);
  }

  const bytes = Buffer.byteLength(text, 'utf8');
  debugLog(`[DocumentFile] Wrote ${bytes} bytes to ${path}`);
  return { status: 'saved', path, bytes };
}
