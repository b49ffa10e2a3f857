/**
 * Editor Errors
 */

/**
 * Base class for errors raised by the editor core.
 */
export class TenonError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * No line span contains an offset that should be legal.
 * Means the line index is out of sync with the data.
 */
export class LineIndexError extends TenonError {
  readonly offset: number;

  constructor(offset: number, length: number) {
    super('LINE_INDEX_CORRUPT', `No line contains offset ${offset} (data length ${length})`);
    this.offset = offset;
  }
}

/**
 * Writing a document to disk failed.
 */
export class DocumentSaveError extends TenonError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DOCUMENT_SAVE_FAILED', `Failed to save ${path}: ${reason}`, { cause });
    this.path = path;
  }
}
