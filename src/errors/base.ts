export type SiftErrorCode =
  | 'INVALID_CONFIG'
  | 'EXTRACTION_ERROR'
  | 'EMBEDDING_ERROR'
  | 'INDEX_CORRUPT'
  | 'STORE_UNAVAILABLE';

/**
 * Root of every error the engine raises on purpose. The `code` is stable and
 * reaches HTTP and MCP clients; the message is for humans.
 */
export abstract class SiftError extends Error {
  abstract readonly code: SiftErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { error: string; code: SiftErrorCode } {
    return { error: this.message, code: this.code };
  }
}
