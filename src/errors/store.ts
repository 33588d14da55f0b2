import { SiftError } from './base.js';

/** The sparse-index cache failed validation or deserialization. Never surfaced to callers. */
export class IndexCorruptError extends SiftError {
  readonly code = 'INDEX_CORRUPT';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class StoreUnavailableError extends SiftError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
