import { SiftError } from './base.js';

export class ExtractionError extends SiftError {
  readonly code = 'EXTRACTION_ERROR';

  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/** `statusCode` is the embedding server's HTTP status, when it answered at all. */
export class EmbeddingError extends SiftError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}
