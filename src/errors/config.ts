import { SiftError } from './base.js';

export class InvalidConfigError extends SiftError {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
