import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from '../common/errors';

export class EmbeddingError extends BaseAppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, HttpStatus.BAD_GATEWAY, 'EMBEDDING_FAILED', options);
  }
}
