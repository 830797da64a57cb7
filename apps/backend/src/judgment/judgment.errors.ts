import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from '../common/errors';

export type JudgmentErrorCode =
  | 'LLM_TIMEOUT'
  | 'LLM_API_ERROR'
  | 'LLM_SCHEMA_INVALID'
  | 'LLM_NOT_CONFIGURED'
  | 'LLM_ABORTED';

export class JudgmentUnavailableError extends BaseAppError {
  constructor(
    public readonly code: JudgmentErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, HttpStatus.SERVICE_UNAVAILABLE, code, options);
  }

  get retryable(): boolean {
    return this.code === 'LLM_TIMEOUT' || this.code === 'LLM_API_ERROR';
  }
}
