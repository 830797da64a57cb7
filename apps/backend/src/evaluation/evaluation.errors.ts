import { HttpStatus } from '@nestjs/common';
import { BadRequestError, BaseAppError } from '../common/errors';

/** Rejected before any work begins: empty essay or no prompt. */
export class InvalidInputError extends BadRequestError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
  }
}

export class EvaluationCancelledError extends BaseAppError {
  constructor() {
    super('Evaluation was cancelled by the caller', HttpStatus.REQUEST_TIMEOUT, 'EVALUATION_CANCELLED');
  }
}

export class EvaluationFailedError extends BaseAppError {
  constructor(message: string, cause: unknown) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, 'EVALUATION_FAILED', { cause });
  }
}
