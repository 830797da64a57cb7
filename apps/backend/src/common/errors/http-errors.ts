import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export class BadRequestError extends BaseAppError {
  constructor(message: string, errorCode?: string) {
    super(message, HttpStatus.BAD_REQUEST, errorCode || 'BAD_REQUEST');
  }
}

export class NotFoundError extends BaseAppError {
  constructor(message: string, errorCode?: string) {
    super(message, HttpStatus.NOT_FOUND, errorCode || 'NOT_FOUND');
  }
}

/** Recoverable collisions; the caller may retry with different input. */
export class ConflictError extends BaseAppError {
  constructor(message: string, errorCode?: string) {
    super(message, HttpStatus.CONFLICT, errorCode || 'CONFLICT');
  }
}
