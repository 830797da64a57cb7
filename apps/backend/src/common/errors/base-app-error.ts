import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Base application error class.
 * All custom errors extend this class so the exception filter can classify
 * them by `errorCode` instead of by message text.
 */
export class BaseAppError extends HttpException {
  constructor(
    message: string,
    public readonly statusCode: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly errorCode?: string,
    options?: { cause?: unknown },
  ) {
    super(message, statusCode, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      message: this.message,
      error: this.errorCode || this.name,
      timestamp: new Date().toISOString(),
    };
  }
}
