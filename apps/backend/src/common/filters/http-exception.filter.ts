import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { BaseAppError, ValidationError, type ValidationField } from '../errors';

interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  fields?: ValidationField[];
}

/**
 * Global exception filter that converts all exceptions to a consistent JSON response format.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error = 'INTERNAL_SERVER_ERROR';
    let fields: ValidationField[] | undefined;

    if (exception instanceof BaseAppError) {
      status = exception.statusCode;
      message = exception.message;
      error = exception.errorCode || exception.name;
      if (exception instanceof ValidationError) {
        fields = exception.fields;
      }
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        const rawMessage = 'message' in exceptionResponse ? exceptionResponse.message : undefined;
        const rawError = 'error' in exceptionResponse ? exceptionResponse.error : undefined;
        if (Array.isArray(rawMessage)) {
          message = rawMessage.join(', ');
        } else if (typeof rawMessage === 'string' && rawMessage) {
          message = rawMessage;
        }
        if (rawError) {
          error = String(rawError);
        }
      }
    }

    // Raw messages of unclassified errors stay in the server log only.
    if (status >= 500) {
      const internalMessage = exception instanceof Error ? exception.message : 'Unknown';
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${internalMessage}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${message}`);
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(fields && { fields }),
    };

    response.status(status).json(errorResponse);
  }
}
