import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

/**
 * Logs the response time of every request. Grading requests are dominated by
 * judge round trips, so slow entries here usually point at the LLM provider.
 */
@Injectable()
export class PerformanceInterceptor implements NestInterceptor {
  private readonly logger = new Logger(PerformanceInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const { method, url } = context.switchToHttp().getRequest<Request>();
    const start = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(`${method} ${url} - ${Date.now() - start}ms`);
        },
        error: (error: unknown) => {
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`${method} ${url} - ${Date.now() - start}ms - ERROR: ${message}`);
        },
      }),
    );
  }
}
