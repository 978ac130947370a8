import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { AppLogger } from './app-logger.service';
import { LogCategory } from './log-levels';
import { DomainError } from '../../domain/errors/domain.errors';
import { statusForDomainError } from '../../common/filters/api-exception.filter';

const SLOW_REQUEST_MS = 2000;

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: AppLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    // Generate or propagate correlation request ID
    const requestId = headerValue(request.headers['x-request-id']) || randomUUID();
    response.setHeader('X-Request-Id', requestId);

    // Run the rest of the pipeline within a correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext(
        {
          requestId,
          method: request.method,
          path: url,
          startTime: startedAt,
        },
        () => {
          this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: headerValue(request.headers['user-agent']),
            ip: request.ip || request.socket?.remoteAddress,
          });

          if (request.body && typeof request.body === 'object' && Object.keys(request.body).length > 0) {
            this.logger.trace(LogCategory.HTTP, 'Request body', { body: request.body });
          }

          next.handle().pipe(
            tap((responseBody: unknown) => {
              const durationMs = Date.now() - startedAt;

              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                status: response.statusCode,
                durationMs,
              });

              if (responseBody) {
                this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
              }

              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
                  status: response.statusCode,
                  durationMs,
                });
              }
            }),
            catchError((error: unknown) => {
              const durationMs = Date.now() - startedAt;
              const status = this.extractStatusCode(error);
              const line = `← ${status} ${request.method} ${url}`;

              // Client errors are expected traffic; only 5xx carries a stack
              if (status >= 500) {
                this.logger.error(LogCategory.HTTP, line, error, { status, durationMs });
              } else {
                this.logger.info(LogCategory.HTTP, line, { status, durationMs });
              }
              throw error;
            })
          ).subscribe(subscriber);
        }
      );
    });
  }

  private extractStatusCode(error: unknown): number {
    if (error instanceof HttpException) {
      return error.getStatus();
    }
    if (error instanceof DomainError) {
      return statusForDomainError(error);
    }
    return 500;
  }
}
