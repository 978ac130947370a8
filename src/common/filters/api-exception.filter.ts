import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import type { Response } from 'express';

import { DomainError, DomainErrorCode } from '../../domain/errors/domain.errors';
import { AppLogger } from '../../modules/logging/app-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';

export type ApiErrorCode = DomainErrorCode | 'unauthorized' | 'internal' | 'httpError';

/** Error body shared by every failing route. `status` is the HTTP code as text. */
export interface ApiErrorBody {
  status: string;
  code: ApiErrorCode;
  detail: string;
}

const DOMAIN_STATUS: Record<DomainErrorCode, number> = {
  invalidValue: HttpStatus.BAD_REQUEST,
  uniqueness: HttpStatus.CONFLICT,
  uniquenessRace: HttpStatus.CONFLICT,
  provisioningFailed: HttpStatus.SERVICE_UNAVAILABLE,
  cleanupFailed: HttpStatus.INTERNAL_SERVER_ERROR,
  notFound: HttpStatus.NOT_FOUND,
  forbidden: HttpStatus.FORBIDDEN,
};

const HTTP_CODES: Partial<Record<number, ApiErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: 'invalidValue',
  [HttpStatus.UNAUTHORIZED]: 'unauthorized',
  [HttpStatus.FORBIDDEN]: 'forbidden',
  [HttpStatus.NOT_FOUND]: 'notFound',
  [HttpStatus.CONFLICT]: 'uniqueness',
};

export function statusForDomainError(error: DomainError): number {
  return DOMAIN_STATUS[error.code];
}

/**
 * Renders domain errors, Nest HttpExceptions (ValidationPipe failures
 * included) and anything unexpected into one JSON envelope.
 */
@Catch()
@Injectable()
export class ApiExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: AppLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.toBody(exception);

    response
      .status(status)
      .setHeader('Content-Type', 'application/json; charset=utf-8')
      .json(body);
  }

  private toBody(exception: unknown): [number, ApiErrorBody] {
    if (exception instanceof DomainError) {
      const status = statusForDomainError(exception);
      return [status, { status: String(status), code: exception.code, detail: exception.message }];
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return [
        status,
        {
          status: String(status),
          code: HTTP_CODES[status] ?? 'httpError',
          detail: this.httpDetail(exception),
        },
      ];
    }

    this.logger.error(LogCategory.HTTP, 'Unhandled error', exception);
    const status = HttpStatus.INTERNAL_SERVER_ERROR;
    return [status, { status: String(status), code: 'internal', detail: 'Internal server error' }];
  }

  private httpDetail(exception: HttpException): string {
    const raw = exception.getResponse();
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'object' && raw !== null && 'message' in raw) {
      const message: unknown = raw.message;
      // ValidationPipe reports one message per failed constraint
      if (Array.isArray(message)) return message.map(String).join('; ');
      if (typeof message === 'string') return message;
    }
    return exception.message;
  }
}
