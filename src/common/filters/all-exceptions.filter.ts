import type { ArgumentsHost } from '@nestjs/common';
import { Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';
import { DuplicateValueError } from '../exceptions';

// Postgres unique_violation, and the SQLite message used by the test database.
const UNIQUE_VIOLATION_CODE = '23505';
const SQLITE_UNIQUE_MESSAGE = 'UNIQUE constraint failed';

export function isUniqueViolation(exception: unknown): exception is QueryFailedError {
  if (!(exception instanceof QueryFailedError)) {
    return false;
  }
  const code: unknown = Reflect.get(exception.driverError ?? {}, 'code');
  return code === UNIQUE_VIOLATION_CODE || exception.message.includes(SQLITE_UNIQUE_MESSAGE);
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const normalized = isUniqueViolation(exception) ? new DuplicateValueError() : exception;

    let status: number;
    let message: unknown;
    let error: string;

    if (normalized instanceof HttpException) {
      status = normalized.getStatus();
      const exceptionResponse = normalized.getResponse();

      if (typeof exceptionResponse === 'object') {
        const responseMessage: unknown = Reflect.get(exceptionResponse, 'message');
        const responseCode: unknown = Reflect.get(exceptionResponse, 'code');
        const responseError: unknown = Reflect.get(exceptionResponse, 'error');
        message = responseMessage || normalized.message;
        // Domain exceptions carry a stable code
        if (typeof responseCode === 'string' && responseCode) {
          error = responseCode;
        } else {
          error = typeof responseError === 'string' && responseError ? responseError : normalized.name;
        }
      } else {
        message = exceptionResponse;
        error = normalized.name;
      }
    } else if (normalized instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';
      error = 'InternalServerError';
      this.logger.error(`Unexpected error: ${normalized.message}`, normalized.stack);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';
      error = 'InternalServerError';
      this.logger.error(`Unexpected non-error thrown: ${String(normalized)}`);
    }

    response.status(status).json({
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
