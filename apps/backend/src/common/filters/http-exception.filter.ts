import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string | string[];
  timestamp: string;
  path: string;
  // Only included in non-production environments
  stack?: string;
}

// SQLSTATE codes surfaced as client errors
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_UNIQUE_VIOLATION = '23505';

function readSqlState(exception: Error): string | null {
  if ('code' in exception && typeof exception.code === 'string') {
    return exception.code;
  }
  return null;
}

function readMessage(body: object, fallback: string): string | string[] {
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
    if (Array.isArray(message) && message.every((item) => typeof item === 'string')) {
      return message;
    }
  }
  return fallback;
}

/**
 * Global exception filter: consistent JSON error bodies, stack traces only
 * outside production, database failures mapped to 4xx/503.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);
  private readonly isProduction = process.env.NODE_ENV === 'production';

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (response.headersSent) {
      const status = exception instanceof HttpException ? exception.getStatus() : 500;
      this.logError(request, status, exception);
      return;
    }

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const body = exception.getResponse();
      error = this.getErrorName(status);

      if (typeof body === 'string') {
        message = body;
      } else {
        message = readMessage(body, exception.message);
        if ('error' in body && typeof body.error === 'string') {
          error = body.error;
        }
      }
    } else if (exception instanceof Error) {
      message = this.isProduction ? 'Internal server error' : exception.message;

      const sqlState = readSqlState(exception);
      if (sqlState === PG_FOREIGN_KEY_VIOLATION) {
        status = HttpStatus.BAD_REQUEST;
        error = 'Bad Request';
        message = 'Referenced record does not exist';
      } else if (sqlState === PG_UNIQUE_VIOLATION) {
        status = HttpStatus.CONFLICT;
        error = 'Conflict';
        message = 'Record already exists';
      } else if (this.isDatabaseConnectionError(exception)) {
        status = HttpStatus.SERVICE_UNAVAILABLE;
        error = 'Service Unavailable';
        message = 'Service temporarily unavailable. Please try again later.';
        response.setHeader('Retry-After', '30');
      }
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      error,
      message,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (!this.isProduction && exception instanceof Error) {
      errorResponse.stack = exception.stack;
    }

    this.logError(request, status, exception);

    response.status(status).json(errorResponse);
  }

  private getErrorName(status: number): string {
    const errorNames: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: 'Bad Request',
      [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
      [HttpStatus.FORBIDDEN]: 'Forbidden',
      [HttpStatus.NOT_FOUND]: 'Not Found',
      [HttpStatus.CONFLICT]: 'Conflict',
      [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
      [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
    };
    return errorNames[status] || 'Error';
  }

  private isDatabaseConnectionError(exception: Error): boolean {
    const errorMessage = exception.message.toLowerCase();
    return (
      errorMessage.includes('econnrefused') ||
      errorMessage.includes('connection refused') ||
      errorMessage.includes('connection terminated') ||
      errorMessage.includes('too many connections') ||
      (readSqlState(exception) ?? '').startsWith('08')
    );
  }

  private logError(request: Request, status: number, exception: unknown): void {
    const { method, url, ip } = request;
    const logContext = JSON.stringify({ method, url, ip, status });

    if (status >= 500) {
      this.logger.error(
        `[${method}] ${url} - ${status}`,
        exception instanceof Error ? exception.stack : String(exception),
        logContext,
      );
    } else if (status === 401 || status === 403) {
      this.logger.warn(`[${method}] ${url} - ${status}`, logContext);
    } else {
      this.logger.debug(`[${method}] ${url} - ${status}`, logContext);
    }
  }
}
