import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthError } from '../errors/auth.errors';

export interface ErrorResponseBody {
  statusCode: number;
  kind: string;
  message: string;
  /** Field messages of a failed body validation. */
  errors?: string[];
}

/** `TOO_MANY_REQUESTS` -> `TooManyRequests`. */
export function kindForStatus(status: number): string {
  const name: string | undefined = HttpStatus[status];
  if (!name) {
    return 'Error';
  }
  return name
    .toLowerCase()
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Renders every error as `{statusCode, kind, message}`. Anything that is not
 * an `HttpException` becomes an opaque 500 and is logged with its stack.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const body = this.toErrorBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    response.status(body.statusCode).json(body);
  }

  toErrorBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof AuthError) {
      return {
        statusCode: exception.getStatus(),
        kind: exception.kind,
        message: exception.message,
      };
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const kind = kindForStatus(statusCode);
      const payload = exception.getResponse();
      const details =
        typeof payload === 'object' && 'message' in payload
          ? payload.message
          : undefined;

      if (Array.isArray(details)) {
        return {
          statusCode,
          kind,
          message: 'Validation failed',
          errors: details.map(String),
        };
      }
      return { statusCode, kind, message: exception.message };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      kind: 'InternalError',
      message: 'Internal server error',
    };
  }
}
