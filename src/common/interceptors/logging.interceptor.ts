import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/** One line per request. Bodies are never logged, they carry tokens. */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<AuthenticatedRequest>();
    const response = http.getResponse<Response>();
    const { method, url } = request;
    const actor = this.describeActor(request);
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            `${method} ${url} ${response.statusCode} - ${Date.now() - startedAt}ms - ${actor}`,
          );
        },
        error: (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          const status =
            error instanceof HttpException
              ? error.getStatus()
              : HttpStatus.INTERNAL_SERVER_ERROR;
          this.logger.warn(
            `${method} ${url} ${status} - ${Date.now() - startedAt}ms - ${actor} - ${message}`,
          );
        },
      }),
    );
  }

  private describeActor(request: AuthenticatedRequest): string {
    const principal = request.principal;
    if (!principal) {
      return 'User: anonymous';
    }
    if (principal.identity.impersonating) {
      return `User: ${principal.identity.userId} (impersonated by ${principal.identity.adminUserId})`;
    }
    return `User: ${principal.identity.userId}`;
  }
}
