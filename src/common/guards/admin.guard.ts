import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { AdminRequiredError } from '../errors/auth.errors';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/**
 * Admin-only routes. An impersonation token never qualifies, even when the
 * impersonated user is an administrator.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const { principal } = context
      .switchToHttp()
      .getRequest<AuthenticatedRequest>();

    if (
      !principal ||
      principal.identity.impersonating ||
      !principal.user.isAdmin
    ) {
      throw new AdminRequiredError();
    }
    return true;
  }
}
