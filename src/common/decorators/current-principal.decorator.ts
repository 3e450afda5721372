import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import { AuthenticatedPrincipal } from '../../auth/shared/interfaces/identity.interface';
import { UnauthorizedError } from '../errors/auth.errors';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/**
 * The principal `JwtAuthGuard` attached to the request.
 *
 * Usage: `handler(@CurrentPrincipal() principal: AuthenticatedPrincipal)`
 */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedPrincipal => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.principal) {
      throw new UnauthorizedError();
    }
    return request.principal;
  },
);
