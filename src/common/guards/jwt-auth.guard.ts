import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExtractJwt } from 'passport-jwt';
import { IdentityResolverService } from '../../auth/services/identity-resolver.service';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { UnauthorizedError } from '../errors/auth.errors';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

const extractBearerToken = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * Global guard. Resolves the bearer token into a principal and attaches it
 * to the request; routes marked `@Public()` are let through untouched.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly identityResolver: IdentityResolverService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request);
    if (!token) {
      throw new UnauthorizedError('Not authenticated');
    }

    request.principal = await this.identityResolver.resolvePrincipal(token);
    return true;
  }
}
