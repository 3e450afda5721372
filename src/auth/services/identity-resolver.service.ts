import { Injectable } from '@nestjs/common';
import { AuthError, UnauthorizedError } from '../../common/errors/auth.errors';
import { UsersService } from '../../users/users.service';
import { LoggerService } from '../../utils/logger/logger.service';
import {
  AuthenticatedPrincipal,
  Identity,
} from '../shared/interfaces/identity.interface';
import { ImpersonationService } from './impersonation.service';
import { SessionService } from './session.service';
import { TokenService } from './token.service';

/**
 * Turns a bearer access token into the acting identity. A token is only as
 * good as the session record behind it, so both are checked on every call.
 */
@Injectable()
export class IdentityResolverService {
  constructor(
    private readonly tokenService: TokenService,
    private readonly sessionService: SessionService,
    private readonly impersonationService: ImpersonationService,
    private readonly usersService: UsersService,
    private readonly securityLogger: LoggerService,
  ) {}

  /**
   * @throws UnauthorizedError for any token or session problem, without
   * saying which. Store failures propagate unchanged.
   */
  async resolve(token: string): Promise<Identity> {
    try {
      const claims = await this.tokenService.decode(token, 'access');

      if (claims.kind === 'regular') {
        const session = await this.sessionService.requireLive(claims);
        return {
          impersonating: false,
          userId: session.userId,
          sessionId: session.id,
        };
      }

      const session = await this.impersonationService.requireLive(claims);
      return {
        impersonating: true,
        userId: session.targetUserId,
        adminUserId: session.adminUserId,
        reason: session.reason,
        sessionId: session.id,
      };
    } catch (error) {
      if (error instanceof AuthError) {
        this.securityLogger.security('TOKEN_REJECTED', { kind: error.kind });
        throw new UnauthorizedError();
      }
      throw error;
    }
  }

  /**
   * Identity plus the accounts behind it. Fails when the acting user, or the
   * administrator of an impersonation, is gone or deactivated.
   */
  async resolvePrincipal(token: string): Promise<AuthenticatedPrincipal> {
    const identity = await this.resolve(token);

    const user = await this.usersService.findById(identity.userId);
    if (!user || !user.isActive) {
      throw new UnauthorizedError();
    }
    if (!identity.impersonating) {
      return { identity, user, admin: null };
    }

    const admin = await this.usersService.findById(identity.adminUserId);
    if (!admin || !admin.isActive || !admin.isAdmin) {
      throw new UnauthorizedError();
    }
    return { identity, user, admin };
  }
}
