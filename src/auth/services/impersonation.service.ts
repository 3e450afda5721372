import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, IdGenerator } from '../../common/clock/clock';
import { addMinutes, hasPassed } from '../../common/clock/time.util';
import {
  AdminRequiredError,
  InvalidTokenError,
  NotAuthorizedError,
  NotFoundError,
  ReasonRequiredError,
  SelfImpersonationForbiddenError,
  SessionExpiredError,
  SessionRevokedError,
  TargetUserInactiveError,
} from '../../common/errors/auth.errors';
import { UserAccount } from '../../users/interfaces/user-account.interface';
import { UsersService } from '../../users/users.service';
import { LoggerService } from '../../utils/logger/logger.service';
import {
  ImpersonationGrant,
  ImpersonationSummary,
  RefreshedAccess,
} from '../shared/interfaces/issued-tokens.interface';
import { RequestContext } from '../shared/interfaces/request-context.interface';
import { ImpersonationSession } from '../shared/interfaces/session-records.interface';
import { ImpersonationTokenClaims } from '../shared/interfaces/token-claims.interface';
import { observeImpersonationStatus } from '../shared/session-state';
import { SessionStore } from '../store/session-store';
import { TokenService } from './token.service';

/**
 * Time-boxed sessions in which an administrator acts as another user.
 *
 * State per session: `active -> revoked` on an explicit end, and
 * `active -> expired` once `expiresAt` passes. Expiry is observed on read;
 * the stored status is only rewritten by {@link expireLapsed}.
 */
@Injectable()
export class ImpersonationService {
  private readonly logger = new Logger(ImpersonationService.name);
  private readonly timeoutMinutes: number;

  constructor(
    private readonly tokenService: TokenService,
    private readonly store: SessionStore,
    private readonly usersService: UsersService,
    private readonly clock: Clock,
    private readonly ids: IdGenerator,
    private readonly securityLogger: LoggerService,
    configService: ConfigService,
  ) {
    this.timeoutMinutes = configService.getOrThrow<number>(
      'impersonation.timeoutMinutes',
    );
  }

  /**
   * Preconditions are checked in order and the first failure wins: admin
   * flag, self-impersonation, target state, reason.
   */
  async start(
    admin: UserAccount,
    targetUserId: string,
    reason: string | undefined,
    context: RequestContext = {},
  ): Promise<ImpersonationGrant> {
    if (!admin.isAdmin) {
      throw new AdminRequiredError();
    }
    if (admin.id === targetUserId) {
      throw new SelfImpersonationForbiddenError();
    }

    const target = await this.usersService.findById(targetUserId);
    if (!target || !target.isActive) {
      throw new TargetUserInactiveError();
    }

    const trimmedReason = reason?.trim() ?? '';
    if (!trimmedReason) {
      throw new ReasonRequiredError();
    }

    const now = this.clock.now();
    const session: ImpersonationSession = {
      id: this.ids.generate(),
      adminUserId: admin.id,
      targetUserId: target.id,
      reason: trimmedReason,
      issuedAt: now,
      expiresAt: addMinutes(now, this.timeoutMinutes),
      endedAt: null,
      status: 'active',
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
    };
    await this.store.impersonation.put(session);

    const subject = {
      kind: 'impersonation' as const,
      sub: target.id,
      adminId: admin.id,
      sessionId: session.id,
    };
    const access = await this.tokenService.issueAccess(
      subject,
      now,
      session.expiresAt,
    );
    const refresh = await this.tokenService.issueRefresh(
      subject,
      now,
      session.expiresAt,
    );

    this.securityLogger.security(
      'IMPERSONATION_STARTED',
      {
        sessionId: session.id,
        targetUserId: target.id,
        reason: session.reason,
        expiresAt: session.expiresAt.toISOString(),
        ipAddress: session.ipAddress,
      },
      admin.id,
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresIn: access.expiresIn,
      session,
    };
  }

  /**
   * Ends the session for the admin who started it. Ending a session that is
   * already revoked or expired succeeds and leaves it as it was.
   */
  async end(
    adminUserId: string,
    sessionId: string,
  ): Promise<ImpersonationSession> {
    const existing = await this.store.impersonation.get(sessionId);
    if (!existing) {
      throw new NotFoundError('Impersonation session not found');
    }
    if (existing.adminUserId !== adminUserId) {
      throw new NotAuthorizedError(
        'Only the administrator who started an impersonation can end it',
      );
    }

    const now = this.clock.now();
    let ended = false;
    const session = await this.store.impersonation.update(
      sessionId,
      (current) => {
        if (observeImpersonationStatus(current, now) !== 'active') {
          return current;
        }
        ended = true;
        return { ...current, status: 'revoked', endedAt: now };
      },
    );

    if (ended) {
      this.securityLogger.security(
        'IMPERSONATION_ENDED',
        { sessionId, targetUserId: session.targetUserId },
        adminUserId,
      );
    }
    return session;
  }

  /** The admin's sessions, newest first, with usernames for display. */
  async listForAdmin(admin: UserAccount): Promise<ImpersonationSummary[]> {
    if (!admin.isAdmin) {
      throw new AdminRequiredError();
    }

    const now = this.clock.now();
    const sessions = await this.store.impersonation.findByOwner(admin.id);
    const users = await this.usersService.findByIds([
      admin.id,
      ...sessions.map((session) => session.targetUserId),
    ]);
    const usernames = new Map(users.map((user) => [user.id, user.username]));

    return [...sessions]
      .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime())
      .map((session) => ({
        ...session,
        status: observeImpersonationStatus(session, now),
        adminUsername: usernames.get(session.adminUserId) ?? null,
        targetUsername: usernames.get(session.targetUserId) ?? null,
      }));
  }

  /** The live session behind an impersonation token. */
  async requireLive(
    claims: ImpersonationTokenClaims,
  ): Promise<ImpersonationSession> {
    const session = await this.store.impersonation.get(claims.sessionId);
    if (
      !session ||
      session.targetUserId !== claims.sub ||
      session.adminUserId !== claims.adminId
    ) {
      throw new InvalidTokenError();
    }

    const status = observeImpersonationStatus(session, this.clock.now());
    if (status === 'revoked') {
      throw new SessionRevokedError('Impersonation session has ended');
    }
    if (status === 'expired') {
      throw new SessionExpiredError('Impersonation session expired');
    }
    return session;
  }

  async refresh(
    claims: ImpersonationTokenClaims,
    refreshToken: string,
  ): Promise<RefreshedAccess> {
    const session = await this.requireLive(claims);
    const access = await this.tokenService.issueAccess(
      {
        kind: 'impersonation',
        sub: session.targetUserId,
        adminId: session.adminUserId,
        sessionId: session.id,
      },
      this.clock.now(),
      session.expiresAt,
    );

    this.securityLogger.security(
      'IMPERSONATION_REFRESHED',
      { sessionId: session.id, targetUserId: session.targetUserId },
      session.adminUserId,
    );

    return {
      accessToken: access.token,
      refreshToken,
      expiresIn: access.expiresIn,
      userId: session.targetUserId,
    };
  }

  /**
   * Rewrites lapsed `active` records as `expired`. Readers do not depend on
   * this; they observe expiry from the timestamps.
   *
   * @returns how many records were rewritten.
   */
  async expireLapsed(): Promise<number> {
    const now = this.clock.now();
    const lapsed = await this.store.impersonation.findLapsed(now);

    let expired = 0;
    for (const candidate of lapsed) {
      let changed = false;
      const session = await this.store.impersonation.update(
        candidate.id,
        (current) => {
          if (current.status !== 'active' || !hasPassed(current.expiresAt, now)) {
            return current;
          }
          changed = true;
          return { ...current, status: 'expired' };
        },
      );

      if (changed) {
        expired += 1;
        this.securityLogger.security(
          'IMPERSONATION_EXPIRED',
          { sessionId: session.id, targetUserId: session.targetUserId },
          session.adminUserId,
        );
      }
    }

    if (expired > 0) {
      this.logger.log(`Marked ${expired} impersonation sessions expired`);
    }
    return expired;
  }
}
