import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, IdGenerator } from '../../common/clock/clock';
import { addDays, hasPassed } from '../../common/clock/time.util';
import {
  InactiveUserError,
  InvalidTokenError,
  NotFoundError,
  SessionExpiredError,
  SessionRevokedError,
} from '../../common/errors/auth.errors';
import { UserAccount } from '../../users/interfaces/user-account.interface';
import { LoggerService } from '../../utils/logger/logger.service';
import {
  IssuedSession,
  RefreshedAccess,
} from '../shared/interfaces/issued-tokens.interface';
import { RequestContext } from '../shared/interfaces/request-context.interface';
import { RegularSession } from '../shared/interfaces/session-records.interface';
import { RegularTokenClaims } from '../shared/interfaces/token-claims.interface';
import { regularSessionStatus } from '../shared/session-state';
import { SessionStore } from '../store/session-store';
import { ImpersonationService } from './impersonation.service';
import { TokenService } from './token.service';

/**
 * Lifecycle of regular (non-impersonation) sessions: issue, refresh, revoke.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly sessionDays: number;

  constructor(
    private readonly tokenService: TokenService,
    private readonly store: SessionStore,
    private readonly impersonationService: ImpersonationService,
    private readonly clock: Clock,
    private readonly ids: IdGenerator,
    private readonly securityLogger: LoggerService,
    configService: ConfigService,
  ) {
    this.sessionDays = configService.getOrThrow<number>(
      'jwt.refreshExpiresDays',
    );
  }

  async createSession(
    user: UserAccount,
    context: RequestContext = {},
  ): Promise<IssuedSession> {
    if (!user.isActive) {
      throw new InactiveUserError();
    }

    const now = this.clock.now();
    const expiresAt = addDays(now, this.sessionDays);
    const subject = {
      kind: 'regular' as const,
      sub: user.id,
      sessionId: this.ids.generate(),
    };

    const refresh = await this.tokenService.issueRefresh(
      subject,
      now,
      expiresAt,
    );
    const access = await this.tokenService.issueAccess(subject, now, expiresAt);

    const session: RegularSession = {
      id: subject.sessionId,
      userId: user.id,
      issuedAt: now,
      expiresAt,
      revoked: false,
      revokedAt: null,
      refreshTokenHash: this.tokenService.fingerprint(refresh.token),
      lastActivityAt: now,
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
    };
    await this.store.regular.put(session);

    this.securityLogger.security(
      'SESSION_CREATED',
      {
        sessionId: session.id,
        expiresAt: expiresAt.toISOString(),
        ipAddress: session.ipAddress,
      },
      user.id,
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresIn: access.expiresIn,
      session,
    };
  }

  /**
   * Exchanges a refresh token for a new access token. The refresh token is
   * not rotated and is handed back unchanged.
   */
  async refresh(refreshToken: string): Promise<RefreshedAccess> {
    const claims = await this.tokenService.decode(refreshToken, 'refresh');
    if (claims.kind === 'impersonation') {
      return this.impersonationService.refresh(claims, refreshToken);
    }

    const existing = await this.store.regular.get(claims.sessionId);
    if (!existing) {
      throw new InvalidTokenError();
    }

    const fingerprint = this.tokenService.fingerprint(refreshToken);
    const now = this.clock.now();
    // Checked under the record lock so a concurrent revoke always wins.
    const session = await this.store.regular.update(
      claims.sessionId,
      (current) => {
        if (current.refreshTokenHash !== fingerprint) {
          throw new InvalidTokenError();
        }
        this.assertLive(current, claims, now);
        return { ...current, lastActivityAt: now };
      },
    );

    const access = await this.tokenService.issueAccess(
      { kind: 'regular', sub: session.userId, sessionId: session.id },
      now,
      session.expiresAt,
    );

    this.securityLogger.security(
      'SESSION_REFRESHED',
      { sessionId: session.id },
      session.userId,
    );

    return {
      accessToken: access.token,
      refreshToken,
      expiresIn: access.expiresIn,
      userId: session.userId,
    };
  }

  /**
   * Marks the session revoked. Revoking an already revoked session is a
   * no-op.
   *
   * @throws NotFoundError when the id is unknown.
   */
  async revoke(sessionId: string): Promise<RegularSession> {
    const { session } = await this.markRevoked(sessionId);
    return session;
  }

  /** The live session behind an access token. */
  async requireLive(claims: RegularTokenClaims): Promise<RegularSession> {
    const session = await this.store.regular.get(claims.sessionId);
    if (!session) {
      throw new InvalidTokenError();
    }
    this.assertLive(session, claims, this.clock.now());
    return session;
  }

  async listActive(userId: string): Promise<RegularSession[]> {
    const now = this.clock.now();
    const sessions = await this.store.regular.findByOwner(userId);
    return sessions.filter(
      (session) => regularSessionStatus(session, now) === 'active',
    );
  }

  /**
   * Revokes one of the user's own sessions. Someone else's session is
   * reported as missing.
   */
  async revokeOwned(userId: string, sessionId: string): Promise<void> {
    const session = await this.store.regular.get(sessionId);
    if (!session || session.userId !== userId) {
      throw new NotFoundError('Session not found');
    }
    await this.markRevoked(sessionId);
  }

  /** @returns how many sessions this call revoked. */
  async revokeAll(userId: string): Promise<number> {
    const active = await this.listActive(userId);
    const results = await Promise.all(
      active.map((session) => this.markRevoked(session.id)),
    );
    const revoked = results.filter((result) => result.transitioned).length;

    this.logger.log(`Revoked ${revoked} sessions for user ${userId}`);
    return revoked;
  }

  private async markRevoked(
    sessionId: string,
  ): Promise<{ session: RegularSession; transitioned: boolean }> {
    const now = this.clock.now();
    let transitioned = false;

    const session = await this.store.regular.update(sessionId, (current) => {
      if (current.revoked) {
        return current;
      }
      transitioned = true;
      return { ...current, revoked: true, revokedAt: now };
    });

    if (transitioned) {
      this.securityLogger.security(
        'SESSION_REVOKED',
        { sessionId },
        session.userId,
      );
    }
    return { session, transitioned };
  }

  private assertLive(
    session: RegularSession,
    claims: RegularTokenClaims,
    now: Date,
  ): void {
    if (session.userId !== claims.sub) {
      throw new InvalidTokenError();
    }
    if (session.revoked) {
      throw new SessionRevokedError();
    }
    if (hasPassed(session.expiresAt, now)) {
      throw new SessionExpiredError();
    }
  }
}
