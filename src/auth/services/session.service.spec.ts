import {
  AuthTestContext,
  createAuthTestContext,
} from '../../../test/support/auth-testing';
import { START_TIME } from '../../../test/support/fake-clock';
import {
  inactiveUser,
  otherAdmin,
  regularUser,
} from '../../../test/support/users.fixture';
import { addDays, addMinutes } from '../../common/clock/time.util';
import {
  InactiveUserError,
  InvalidTokenError,
  NotFoundError,
  SessionExpiredError,
  SessionRevokedError,
} from '../../common/errors/auth.errors';

describe('SessionService', () => {
  let ctx: AuthTestContext;

  beforeEach(async () => {
    ctx = await createAuthTestContext();
  });

  describe('createSession', () => {
    it('should reject an inactive user without storing anything', async () => {
      await expect(
        ctx.sessionService.createSession(inactiveUser),
      ).rejects.toBeInstanceOf(InactiveUserError);

      expect(ctx.store.regular.all()).toHaveLength(0);
    });

    it('should persist a session matching the refresh token window', async () => {
      const issued = await ctx.sessionService.createSession(regularUser, {
        ipAddress: '203.0.113.7',
        userAgent: 'jest',
      });

      expect(issued.expiresIn).toBe(900);
      expect(issued.session).toEqual({
        id: 'session-1',
        userId: 'user-1',
        issuedAt: START_TIME,
        expiresAt: addDays(START_TIME, 7),
        revoked: false,
        revokedAt: null,
        refreshTokenHash: ctx.tokenService.fingerprint(issued.refreshToken),
        lastActivityAt: START_TIME,
        ipAddress: '203.0.113.7',
        userAgent: 'jest',
      });
      await expect(ctx.store.regular.get('session-1')).resolves.toEqual(
        issued.session,
      );
    });

    it('should issue regular access and refresh tokens for the session', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);

      await expect(
        ctx.tokenService.decode(issued.accessToken, 'access'),
      ).resolves.toMatchObject({
        kind: 'regular',
        sub: 'user-1',
        sessionId: 'session-1',
      });
      await expect(
        ctx.tokenService.decode(issued.refreshToken, 'refresh'),
      ).resolves.toMatchObject({
        kind: 'regular',
        sub: 'user-1',
        sessionId: 'session-1',
      });
      expect(ctx.securityLogger.security).toHaveBeenCalledWith(
        'SESSION_CREATED',
        expect.objectContaining({ sessionId: 'session-1' }),
        'user-1',
      );
    });
  });

  describe('refresh', () => {
    it('should return a new access token that resolves to the same user', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(20);

      const refreshed = await ctx.sessionService.refresh(issued.refreshToken);

      expect(refreshed.refreshToken).toBe(issued.refreshToken);
      expect(refreshed.userId).toBe('user-1');
      await expect(
        ctx.identityResolver.resolve(refreshed.accessToken),
      ).resolves.toEqual({
        impersonating: false,
        userId: 'user-1',
        sessionId: 'session-1',
      });
    });

    it('should record the refresh as activity', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(20);

      await ctx.sessionService.refresh(issued.refreshToken);

      const stored = await ctx.store.regular.get('session-1');
      expect(stored?.lastActivityAt).toEqual(addMinutes(START_TIME, 20));
    });

    it('should fail with SessionRevoked after the session is revoked', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      await ctx.sessionService.revoke(issued.session.id);

      await expect(
        ctx.sessionService.refresh(issued.refreshToken),
      ).rejects.toBeInstanceOf(SessionRevokedError);
    });

    it('should fail with SessionExpired once the record has expired', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      await ctx.store.regular.update(issued.session.id, (session) => ({
        ...session,
        expiresAt: addMinutes(START_TIME, 30),
      }));
      ctx.clock.advanceMinutes(30);

      await expect(
        ctx.sessionService.refresh(issued.refreshToken),
      ).rejects.toBeInstanceOf(SessionExpiredError);
    });

    it('should fail with InvalidToken when the refresh token itself has expired', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(7 * 24 * 60);

      await expect(
        ctx.sessionService.refresh(issued.refreshToken),
      ).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should fail with InvalidToken for an access token', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);

      await expect(
        ctx.sessionService.refresh(issued.accessToken),
      ).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should fail with InvalidToken when no session backs the token', async () => {
      const orphan = await ctx.tokenService.issueRefresh(
        { kind: 'regular', sub: 'user-1', sessionId: 'missing-session' },
        START_TIME,
        addDays(START_TIME, 7),
      );

      await expect(
        ctx.sessionService.refresh(orphan.token),
      ).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should only accept the refresh token issued with the session', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceSeconds(5);
      const other = await ctx.tokenService.issueRefresh(
        { kind: 'regular', sub: 'user-1', sessionId: issued.session.id },
        ctx.clock.now(),
        issued.session.expiresAt,
      );

      await expect(
        ctx.sessionService.refresh(other.token),
      ).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should not resurrect a session revoked concurrently', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);

      const [refreshed, revoked] = await Promise.allSettled([
        ctx.sessionService.refresh(issued.refreshToken),
        ctx.sessionService.revoke(issued.session.id),
      ]);

      expect(revoked.status).toBe('fulfilled');
      if (refreshed.status === 'rejected') {
        expect(refreshed.reason).toBeInstanceOf(SessionRevokedError);
      }
      const stored = await ctx.store.regular.get(issued.session.id);
      expect(stored?.revoked).toBe(true);
    });
  });

  describe('revoke', () => {
    it('should be idempotent and keep the first revocation time', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(1);
      const first = await ctx.sessionService.revoke(issued.session.id);
      ctx.clock.advanceMinutes(1);
      const second = await ctx.sessionService.revoke(issued.session.id);

      expect(first.revoked).toBe(true);
      expect(second.revokedAt).toEqual(addMinutes(START_TIME, 1));
      expect(ctx.store.regular.writes).toBe(1);
      expect(
        ctx.securityLogger.security.mock.calls.filter(
          ([event]) => event === 'SESSION_REVOKED',
        ),
      ).toHaveLength(1);
    });

    it('should fail with NotFound for an unknown session', async () => {
      await expect(
        ctx.sessionService.revoke('missing-session'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should make the access token unusable', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      await ctx.sessionService.revoke(issued.session.id);

      await expect(
        ctx.sessionService.requireLive({
          kind: 'regular',
          type: 'access',
          sub: 'user-1',
          sessionId: issued.session.id,
          iat: 0,
          exp: 0,
        }),
      ).rejects.toBeInstanceOf(SessionRevokedError);
    });
  });

  describe('session management', () => {
    const createThree = async () => {
      const first = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(1);
      const second = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(1);
      const third = await ctx.sessionService.createSession(regularUser);
      return [first.session, second.session, third.session];
    };

    it('should list only live sessions, newest first', async () => {
      const [first, second, third] = await createThree();
      await ctx.sessionService.revoke(second.id);

      const sessions = await ctx.sessionService.listActive('user-1');

      expect(sessions.map((session) => session.id)).toEqual([
        third.id,
        first.id,
      ]);
    });

    it('should not let a user revoke someone else\'s session', async () => {
      const [first] = await createThree();

      await expect(
        ctx.sessionService.revokeOwned(otherAdmin.id, first.id),
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.store.regular.get(first.id)).resolves.toMatchObject({
        revoked: false,
      });
    });

    it('should revoke an owned session', async () => {
      const [first] = await createThree();

      await ctx.sessionService.revokeOwned('user-1', first.id);

      await expect(ctx.store.regular.get(first.id)).resolves.toMatchObject({
        revoked: true,
      });
    });

    it('should count the sessions revoked by revokeAll', async () => {
      const [first] = await createThree();
      await ctx.sessionService.revoke(first.id);

      await expect(ctx.sessionService.revokeAll('user-1')).resolves.toBe(2);
      await expect(ctx.sessionService.listActive('user-1')).resolves.toEqual(
        [],
      );
    });
  });
});
