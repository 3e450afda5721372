import {
  AuthTestContext,
  createAuthTestContext,
} from '../../../test/support/auth-testing';
import { START_TIME } from '../../../test/support/fake-clock';
import {
  adminUser,
  regularUser,
} from '../../../test/support/users.fixture';
import { addMinutes } from '../../common/clock/time.util';
import { UnauthorizedError } from '../../common/errors/auth.errors';

describe('IdentityResolverService', () => {
  let ctx: AuthTestContext;

  beforeEach(async () => {
    ctx = await createAuthTestContext();
  });

  describe('resolve', () => {
    it('should resolve a regular access token to its user', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);

      await expect(
        ctx.identityResolver.resolve(issued.accessToken),
      ).resolves.toEqual({
        impersonating: false,
        userId: 'user-1',
        sessionId: 'session-1',
      });
    });

    it('should reject a malformed token as Unauthorized', async () => {
      await expect(
        ctx.identityResolver.resolve('not-a-token'),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should reject a token of a revoked session and log why', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      await ctx.sessionService.revoke(issued.session.id);

      await expect(
        ctx.identityResolver.resolve(issued.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      expect(ctx.securityLogger.security).toHaveBeenLastCalledWith(
        'TOKEN_REJECTED',
        { kind: 'SessionRevoked' },
      );
    });

    it('should reject an expired token even though its session is live', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.clock.advanceMinutes(15);

      await expect(
        ctx.identityResolver.resolve(issued.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should check the session expiry independently of the token', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      await ctx.store.regular.update(issued.session.id, (session) => ({
        ...session,
        expiresAt: addMinutes(START_TIME, 5),
      }));
      ctx.clock.advanceMinutes(5);

      await expect(
        ctx.identityResolver.resolve(issued.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should treat an active impersonation past its expiry as expired', async () => {
      const grant = await ctx.impersonationService.start(
        adminUser,
        regularUser.id,
        'support',
      );
      await ctx.store.impersonation.update(grant.session.id, (session) => ({
        ...session,
        expiresAt: addMinutes(START_TIME, 5),
      }));
      ctx.clock.advanceMinutes(5);

      await expect(
        ctx.identityResolver.resolve(grant.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(
        ctx.store.impersonation.get(grant.session.id),
      ).resolves.toMatchObject({ status: 'active' });
    });

    it('should reject an impersonation token naming a different admin', async () => {
      const grant = await ctx.impersonationService.start(
        adminUser,
        regularUser.id,
        'support',
      );
      const forged = await ctx.tokenService.issueAccess(
        {
          kind: 'impersonation',
          sub: regularUser.id,
          adminId: 'admin-2',
          sessionId: grant.session.id,
        },
        START_TIME,
        grant.session.expiresAt,
      );

      await expect(
        ctx.identityResolver.resolve(forged.token),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should let store failures through unchanged', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      const failure = new Error('connection refused');
      jest.spyOn(ctx.store.regular, 'get').mockRejectedValueOnce(failure);

      await expect(
        ctx.identityResolver.resolve(issued.accessToken),
      ).rejects.toBe(failure);
    });
  });

  describe('resolvePrincipal', () => {
    it('should load the acting user of a regular session', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);

      const principal = await ctx.identityResolver.resolvePrincipal(
        issued.accessToken,
      );

      expect(principal.user).toEqual(regularUser);
      expect(principal.admin).toBeNull();
    });

    it('should load both accounts while impersonating', async () => {
      const grant = await ctx.impersonationService.start(
        adminUser,
        regularUser.id,
        'support',
      );

      const principal = await ctx.identityResolver.resolvePrincipal(
        grant.accessToken,
      );

      expect(principal.user).toEqual(regularUser);
      expect(principal.admin).toEqual(adminUser);
      expect(principal.user.isAdmin).toBe(false);
    });

    it('should reject a user deactivated after login', async () => {
      const issued = await ctx.sessionService.createSession(regularUser);
      ctx.users.save({ ...regularUser, isActive: false });

      await expect(
        ctx.identityResolver.resolvePrincipal(issued.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('should reject an impersonation whose admin lost admin rights', async () => {
      const grant = await ctx.impersonationService.start(
        adminUser,
        regularUser.id,
        'support',
      );
      ctx.users.save({ ...adminUser, isAdmin: false });

      await expect(
        ctx.identityResolver.resolvePrincipal(grant.accessToken),
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });
  });
});
