import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { IdentityResolverService } from '../../src/auth/services/identity-resolver.service';
import { ImpersonationService } from '../../src/auth/services/impersonation.service';
import { SessionService } from '../../src/auth/services/session.service';
import { TokenService } from '../../src/auth/services/token.service';
import { SessionStore } from '../../src/auth/store/session-store';
import { Clock, IdGenerator } from '../../src/common/clock/clock';
import { UsersService } from '../../src/users/users.service';
import { LoggerService } from '../../src/utils/logger/logger.service';
import { FakeClock, SequentialIdGenerator } from './fake-clock';
import { InMemorySessionStore } from './in-memory-session.store';
import { securityLoggerMock, testConfigService } from './test-config';
import { FakeUsersService } from './users.fixture';

export interface AuthTestContext {
  module: TestingModule;
  clock: FakeClock;
  store: InMemorySessionStore;
  users: FakeUsersService;
  securityLogger: ReturnType<typeof securityLoggerMock>;
  tokenService: TokenService;
  sessionService: SessionService;
  impersonationService: ImpersonationService;
  identityResolver: IdentityResolverService;
}

/** The session core wired with in-process fakes for store, users and time. */
export async function createAuthTestContext(): Promise<AuthTestContext> {
  const clock = new FakeClock();
  const store = new InMemorySessionStore();
  const users = new FakeUsersService();
  const securityLogger = securityLoggerMock();

  const module = await Test.createTestingModule({
    providers: [
      TokenService,
      SessionService,
      ImpersonationService,
      IdentityResolverService,
      { provide: JwtService, useValue: new JwtService({}) },
      { provide: ConfigService, useValue: testConfigService() },
      { provide: Clock, useValue: clock },
      { provide: IdGenerator, useValue: new SequentialIdGenerator() },
      { provide: SessionStore, useValue: store },
      { provide: UsersService, useValue: users },
      { provide: LoggerService, useValue: securityLogger },
    ],
  }).compile();

  return {
    module,
    clock,
    store,
    users,
    securityLogger,
    tokenService: module.get(TokenService),
    sessionService: module.get(SessionService),
    impersonationService: module.get(ImpersonationService),
    identityResolver: module.get(IdentityResolverService),
  };
}
