// src/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { UsersModule } from '../users/users.module';
import { AuthController } from './controllers/auth.controller';
import { SessionController } from './controllers/session.controller';
import { IdentityResolverService } from './services/identity-resolver.service';
import { ImpersonationService } from './services/impersonation.service';
import { SessionService } from './services/session.service';
import { TokenService } from './services/token.service';
import { DrizzleSessionStore } from './store/drizzle-session.store';
import { SessionStore } from './store/session-store';

@Module({
  imports: [
    // Defaults only; TokenService picks the key per token type on each call.
    JwtModule.registerAsync({
      useFactory: (configService: ConfigService) => ({
        secret: configService.getOrThrow<string>('jwt.secret'),
        signOptions: {
          issuer: configService.getOrThrow<string>('jwt.issuer'),
          audience: configService.getOrThrow<string>('jwt.audience'),
        },
        verifyOptions: {
          issuer: configService.getOrThrow<string>('jwt.issuer'),
          audience: configService.getOrThrow<string>('jwt.audience'),
        },
      }),
      inject: [ConfigService],
    }),
    UsersModule,
  ],
  controllers: [AuthController, SessionController],
  providers: [
    TokenService,
    SessionService,
    ImpersonationService,
    IdentityResolverService,
    { provide: SessionStore, useClass: DrizzleSessionStore },
  ],
  exports: [
    TokenService,
    SessionService,
    ImpersonationService,
    IdentityResolverService,
    SessionStore,
  ],
})
export class AuthModule {}
