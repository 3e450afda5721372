import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { createHash } from 'crypto';
import { Clock } from '../../common/clock/clock';
import {
  addMinutes,
  earliest,
  toEpochSeconds,
} from '../../common/clock/time.util';
import { InvalidTokenError } from '../../common/errors/auth.errors';
import { TokenClaimsDto } from '../dto/token-claims.dto';
import {
  SignedToken,
  TokenClaims,
  TokenSubject,
  TokenType,
  UnsignedTokenClaims,
} from '../shared/interfaces/token-claims.interface';

const ALGORITHM = 'HS256';

/**
 * Signs and verifies the bearer tokens. Access and refresh tokens use
 * separate keys, so one can never be replayed as the other.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly secrets: Record<TokenType, string>;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly accessTtlMinutes: number;

  constructor(
    private readonly jwtService: JwtService,
    private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.secrets = {
      access: configService.getOrThrow<string>('jwt.secret'),
      refresh: configService.getOrThrow<string>('jwt.refreshSecret'),
    };
    this.issuer = configService.getOrThrow<string>('jwt.issuer');
    this.audience = configService.getOrThrow<string>('jwt.audience');
    this.accessTtlMinutes = configService.getOrThrow<number>(
      'jwt.accessExpiresMinutes',
    );
  }

  /**
   * Short-lived access token. Never outlives `notAfter`, the end of the
   * session it was issued for.
   */
  async issueAccess(
    subject: TokenSubject,
    issuedAt: Date,
    notAfter: Date,
  ): Promise<SignedToken> {
    const expiresAt = earliest(
      addMinutes(issuedAt, this.accessTtlMinutes),
      notAfter,
    );
    return this.issue({ ...subject, type: 'access' }, issuedAt, expiresAt);
  }

  /** Refresh token; lives exactly as long as its session. */
  async issueRefresh(
    subject: TokenSubject,
    issuedAt: Date,
    expiresAt: Date,
  ): Promise<SignedToken> {
    return this.issue({ ...subject, type: 'refresh' }, issuedAt, expiresAt);
  }

  /** `iat` and `exp` are taken from the claims as given. */
  async encode(claims: TokenClaims): Promise<string> {
    return this.jwtService.signAsync(
      { ...claims },
      {
        secret: this.secrets[claims.type],
        algorithm: ALGORITHM,
        issuer: this.issuer,
        audience: this.audience,
      },
    );
  }

  /**
   * Verifies signature, issuer, audience and expiry against the clock, then
   * the claim structure. Every failure surfaces as `InvalidTokenError`.
   */
  async decode(token: string, expected: TokenType): Promise<TokenClaims> {
    let payload: Record<string, unknown>;
    try {
      payload = await this.jwtService.verifyAsync<Record<string, unknown>>(
        token,
        {
          secret: this.secrets[expected],
          algorithms: [ALGORITHM],
          issuer: this.issuer,
          audience: this.audience,
          clockTimestamp: toEpochSeconds(this.clock.now()),
        },
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Token verification failed: ${reason}`);
      throw new InvalidTokenError();
    }

    const dto = plainToInstance(TokenClaimsDto, payload);
    const errors = await validate(dto);
    if (errors.length > 0 || dto.type !== expected) {
      this.logger.debug('Token payload is malformed');
      throw new InvalidTokenError();
    }

    return this.toClaims(dto);
  }

  private async issue(
    claims: UnsignedTokenClaims,
    issuedAt: Date,
    expiresAt: Date,
  ): Promise<SignedToken> {
    const iat = toEpochSeconds(issuedAt);
    const exp = toEpochSeconds(expiresAt);
    const token = await this.encode({ ...claims, iat, exp });
    return { token, expiresAt, expiresIn: exp - iat };
  }

  /** Digest stored in place of a refresh token. */
  fingerprint(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }

  private toClaims(dto: TokenClaimsDto): TokenClaims {
    const base = {
      sub: dto.sub,
      type: dto.type,
      sessionId: dto.sessionId,
      iat: dto.iat,
      exp: dto.exp,
    };

    if (dto.kind === 'regular') {
      return { ...base, kind: 'regular' };
    }
    if (!dto.adminId) {
      throw new InvalidTokenError();
    }
    return { ...base, kind: 'impersonation', adminId: dto.adminId };
  }
}
