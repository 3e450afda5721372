export const TOKEN_KINDS = ['regular', 'impersonation'] as const;
export const TOKEN_TYPES = ['access', 'refresh'] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];
export type TokenType = (typeof TOKEN_TYPES)[number];

interface BaseTokenClaims {
  /** Acting user; the impersonated user for impersonation tokens. */
  sub: string;
  type: TokenType;
  /** Id of the RegularSession or ImpersonationSession backing the token. */
  sessionId: string;
  iat: number;
  exp: number;
}

export interface RegularTokenClaims extends BaseTokenClaims {
  kind: 'regular';
}

export interface ImpersonationTokenClaims extends BaseTokenClaims {
  kind: 'impersonation';
  adminId: string;
}

export type TokenClaims = RegularTokenClaims | ImpersonationTokenClaims;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** Claims before signing; `iat` and `exp` are added from the issue time. */
export type UnsignedTokenClaims = DistributiveOmit<TokenClaims, 'iat' | 'exp'>;

/** Who and which session a token speaks for, whatever its type. */
export type TokenSubject = DistributiveOmit<
  TokenClaims,
  'iat' | 'exp' | 'type'
>;

export interface SignedToken {
  token: string;
  expiresAt: Date;
  /** Seconds from issue to expiry. */
  expiresIn: number;
}
