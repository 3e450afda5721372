import {
  ImpersonationSession,
  RegularSession,
} from './session-records.interface';

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  /** Lifetime of the access token in seconds. */
  expiresIn: number;
}

export interface IssuedSession extends IssuedTokens {
  session: RegularSession;
}

export interface ImpersonationGrant extends IssuedTokens {
  session: ImpersonationSession;
}

export interface RefreshedAccess extends IssuedTokens {
  userId: string;
}

export interface ImpersonationSummary extends ImpersonationSession {
  adminUsername: string | null;
  targetUsername: string | null;
}
