export const IMPERSONATION_STATUSES = ['active', 'expired', 'revoked'] as const;

export type ImpersonationStatus = (typeof IMPERSONATION_STATUSES)[number];

/**
 * Server-side record behind a regular login. Kept for audit after it is
 * revoked; nothing deletes it.
 */
export interface RegularSession {
  id: string;
  userId: string;
  issuedAt: Date;
  expiresAt: Date;
  revoked: boolean;
  revokedAt: Date | null;
  /** SHA-256 of the one refresh token issued for this session. */
  refreshTokenHash: string;
  lastActivityAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

/**
 * An administrator acting as another user. `status` is only ever written as
 * `revoked` by an explicit end, or `expired` by the optional sweep; readers
 * must still treat an `active` record past `expiresAt` as expired.
 */
export interface ImpersonationSession {
  id: string;
  adminUserId: string;
  targetUserId: string;
  reason: string;
  issuedAt: Date;
  expiresAt: Date;
  endedAt: Date | null;
  status: ImpersonationStatus;
  ipAddress: string | null;
  userAgent: string | null;
}
