import { hasPassed } from '../../common/clock/time.util';
import {
  ImpersonationSession,
  ImpersonationStatus,
  RegularSession,
} from './interfaces/session-records.interface';

export type SessionStatus = ImpersonationStatus;

export function regularSessionStatus(
  session: RegularSession,
  now: Date,
): SessionStatus {
  if (session.revoked) {
    return 'revoked';
  }
  return hasPassed(session.expiresAt, now) ? 'expired' : 'active';
}

/**
 * Status as a reader must see it: a stored `active` record past its expiry is
 * expired, whatever the column says.
 */
export function observeImpersonationStatus(
  session: ImpersonationSession,
  now: Date,
): ImpersonationStatus {
  if (session.status === 'active' && hasPassed(session.expiresAt, now)) {
    return 'expired';
  }
  return session.status;
}
