import { UserAccount } from '../../../users/interfaces/user-account.interface';

export interface RegularIdentity {
  impersonating: false;
  userId: string;
  sessionId: string;
}

export interface ImpersonatedIdentity {
  impersonating: true;
  /** The impersonated (target) user. */
  userId: string;
  adminUserId: string;
  reason: string;
  sessionId: string;
}

export type Identity = RegularIdentity | ImpersonatedIdentity;

/**
 * Identity plus the accounts behind it. `user` is always the acting user;
 * `admin` is set only while impersonating.
 */
export interface AuthenticatedPrincipal {
  identity: Identity;
  user: UserAccount;
  admin: UserAccount | null;
}
