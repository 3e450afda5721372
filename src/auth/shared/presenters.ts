import { AuthenticatedPrincipal } from './interfaces/identity.interface';
import {
  ImpersonationGrant,
  ImpersonationSummary,
  RefreshedAccess,
} from './interfaces/issued-tokens.interface';
import {
  ImpersonationStatus,
  RegularSession,
} from './interfaces/session-records.interface';
import { SessionStatus } from './session-state';

// Wire shapes are snake_case; records stay camelCase internally.

export interface MessageResponse {
  message: string;
}

export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  expires_in: number;
}

export interface RefreshResponse extends TokenResponse {
  user_id: string;
}

export interface ImpersonationStartResponse extends TokenResponse {
  target_user_id: string;
  admin_user_id: string;
  impersonation_session_id: string;
}

export interface ImpersonationView {
  id: string;
  admin_user_id: string;
  admin_username: string | null;
  target_user_id: string;
  target_username: string | null;
  reason: string;
  created_at: string;
  expires_at: string;
  ended_at: string | null;
  status: ImpersonationStatus;
}

export interface SessionView {
  id: string;
  user_id: string;
  status: SessionStatus;
  created_at: string;
  expires_at: string;
  last_activity: string;
  ip_address: string | null;
  user_agent: string | null;
}

export interface WhoAmIResponse {
  user_id: string;
  username: string;
  email: string;
  is_admin: boolean;
  is_impersonating: boolean;
  impersonation?: {
    admin_user_id: string;
    admin_username: string | null;
    session_id: string;
    reason: string;
  };
}

export function toRefreshResponse(refreshed: RefreshedAccess): RefreshResponse {
  return {
    access_token: refreshed.accessToken,
    refresh_token: refreshed.refreshToken,
    token_type: 'bearer',
    expires_in: refreshed.expiresIn,
    user_id: refreshed.userId,
  };
}

export function toImpersonationStartResponse(
  grant: ImpersonationGrant,
): ImpersonationStartResponse {
  return {
    access_token: grant.accessToken,
    refresh_token: grant.refreshToken,
    token_type: 'bearer',
    expires_in: grant.expiresIn,
    target_user_id: grant.session.targetUserId,
    admin_user_id: grant.session.adminUserId,
    impersonation_session_id: grant.session.id,
  };
}

export function toImpersonationView(
  summary: ImpersonationSummary,
): ImpersonationView {
  return {
    id: summary.id,
    admin_user_id: summary.adminUserId,
    admin_username: summary.adminUsername,
    target_user_id: summary.targetUserId,
    target_username: summary.targetUsername,
    reason: summary.reason,
    created_at: summary.issuedAt.toISOString(),
    expires_at: summary.expiresAt.toISOString(),
    ended_at: summary.endedAt ? summary.endedAt.toISOString() : null,
    status: summary.status,
  };
}

export function toSessionView(
  session: RegularSession,
  status: SessionStatus,
): SessionView {
  return {
    id: session.id,
    user_id: session.userId,
    status,
    created_at: session.issuedAt.toISOString(),
    expires_at: session.expiresAt.toISOString(),
    last_activity: session.lastActivityAt.toISOString(),
    ip_address: session.ipAddress,
    user_agent: session.userAgent,
  };
}

export function toWhoAmIResponse(
  principal: AuthenticatedPrincipal,
): WhoAmIResponse {
  const { identity, user, admin } = principal;
  const response: WhoAmIResponse = {
    user_id: user.id,
    username: user.username,
    email: user.email,
    is_admin: user.isAdmin,
    is_impersonating: identity.impersonating,
  };

  if (identity.impersonating) {
    response.impersonation = {
      admin_user_id: identity.adminUserId,
      admin_username: admin ? admin.username : null,
      session_id: identity.sessionId,
      reason: identity.reason,
    };
  }
  return response;
}
