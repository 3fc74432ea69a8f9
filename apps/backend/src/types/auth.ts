/**
 * Authentication types for Express middleware.
 */

import type { RequestWithLogger, TypedRequest } from './request.ts';

/**
 * User object attached to request by auth middleware.
 * Picked from the better-auth session user.
 */
export type AuthUser = {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly nickname: string | null;
  readonly anonymous: boolean;
};

/**
 * Session object attached to request by auth middleware.
 */
export type AuthSession = {
  readonly id: string;
  readonly userId: string;
  readonly token: string;
  readonly expiresAt: Date;
};

/**
 * Express request during authentication.
 * User and session are optional since middleware sets them.
 */
export type AuthenticatingRequest = RequestWithLogger & {
  user?: AuthUser;
  session?: AuthSession;
};

/**
 * Express request with authenticated user and session.
 * Used in routes protected by authMiddleware; the type parameters carry
 * the validated params, body and query.
 */
export type AuthenticatedRequest<
  TParams = Record<string, string>,
  TBody = unknown,
  TQuery = Record<string, unknown>,
> = TypedRequest<TParams, TBody, TQuery> & {
  /** Authenticated user (guaranteed by auth middleware) */
  user: AuthUser;
  session: AuthSession;
};
