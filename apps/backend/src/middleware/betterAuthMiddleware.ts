import type { Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';
import { fromNodeHeaders } from 'better-auth/node';
import { auth } from '../lib/auth.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import type {
  AuthUser,
  AuthSession,
  AuthenticatingRequest,
} from '../types/index.ts';

const moduleLogger = createChildLogger('auth-middleware');

type ResolvedSession = {
  user: AuthUser;
  session: AuthSession;
};

/**
 * Look up the bearer session for the request. Returns null when no valid
 * session is presented.
 */
async function resolveSession(
  req: AuthenticatingRequest,
): Promise<ResolvedSession | null> {
  const result = await auth.api.getSession({
    headers: fromNodeHeaders(req.headers),
  });

  if (!result?.session || !result?.user) {
    return null;
  }

  const { user, session } = result;
  return {
    user: {
      id: user.id,
      email: user.email,
      name: user.name,
      nickname: user.nickname ?? null,
      anonymous: user.anonymous ?? false,
    },
    session: {
      id: session.id,
      userId: session.userId,
      token: session.token,
      expiresAt: session.expiresAt,
    },
  };
}

function requestLogger(req: AuthenticatingRequest, middleware: string): Logger {
  return req.log?.child({ middleware }) || moduleLogger;
}

// Authentication middleware using Better Auth bearer sessions
export const authMiddleware: RequestHandler = async (
  req: AuthenticatingRequest,
  res: Response,
  next: NextFunction,
): Promise<void> => {
  const logger = requestLogger(req, 'authMiddleware');

  try {
    const resolved = await resolveSession(req);

    if (!resolved) {
      logger.warn(
        { action: 'authenticate' },
        'Authentication failed: no session or user',
      );
      res.status(401).json({ error: 'Unauthenticated.' });
      return;
    }

    req.user = resolved.user;
    req.session = resolved.session;

    logger.debug(
      { action: 'authenticate', userId: resolved.user.id },
      'User authenticated',
    );
    next();
  } catch (error) {
    logger.error(
      { action: 'authenticate', err: error },
      'Auth middleware error',
    );
    res.status(401).json({ error: 'Unauthenticated.' });
  }
};

/**
 * Attach the user when a valid bearer token is presented, otherwise carry
 * on as a guest. Used by routes that answer both audiences.
 */
export const optionalAuth: RequestHandler = async (
  req: AuthenticatingRequest,
  _res: Response,
  next: NextFunction,
): Promise<void> => {
  const logger = requestLogger(req, 'optionalAuth');

  try {
    const resolved = await resolveSession(req);
    if (resolved) {
      req.user = resolved.user;
      req.session = resolved.session;
    }
  } catch (error) {
    logger.warn(
      { action: 'authenticate', err: error },
      'Optional authentication failed, continuing as guest',
    );
  }

  next();
};
