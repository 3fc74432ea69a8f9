/**
 * Auth Service - registration, login and logout on top of Better Auth.
 *
 * Password hashing and session issuance belong to Better Auth; this layer
 * shapes its results into bearer-token responses and translates its
 * errors into HTTP errors.
 */
import type { IncomingHttpHeaders } from 'http';
import type { Logger } from 'pino';
import { APIError } from 'better-auth/api';
import { fromNodeHeaders } from 'better-auth/node';
import type {
  AuthTokenResponse,
  LoginRequest,
  RegisterRequest,
  User,
} from '@brainswarming/types';
import { auth } from '../lib/auth.ts';
import { executeQuery } from '../utils/database.ts';
import { ValidationError } from '../utils/errors.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const moduleLogger = createChildLogger('auth-service');

/** User fields as Better Auth returns them */
type AuthLibraryUser = {
  id: string;
  name: string;
  email: string;
  nickname?: string | null;
  anonymous?: boolean | null;
  createdAt: Date;
  updatedAt: Date;
};

const INVALID_CREDENTIALS = 'The provided credentials are incorrect.';
const EMAIL_TAKEN = 'The email has already been taken.';

export function toUser(user: AuthLibraryUser): User {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    nickname: user.nickname ?? null,
    anonymous: user.anonymous ?? false,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

function emailTaken(email: string): boolean {
  const existing = executeQuery<{ id: string }>(
    'SELECT id FROM user WHERE LOWER(email) = LOWER(?)',
    [email],
    'checking email uniqueness',
  );
  return existing !== undefined;
}

class AuthService {
  async register(
    input: RegisterRequest,
    logger: Logger = moduleLogger,
  ): Promise<AuthTokenResponse> {
    if (emailTaken(input.email)) {
      throw new ValidationError(EMAIL_TAKEN);
    }

    try {
      const result = await auth.api.signUpEmail({
        body: {
          name: input.name,
          email: input.email,
          password: input.password,
          ...(input.nickname != null && { nickname: input.nickname }),
          anonymous: input.anonymous ?? false,
        },
      });

      if (!result.token) {
        throw new Error('Sign-up did not return a session token');
      }

      logger.info(
        { action: 'register', userId: result.user.id },
        'User registered',
      );
      return {
        user: toUser(result.user),
        accessToken: result.token,
        tokenType: 'Bearer',
      };
    } catch (error) {
      if (error instanceof APIError) {
        logger.warn(
          { action: 'register', err: error },
          'Registration rejected by auth library',
        );
        throw new ValidationError(error.message || 'Registration failed');
      }
      throw error;
    }
  }

  async login(
    input: LoginRequest,
    logger: Logger = moduleLogger,
  ): Promise<AuthTokenResponse> {
    try {
      const result = await auth.api.signInEmail({
        body: { email: input.email, password: input.password },
      });

      logger.info({ action: 'login', userId: result.user.id }, 'User logged in');
      return {
        user: toUser(result.user),
        accessToken: result.token,
        tokenType: 'Bearer',
      };
    } catch (error) {
      if (error instanceof APIError) {
        logger.warn({ action: 'login' }, 'Login failed');
        throw new ValidationError(INVALID_CREDENTIALS);
      }
      throw error;
    }
  }

  /**
   * Revoke the session presented in the request's Authorization header
   */
  async logout(
    headers: IncomingHttpHeaders,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    await auth.api.signOut({ headers: fromNodeHeaders(headers) });
    logger.info({ action: 'logout' }, 'Session revoked');
  }
}

// Export singleton instance
export const authService = new AuthService();
