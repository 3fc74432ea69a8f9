/**
 * Authentication Test Helpers
 *
 * Create real better-auth users and bearer sessions through the public
 * API, so route tests exercise the same auth path as clients do.
 */

import type { Application } from 'express';
import request from 'supertest';
import type { AuthTokenResponse, User } from '@brainswarming/types';

export const TEST_PASSWORD = 'test-password';

export type RegisteredUser = {
  user: User;
  token: string;
  /** Authorization header value */
  bearer: string;
};

export type RegisterOptions = {
  nickname?: string | null;
  anonymous?: boolean;
};

/**
 * Register a user through POST /api/register
 * @param app - Express application under test
 * @param name - Display name; also used to derive the email
 */
export async function registerUser(
  app: Application,
  name: string,
  options: RegisterOptions = {},
): Promise<RegisteredUser> {
  const response = await request(app)
    .post('/api/register')
    .send({
      name,
      email: `${name.toLowerCase().replace(/\s+/g, '.')}@example.com`,
      password: TEST_PASSWORD,
      passwordConfirmation: TEST_PASSWORD,
      ...options,
    });

  if (response.status !== 201) {
    throw new Error(
      `Registration of ${name} failed with ${response.status}: ${JSON.stringify(response.body)}`,
    );
  }

  const body: AuthTokenResponse = response.body;
  return {
    user: body.user,
    token: body.accessToken,
    bearer: `Bearer ${body.accessToken}`,
  };
}
