/**
 * Auth API Types
 */

import type { User } from '../domain/user.ts';

export interface RegisterRequest {
  name: string;
  email: string;
  password: string;
  passwordConfirmation: string;
  nickname?: string | null;
  anonymous?: boolean;
}

export interface LoginRequest {
  email: string;
  password: string;
}

/** Returned by register and login */
export interface AuthTokenResponse {
  user: User;
  accessToken: string;
  tokenType: 'Bearer';
}
