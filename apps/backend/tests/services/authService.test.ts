import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { APIError } from 'better-auth/api';
import { asMocked } from '../utils/testHelpers.ts';

vi.mock('../../src/lib/auth.ts', () => ({
  auth: {
    api: {
      signUpEmail: vi.fn(),
      signInEmail: vi.fn(),
      signOut: vi.fn(),
    },
  },
}));

vi.mock('../../src/utils/database.ts', () => ({
  executeQuery: vi.fn(),
}));

type MockAuth = {
  api: {
    signUpEmail: Mock;
    signInEmail: Mock;
    signOut: Mock;
  };
};

const { auth } = asMocked<{ auth: MockAuth }>(
  await import('../../src/lib/auth.ts'),
);
const { executeQuery } = asMocked<{ executeQuery: Mock }>(
  await import('../../src/utils/database.ts'),
);
const { authService, toUser } = await import('../../src/services/authService.ts');

const createdAt = new Date('2026-01-02T03:04:05.000Z');

const libraryUser = {
  id: 'user-1',
  name: 'Alice',
  email: 'alice@example.com',
  nickname: 'ally',
  anonymous: false,
  createdAt,
  updatedAt: createdAt,
};

const registration = {
  name: 'Alice',
  email: 'alice@example.com',
  password: 'test-password',
  passwordConfirmation: 'test-password',
  nickname: 'ally',
};

describe('authService', () => {
  beforeEach(() => {
    executeQuery.mockReturnValue(undefined);
  });

  describe('toUser', () => {
    it('should map library users to API users', () => {
      expect(toUser({ ...libraryUser, nickname: undefined, anonymous: null })).toEqual({
        id: 'user-1',
        name: 'Alice',
        email: 'alice@example.com',
        nickname: null,
        anonymous: false,
        createdAt: '2026-01-02T03:04:05.000Z',
        updatedAt: '2026-01-02T03:04:05.000Z',
      });
    });
  });

  describe('register', () => {
    it('should sign up and return a bearer token', async () => {
      auth.api.signUpEmail.mockResolvedValue({
        token: 'session-token',
        user: libraryUser,
      });

      const result = await authService.register(registration);

      expect(auth.api.signUpEmail).toHaveBeenCalledWith({
        body: {
          name: 'Alice',
          email: 'alice@example.com',
          password: 'test-password',
          nickname: 'ally',
          anonymous: false,
        },
      });
      expect(result).toEqual({
        user: toUser(libraryUser),
        accessToken: 'session-token',
        tokenType: 'Bearer',
      });
    });

    it('should leave out a missing nickname', async () => {
      auth.api.signUpEmail.mockResolvedValue({
        token: 'session-token',
        user: libraryUser,
      });

      await authService.register({
        ...registration,
        nickname: null,
        anonymous: true,
      });

      expect(auth.api.signUpEmail).toHaveBeenCalledWith({
        body: {
          name: 'Alice',
          email: 'alice@example.com',
          password: 'test-password',
          anonymous: true,
        },
      });
    });

    it('should reject a taken email before calling the library', async () => {
      executeQuery.mockReturnValue({ id: 'existing' });

      await expect(authService.register(registration)).rejects.toMatchObject({
        statusCode: 422,
        message: 'The email has already been taken.',
      });
      expect(auth.api.signUpEmail).not.toHaveBeenCalled();
    });

    it('should turn library rejections into 422', async () => {
      auth.api.signUpEmail.mockRejectedValue(
        new APIError('BAD_REQUEST', { message: 'Password too short' }),
      );

      await expect(authService.register(registration)).rejects.toMatchObject({
        statusCode: 422,
        message: 'Password too short',
      });
    });

    it('should fail when no session token is issued', async () => {
      auth.api.signUpEmail.mockResolvedValue({ token: null, user: libraryUser });

      await expect(authService.register(registration)).rejects.toThrow(
        'Sign-up did not return a session token',
      );
    });
  });

  describe('login', () => {
    it('should return a bearer token for valid credentials', async () => {
      auth.api.signInEmail.mockResolvedValue({
        token: 'session-token',
        user: libraryUser,
      });

      const result = await authService.login({
        email: 'alice@example.com',
        password: 'test-password',
      });

      expect(result.accessToken).toBe('session-token');
      expect(result.user.nickname).toBe('ally');
    });

    it('should hide why credentials were rejected', async () => {
      auth.api.signInEmail.mockRejectedValue(
        new APIError('UNAUTHORIZED', { message: 'Invalid email or password' }),
      );

      await expect(
        authService.login({ email: 'alice@example.com', password: 'wrong-password' }),
      ).rejects.toMatchObject({
        statusCode: 422,
        message: 'The provided credentials are incorrect.',
      });
    });

    it('should rethrow unexpected errors', async () => {
      auth.api.signInEmail.mockRejectedValue(new Error('database is locked'));

      await expect(
        authService.login({ email: 'alice@example.com', password: 'test-password' }),
      ).rejects.toThrow('database is locked');
    });
  });

  describe('logout', () => {
    it('should revoke the session named by the Authorization header', async () => {
      auth.api.signOut.mockResolvedValue({ success: true });

      await authService.logout({ authorization: 'Bearer session-token' });

      const [{ headers }] = auth.api.signOut.mock.calls[0];
      expect(headers.get('authorization')).toBe('Bearer session-token');
    });
  });
});
