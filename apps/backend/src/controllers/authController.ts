// controllers/authController.ts
import type { Response } from 'express';
import type {
  LoginRequest,
  MessageResponse,
  RegisterRequest,
} from '@brainswarming/types';
import type { AuthenticatedRequest, TypedRequest } from '../types/index.ts';
import { authService } from '../services/authService.ts';

/**
 * Controller class for account registration and bearer sessions
 *
 * All methods are static and follow Express route handler pattern (req, res).
 * Request-scoped logging is available via req.log.
 */
export class AuthController {
  /**
   * Register a user and return a bearer token for the new session
   */
  static async register(
    req: TypedRequest<Record<string, string>, RegisterRequest>,
    res: Response,
  ): Promise<void> {
    req.log.info({ action: 'register' }, 'Registering user');

    const result = await authService.register(req.body, req.log);
    res.status(201).json(result);
  }

  static async login(
    req: TypedRequest<Record<string, string>, LoginRequest>,
    res: Response,
  ): Promise<void> {
    const result = await authService.login(req.body, req.log);
    res.json(result);
  }

  /**
   * Revoke the session behind the presented token
   */
  static async logout(req: AuthenticatedRequest, res: Response): Promise<void> {
    await authService.logout(req.headers, req.log);

    const response: MessageResponse = { message: 'Successfully logged out' };
    res.json(response);
  }
}
