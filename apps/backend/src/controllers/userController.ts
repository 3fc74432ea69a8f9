// controllers/userController.ts
import type { Response } from 'express';
import type { User } from '@brainswarming/types';
import type { AuthenticatedRequest } from '../types/index.ts';
import { teamService } from '../services/teamService.ts';

/**
 * Controller class for the current user's own resources
 *
 * All methods are static and follow Express route handler pattern (req, res).
 */
export class UserController {
  static async getCurrentUser(
    req: AuthenticatedRequest,
    res: Response,
  ): Promise<void> {
    const { id, name, email, nickname, anonymous } = req.user;
    const user: User = { id, name, email, nickname, anonymous };
    res.json(user);
  }

  /**
   * Teams of the current user with founder summary and admin flag
   */
  static async getTeams(req: AuthenticatedRequest, res: Response): Promise<void> {
    const teams = await teamService.listTeams(req.user.id, req.log);
    res.json(teams);
  }
}
