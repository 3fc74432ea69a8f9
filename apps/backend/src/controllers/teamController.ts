import type { Response } from 'express';
import type {
  AcceptInviteRequest,
  CreateTeamRequest,
  GenerateInviteRequest,
  GenerateInviteResponse,
  InvitePreviewResponse,
  JoinTeamRequest,
  JoinTeamResponse,
  ListTeamsResponse,
  MessageResponse,
  TeamAdminRequest,
  TeamMessageResponse,
  TeamResponse,
  UpdateTeamNameRequest,
  UpdateTeamSettingsRequest,
} from '@brainswarming/types';
import type {
  AuthenticatedRequest,
  AuthenticatingRequest,
  TypedRequest,
} from '../types/index.ts';
import { teamService, type JoinTeamResult } from '../services/teamService.ts';

type TeamParams = { teamId: string };

function toJoinResponse(result: JoinTeamResult): JoinTeamResponse {
  return { message: result.message, team: result.team };
}

/**
 * Controller class for teams, membership, invites and team admins
 *
 * Authorization decisions live in teamService; controllers only shape
 * requests and responses.
 *
 * All methods are static and follow Express route handler pattern (req, res).
 * Request-scoped logging is available via req.log.
 */
export class TeamController {
  /**
   * Teams the current user belongs to
   */
  static async listTeams(
    req: AuthenticatedRequest,
    res: Response,
  ): Promise<void> {
    const teams = await teamService.listTeams(req.user.id, req.log);
    const response: ListTeamsResponse = { teams };
    res.json(response);
  }

  static async createTeam(
    req: AuthenticatedRequest<Record<string, string>, CreateTeamRequest>,
    res: Response,
  ): Promise<void> {
    const { name, teamCode } = req.body;
    req.log.info({ action: 'createTeam', teamName: name }, 'Creating team');

    const team = await teamService.createTeam(
      req.user.id,
      { name, teamCode },
      req.log,
    );
    const response: TeamResponse = { team };
    res.status(201).json(response);
  }

  static async getTeam(
    req: AuthenticatedRequest<TeamParams>,
    res: Response,
  ): Promise<void> {
    const team = await teamService.getTeam(
      req.user.id,
      req.params.teamId,
      req.log,
    );
    const response: TeamResponse = { team };
    res.json(response);
  }

  static async joinByCode(
    req: AuthenticatedRequest<Record<string, string>, JoinTeamRequest>,
    res: Response,
  ): Promise<void> {
    const result = await teamService.joinByCode(
      req.user.id,
      req.body.teamCode,
      req.log,
    );
    res.json(toJoinResponse(result));
  }

  static async joinByLink(
    req: AuthenticatedRequest<{ token: string }>,
    res: Response,
  ): Promise<void> {
    const result = await teamService.joinByInviteToken(
      req.user.id,
      req.params.token,
      req.log,
    );
    res.json(toJoinResponse(result));
  }

  /**
   * Accept an invite. Guests get a preview telling them to log in first.
   */
  static async acceptInvite(
    req: TypedRequest<Record<string, string>, AcceptInviteRequest> &
      Pick<AuthenticatingRequest, 'user'>,
    res: Response,
  ): Promise<void> {
    const { inviteToken } = req.body;

    if (!req.user) {
      const team = await teamService.previewInvite(inviteToken);
      const response: InvitePreviewResponse = {
        message: 'Please register or login to join this team',
        team,
      };
      res.json(response);
      return;
    }

    const result = await teamService.acceptInvite(
      req.user.id,
      inviteToken,
      req.log,
    );
    res.json(toJoinResponse(result));
  }

  static async leaveTeam(
    req: AuthenticatedRequest<TeamParams>,
    res: Response,
  ): Promise<void> {
    await teamService.leaveTeam(req.user.id, req.params.teamId, req.log);
    const response: MessageResponse = { message: 'Successfully left the team' };
    res.json(response);
  }

  static async deleteTeam(
    req: AuthenticatedRequest<TeamParams>,
    res: Response,
  ): Promise<void> {
    await teamService.deleteTeam(req.user.id, req.params.teamId, req.log);
    const response: MessageResponse = { message: 'Team deleted successfully' };
    res.json(response);
  }

  static async updateName(
    req: AuthenticatedRequest<TeamParams, UpdateTeamNameRequest>,
    res: Response,
  ): Promise<void> {
    const result = await teamService.updateName(
      req.user.id,
      req.params.teamId,
      req.body.name,
      req.log,
    );
    const response: TeamMessageResponse = result;
    res.json(response);
  }

  static async updateSettings(
    req: AuthenticatedRequest<TeamParams, UpdateTeamSettingsRequest>,
    res: Response,
  ): Promise<void> {
    const result = await teamService.updateSettings(
      req.user.id,
      req.params.teamId,
      req.body.settings,
      req.log,
    );
    const response: TeamMessageResponse = result;
    res.json(response);
  }

  static async generateInvite(
    req: AuthenticatedRequest<TeamParams, GenerateInviteRequest>,
    res: Response,
  ): Promise<void> {
    const result = await teamService.generateInvite(
      req.user.id,
      req.params.teamId,
      req.body.expiresInDays,
      req.log,
    );
    const response: GenerateInviteResponse = result;
    res.json(response);
  }

  static async addAdmin(
    req: AuthenticatedRequest<TeamParams, TeamAdminRequest>,
    res: Response,
  ): Promise<void> {
    await teamService.addAdmin(
      req.user.id,
      req.params.teamId,
      req.body.userId,
      req.log,
    );
    const response: MessageResponse = {
      message: 'User added as admin successfully',
    };
    res.json(response);
  }

  static async removeAdmin(
    req: AuthenticatedRequest<TeamParams, TeamAdminRequest>,
    res: Response,
  ): Promise<void> {
    await teamService.removeAdmin(
      req.user.id,
      req.params.teamId,
      req.body.userId,
      req.log,
    );
    const response: MessageResponse = {
      message: 'Admin privileges removed successfully',
    };
    res.json(response);
  }
}
