/**
 * Team Service - teams, memberships, invite links and the admin set.
 *
 * Every operation resolves the actor's MembershipSnapshot and asks
 * `authorize` before touching rows. Missing teams are 404, existing teams
 * the actor may not touch are 403.
 *
 * Singleton pattern with request-scoped logging.
 */
import crypto from 'crypto';
import type { Logger } from 'pino';
import type {
  InvitePreviewResponse,
  TeamSettings,
  TeamSummary,
} from '@brainswarming/types';
import { TEAMS } from '../constants.ts';
import { config } from '../config/default.ts';
import {
  executeQuery,
  executeQueryAll,
  executeTransaction,
  executeUpdate,
} from '../utils/database.ts';
import {
  fromSQLiteBoolean,
  nowIso,
  parseJsonObject,
} from '../utils/databaseHelpers.ts';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.ts';
import { generateId } from '../utils/generateId.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import {
  authorize,
  isAdmin,
  type AccessContext,
  type TeamOperation,
} from './accessControl.ts';
import {
  membershipRepository,
  type MembershipRepository,
} from './membershipRepository.ts';

// Module-level logger; public methods accept logger parameter for request-scoped logging
const moduleLogger = createChildLogger('team-service');

/** Team row joined with its founder */
type TeamRow = {
  id: string;
  name: string;
  teamCode: string;
  inviteToken: string | null;
  inviteExpiresAt: string | null;
  founderUserId: string;
  settings: string | null;
  createdAt: string;
  updatedAt: string;
  founderName: string | null;
  founderNickname: string | null;
};

/** Team row for list queries, carrying the requester's admin flag */
type MemberTeamRow = TeamRow & {
  isAdmin: number;
};

export type CreateTeamInput = {
  name: string;
  teamCode: string;
};

/** Outcome of joining by code, link or accepted invite */
export type JoinTeamResult = {
  message: string;
  team: TeamSummary;
  joined: boolean;
};

export type TeamMessageResult = {
  message: string;
  team: TeamSummary;
};

export type InviteLinkResult = {
  message: string;
  inviteToken: string;
  inviteLink: string;
  expiresAt: string;
};

const TEAM_COLUMNS = `
    t.id,
    t.name,
    t.team_code AS teamCode,
    t.invite_token AS inviteToken,
    t.invite_expires_at AS inviteExpiresAt,
    t.founder_user_id AS founderUserId,
    t.settings,
    t.created_at AS createdAt,
    t.updated_at AS updatedAt,
    f.name AS founderName,
    f.nickname AS founderNickname`;

const TEAM_SELECT = `
  SELECT ${TEAM_COLUMNS}
  FROM teams t
  LEFT JOIN user f ON f.id = t.founder_user_id`;

const MEMBER_TEAM_SELECT = `
  SELECT ${TEAM_COLUMNS}, tm.is_admin AS isAdmin
  FROM team_members tm
  JOIN teams t ON t.id = tm.team_id
  LEFT JOIN user f ON f.id = t.founder_user_id`;

const ACTIVE_INVITE_CONDITION =
  't.invite_token = ? AND (t.invite_expires_at IS NULL OR t.invite_expires_at > ?)';

const ALREADY_MEMBER_MESSAGE = 'You are already a member of this team';

const DENIED_MESSAGES: Record<TeamOperation, string> = {
  viewTeam: 'You do not have permission to view this team',
  updateTeam: "You do not have permission to update this team's name",
  updateSettings:
    "You do not have permission to update this team's settings",
  manageInvites:
    'You do not have permission to generate invite links for this team',
  addAdmin: 'You do not have permission to manage admins of this team',
  removeAdmin: 'You do not have permission to manage admins of this team',
  leave:
    'You cannot leave a team you founded. Transfer ownership or delete the team instead.',
  deleteTeam: 'You do not have permission to delete this team',
};

/** Map a row to the API shape; invite details are only shown to admins */
function toTeamSummary(row: TeamRow, isAdmin: boolean): TeamSummary {
  return {
    id: row.id,
    name: row.name,
    teamCode: row.teamCode,
    ...(isAdmin && {
      inviteToken: row.inviteToken,
      inviteExpiresAt: row.inviteExpiresAt,
    }),
    founderUserId: row.founderUserId,
    settings: parseJsonObject(row.settings),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    founder:
      row.founderName === null
        ? null
        : {
            id: row.founderUserId,
            name: row.founderName,
            nickname: row.founderNickname,
          },
    isAdmin,
  };
}

function generateInviteToken(): string {
  return crypto.randomBytes(TEAMS.INVITE_TOKEN_BYTES).toString('base64url');
}

function daysFromNow(days: number): string {
  return new Date(Date.now() + days * 24 * 60 * 60 * 1000).toISOString();
}

class TeamService {
  constructor(private readonly memberships: MembershipRepository) {}

  // ==========================================================================
  // LOOKUPS
  // ==========================================================================

  private findTeamRow(teamId: string): TeamRow | undefined {
    return executeQuery<TeamRow>(
      `${TEAM_SELECT} WHERE t.id = ?`,
      [teamId],
      `finding team ${teamId}`,
    );
  }

  private requireTeamRow(teamId: string): TeamRow {
    const row = this.findTeamRow(teamId);
    if (!row) {
      throw new NotFoundError('Team not found');
    }
    return row;
  }

  private findTeamByActiveInvite(token: string): TeamRow {
    const row = executeQuery<TeamRow>(
      `${TEAM_SELECT} WHERE ${ACTIVE_INVITE_CONDITION}`,
      [token, nowIso()],
      'finding team by invite token',
    );
    if (!row) {
      throw new NotFoundError('Team not found or invite token expired');
    }
    return row;
  }

  private contextFor(userId: string, teamId: string): AccessContext {
    return {
      teamId,
      membership: this.memberships.findMembership(userId, teamId),
    };
  }

  /** Throws ForbiddenError when the operation is not allowed */
  private assertAllowed(
    operation: TeamOperation,
    userId: string,
    context: AccessContext,
    logger: Logger,
  ): void {
    if (!authorize(operation, userId, context)) {
      logger.warn(
        { action: operation, userId, teamId: context.teamId },
        'Team operation denied',
      );
      throw new ForbiddenError(DENIED_MESSAGES[operation]);
    }
  }

  /**
   * Team summary as seen by `userId`
   */
  private summaryFor(teamId: string, userId: string): TeamSummary {
    const row = this.requireTeamRow(teamId);
    const membership = this.memberships.findMembership(userId, teamId);
    return toTeamSummary(row, membership?.isAdmin ?? false);
  }

  // ==========================================================================
  // TEAM CRUD
  // ==========================================================================

  /**
   * Teams the user belongs to, with founder summary and admin flag
   */
  async listTeams(
    userId: string,
    logger: Logger = moduleLogger,
  ): Promise<TeamSummary[]> {
    const rows = executeQueryAll<MemberTeamRow>(
      `${MEMBER_TEAM_SELECT} WHERE tm.user_id = ? ORDER BY t.name, t.created_at`,
      [userId],
      'listing teams of user',
    );

    logger.debug({ action: 'listTeams', userId, count: rows.length }, 'Listed teams');
    return rows.map((row) => toTeamSummary(row, fromSQLiteBoolean(row.isAdmin)));
  }

  async getTeam(
    userId: string,
    teamId: string,
    logger: Logger = moduleLogger,
  ): Promise<TeamSummary> {
    const row = this.requireTeamRow(teamId);
    const context = this.contextFor(userId, teamId);
    this.assertAllowed('viewTeam', userId, context, logger);

    return toTeamSummary(row, context.membership?.isAdmin ?? false);
  }

  /**
   * Create a team. The founder becomes an admin member in the same
   * transaction.
   */
  async createTeam(
    userId: string,
    input: CreateTeamInput,
    logger: Logger = moduleLogger,
  ): Promise<TeamSummary> {
    const existing = executeQuery<{ id: string }>(
      'SELECT id FROM teams WHERE team_code = ?',
      [input.teamCode],
      'checking team code',
    );
    if (existing) {
      throw new ConflictError('The team code has already been taken.');
    }

    const teamId = generateId();
    const now = nowIso();

    executeTransaction((db) => {
      db.prepare(
        `INSERT INTO teams
           (id, name, team_code, invite_token, invite_expires_at, founder_user_id, settings, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        teamId,
        input.name,
        input.teamCode,
        generateInviteToken(),
        daysFromNow(config.teams.inviteExpiryDays),
        userId,
        JSON.stringify(TEAMS.DEFAULT_SETTINGS),
        now,
        now,
      );
      db.prepare(
        `INSERT INTO team_members (team_id, user_id, is_admin, created_at, updated_at)
         VALUES (?, ?, 1, ?, ?)`,
      ).run(teamId, userId, now, now);
    }, `creating team ${input.name}`);

    logger.info(
      { action: 'createTeam', teamId, name: input.name, userId },
      'Created team',
    );
    return this.summaryFor(teamId, userId);
  }

  async updateName(
    userId: string,
    teamId: string,
    name: string,
    logger: Logger = moduleLogger,
  ): Promise<TeamMessageResult> {
    this.requireTeamRow(teamId);
    this.assertAllowed('updateTeam', userId, this.contextFor(userId, teamId), logger);

    executeUpdate(
      'UPDATE teams SET name = ?, updated_at = ? WHERE id = ?',
      [name, nowIso(), teamId],
      `renaming team ${teamId}`,
    );

    logger.info({ action: 'updateTeamName', teamId, name }, 'Team renamed');
    return {
      message: 'Team name updated successfully',
      team: this.summaryFor(teamId, userId),
    };
  }

  /**
   * Shallow-merge `settings` into the stored settings object
   */
  async updateSettings(
    userId: string,
    teamId: string,
    settings: TeamSettings,
    logger: Logger = moduleLogger,
  ): Promise<TeamMessageResult> {
    const row = this.requireTeamRow(teamId);
    this.assertAllowed(
      'updateSettings',
      userId,
      this.contextFor(userId, teamId),
      logger,
    );

    const merged = { ...parseJsonObject(row.settings), ...settings };
    executeUpdate(
      'UPDATE teams SET settings = ?, updated_at = ? WHERE id = ?',
      [JSON.stringify(merged), nowIso(), teamId],
      `updating settings of team ${teamId}`,
    );

    logger.info(
      { action: 'updateTeamSettings', teamId, keys: Object.keys(settings) },
      'Team settings updated',
    );
    return {
      message: 'Team settings updated successfully',
      team: this.summaryFor(teamId, userId),
    };
  }

  /**
   * Delete a team. Memberships and entries go with it.
   */
  async deleteTeam(
    userId: string,
    teamId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    const row = this.requireTeamRow(teamId);
    this.assertAllowed('deleteTeam', userId, this.contextFor(userId, teamId), logger);

    executeUpdate('DELETE FROM teams WHERE id = ?', [teamId], `deleting team ${teamId}`);
    logger.info({ action: 'deleteTeam', teamId, name: row.name }, 'Team deleted');
  }

  // ==========================================================================
  // MEMBERSHIP
  // ==========================================================================

  private addMember(
    row: TeamRow,
    userId: string,
    joinedMessage: string,
    logger: Logger,
  ): JoinTeamResult {
    const membership = this.memberships.findMembership(userId, row.id);
    if (membership) {
      return {
        message: ALREADY_MEMBER_MESSAGE,
        team: toTeamSummary(row, membership.isAdmin),
        joined: false,
      };
    }

    const now = nowIso();
    executeUpdate(
      `INSERT INTO team_members (team_id, user_id, is_admin, created_at, updated_at)
       VALUES (?, ?, 0, ?, ?)`,
      [row.id, userId, now, now],
      `adding member to team ${row.id}`,
    );

    logger.info({ action: 'joinTeam', teamId: row.id, userId }, 'User joined team');
    return { message: joinedMessage, team: toTeamSummary(row, false), joined: true };
  }

  async joinByCode(
    userId: string,
    teamCode: string,
    logger: Logger = moduleLogger,
  ): Promise<JoinTeamResult> {
    const row = executeQuery<TeamRow>(
      `${TEAM_SELECT} WHERE t.team_code = ?`,
      [teamCode],
      'finding team by code',
    );
    if (!row) {
      throw new NotFoundError('Team not found');
    }
    return this.addMember(row, userId, 'Successfully joined the team', logger);
  }

  async joinByInviteToken(
    userId: string,
    token: string,
    logger: Logger = moduleLogger,
  ): Promise<JoinTeamResult> {
    const row = this.findTeamByActiveInvite(token);
    return this.addMember(row, userId, 'Successfully joined the team', logger);
  }

  async acceptInvite(
    userId: string,
    token: string,
    logger: Logger = moduleLogger,
  ): Promise<JoinTeamResult> {
    const row = this.findTeamByActiveInvite(token);
    return this.addMember(row, userId, 'Invitation accepted successfully', logger);
  }

  /**
   * What an unauthenticated visitor of an invite link may see
   */
  async previewInvite(token: string): Promise<InvitePreviewResponse['team']> {
    const row = this.findTeamByActiveInvite(token);
    return { id: row.id, name: row.name, inviteToken: token };
  }

  async leaveTeam(
    userId: string,
    teamId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    this.requireTeamRow(teamId);
    const context = this.contextFor(userId, teamId);
    if (!context.membership) {
      throw new NotFoundError('You are not a member of this team');
    }
    this.assertAllowed('leave', userId, context, logger);

    executeUpdate(
      'DELETE FROM team_members WHERE team_id = ? AND user_id = ?',
      [teamId, userId],
      `removing member from team ${teamId}`,
    );
    logger.info({ action: 'leaveTeam', teamId, userId }, 'User left team');
  }

  // ==========================================================================
  // INVITES & ADMINS
  // ==========================================================================

  /**
   * Replace the team's invite token. The previous link stops working.
   */
  async generateInvite(
    userId: string,
    teamId: string,
    expiresInDays: number = config.teams.inviteExpiryDays,
    logger: Logger = moduleLogger,
  ): Promise<InviteLinkResult> {
    this.requireTeamRow(teamId);
    this.assertAllowed(
      'manageInvites',
      userId,
      this.contextFor(userId, teamId),
      logger,
    );

    const inviteToken = generateInviteToken();
    const expiresAt = daysFromNow(expiresInDays);
    executeUpdate(
      'UPDATE teams SET invite_token = ?, invite_expires_at = ?, updated_at = ? WHERE id = ?',
      [inviteToken, expiresAt, nowIso(), teamId],
      `generating invite for team ${teamId}`,
    );

    logger.info(
      { action: 'generateInvite', teamId, expiresAt },
      'Invite link generated',
    );
    return {
      message: 'Invite link generated successfully',
      inviteToken,
      inviteLink: `${config.server.publicUrl}/api/teams/join/${inviteToken}`,
      expiresAt,
    };
  }

  async addAdmin(
    userId: string,
    teamId: string,
    targetUserId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    this.requireTeamRow(teamId);
    const context: AccessContext = {
      ...this.contextFor(userId, teamId),
      target: this.memberships.findMembership(targetUserId, teamId),
    };

    // Non-admins are refused before anything about the target is revealed
    if (isAdmin(userId, context) && !context.target) {
      throw new NotFoundError('User is not a member of this team');
    }
    this.assertAllowed('addAdmin', userId, context, logger);

    executeUpdate(
      'UPDATE team_members SET is_admin = 1, updated_at = ? WHERE team_id = ? AND user_id = ?',
      [nowIso(), teamId, targetUserId],
      `promoting member of team ${teamId}`,
    );

    logger.info(
      { action: 'addAdmin', teamId, targetUserId },
      'Member promoted to admin',
    );
  }

  async removeAdmin(
    userId: string,
    teamId: string,
    targetUserId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    this.requireTeamRow(teamId);
    const context: AccessContext = {
      ...this.contextFor(userId, teamId),
      target: this.memberships.findMembership(targetUserId, teamId),
    };

    const { target } = context;
    if (isAdmin(userId, context)) {
      if (!target) {
        throw new NotFoundError('User is not a member of this team');
      }
      if (target.isFounder) {
        throw new ForbiddenError('The team founder cannot be removed as admin');
      }
      if (!target.isAdmin) {
        throw new ValidationError('User is not an admin of this team');
      }
    }
    this.assertAllowed('removeAdmin', userId, context, logger);

    executeUpdate(
      'UPDATE team_members SET is_admin = 0, updated_at = ? WHERE team_id = ? AND user_id = ?',
      [nowIso(), teamId, targetUserId],
      `demoting member of team ${teamId}`,
    );

    logger.info(
      { action: 'removeAdmin', teamId, targetUserId },
      'Admin privileges removed',
    );
  }
}

// Export singleton instance
export const teamService = new TeamService(membershipRepository);
