// validation/teamSchemas.ts
import { z } from 'zod';
import { TEAMS } from '../constants.ts';
import { requiredId, requiredText, teamParamsSchema } from './shared.ts';

const userIdBody = z.object({
  userId: requiredId('User ID'),
});

export const teamValidationSchemas = {
  /**
   * POST /api/teams - Create a team; the caller becomes its founder
   */
  createTeam: {
    body: z.object({
      name: requiredText('Team name', 255),
      teamCode: requiredText('Team code', 50),
    }),
  },

  /**
   * GET /api/teams/:teamId
   */
  getTeam: {
    params: teamParamsSchema,
  },

  /**
   * POST /api/teams/join - Join by team code
   */
  joinByCode: {
    body: z.object({
      teamCode: requiredText('Team code'),
    }),
  },

  /**
   * GET /api/teams/join/:token - Join through an invite link
   */
  joinByLink: {
    params: z.object({
      token: requiredId('Invite token'),
    }),
  },

  /**
   * POST /api/teams/invite/accept - Accept an invite, or preview it when
   * not logged in
   */
  acceptInvite: {
    body: z.object({
      inviteToken: requiredId('Invite token'),
    }),
  },

  /**
   * DELETE /api/teams/:teamId/leave
   */
  leaveTeam: {
    params: teamParamsSchema,
  },

  /**
   * DELETE /api/teams/:teamId
   */
  deleteTeam: {
    params: teamParamsSchema,
  },

  /**
   * PATCH /api/teams/:teamId/name
   */
  updateName: {
    params: teamParamsSchema,
    body: z.object({
      name: requiredText('Team name', 255),
    }),
  },

  /**
   * PATCH /api/teams/:teamId/settings - Shallow-merged into stored settings
   */
  updateSettings: {
    params: teamParamsSchema,
    body: z.object({
      settings: z
        .object({
          allowAnonymousEntries: z.boolean().optional(),
          requireApproval: z.boolean().optional(),
        })
        .passthrough(),
    }),
  },

  /**
   * POST /api/teams/:teamId/invite/generate - Body is optional
   */
  generateInvite: {
    params: teamParamsSchema,
    body: z
      .object({
        expiresInDays: z
          .number()
          .int('Expiry must be a whole number of days')
          .min(1, 'Expiry must be at least 1 day')
          .max(
            TEAMS.INVITE_EXPIRY_DAYS_MAX,
            `Expiry must not exceed ${TEAMS.INVITE_EXPIRY_DAYS_MAX} days`,
          )
          .optional(),
      })
      .default({}),
  },

  /**
   * POST /api/teams/:teamId/admins/add
   */
  addAdmin: {
    params: teamParamsSchema,
    body: userIdBody,
  },

  /**
   * POST /api/teams/:teamId/admins/remove
   */
  removeAdmin: {
    params: teamParamsSchema,
    body: userIdBody,
  },
};
