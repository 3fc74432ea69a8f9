/**
 * Team API Types
 *
 * Request/response types for team, membership and invite endpoints.
 */

import type { Team, TeamSettings, TeamSummary } from '../domain/team.ts';

// ============================================================================
// TEAM CRUD
// ============================================================================

export interface CreateTeamRequest {
  name: string;
  teamCode: string;
}

export interface TeamResponse {
  team: TeamSummary;
}

export interface ListTeamsResponse {
  teams: TeamSummary[];
}

export interface UpdateTeamNameRequest {
  name: string;
}

export interface UpdateTeamSettingsRequest {
  settings: TeamSettings;
}

export interface TeamMessageResponse {
  message: string;
  team: TeamSummary;
}

// ============================================================================
// JOINING
// ============================================================================

export interface JoinTeamRequest {
  teamCode: string;
}

export interface AcceptInviteRequest {
  inviteToken: string;
}

export interface JoinTeamResponse {
  message: string;
  team: Team;
}

/** Returned to unauthenticated callers of the accept endpoint */
export interface InvitePreviewResponse {
  message: string;
  team: Pick<Team, 'id' | 'name'> & { inviteToken: string };
}

// ============================================================================
// INVITES & ADMINS
// ============================================================================

export interface GenerateInviteRequest {
  expiresInDays?: number;
}

export interface GenerateInviteResponse {
  message: string;
  inviteToken: string;
  inviteLink: string;
  expiresAt: string;
}

export interface TeamAdminRequest {
  userId: string;
}
