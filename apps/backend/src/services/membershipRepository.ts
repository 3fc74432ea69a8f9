/**
 * Membership Repository - resolves MembershipSnapshot values from storage
 * so that access decisions stay pure.
 */
import { executeQuery, executeQueryAll } from '../utils/database.ts';
import { fromSQLiteBoolean } from '../utils/databaseHelpers.ts';
import type { MembershipSnapshot } from './accessControl.ts';

/** Read-only membership lookups used before every authorization check */
export interface MembershipRepository {
  findMembership(userId: string, teamId: string): MembershipSnapshot | null;
  listMembers(teamId: string): MembershipSnapshot[];
}

/** Row shape of team_members joined with the owning team */
type MembershipRow = {
  userId: string;
  teamId: string;
  isAdmin: number;
  founderUserId: string;
};

const MEMBERSHIP_SELECT = `
  SELECT
    tm.user_id AS userId,
    tm.team_id AS teamId,
    tm.is_admin AS isAdmin,
    t.founder_user_id AS founderUserId
  FROM team_members tm
  JOIN teams t ON t.id = tm.team_id`;

function toSnapshot(row: MembershipRow): MembershipSnapshot {
  return {
    userId: row.userId,
    teamId: row.teamId,
    isAdmin: fromSQLiteBoolean(row.isAdmin),
    isFounder: row.founderUserId === row.userId,
  };
}

export class SqliteMembershipRepository implements MembershipRepository {
  findMembership(userId: string, teamId: string): MembershipSnapshot | null {
    const row = executeQuery<MembershipRow>(
      `${MEMBERSHIP_SELECT} WHERE tm.user_id = ? AND tm.team_id = ?`,
      [userId, teamId],
      'finding team membership',
    );
    return row ? toSnapshot(row) : null;
  }

  listMembers(teamId: string): MembershipSnapshot[] {
    return executeQueryAll<MembershipRow>(
      `${MEMBERSHIP_SELECT} WHERE tm.team_id = ? ORDER BY tm.created_at, tm.user_id`,
      [teamId],
      'listing team members',
    ).map(toSnapshot);
  }
}

export const membershipRepository: MembershipRepository =
  new SqliteMembershipRepository();
