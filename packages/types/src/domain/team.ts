/**
 * Team Domain Types
 *
 * A team is the tenant boundary: entries belong to exactly one team and
 * users join teams through a membership that carries an admin flag.
 */

/**
 * Open key-value bag of team settings. Known keys:
 * - `allowAnonymousEntries` (default true): when false, entries of this
 *   team cannot be submitted anonymously
 * - `requireApproval` (default false)
 */
export type TeamSettings = Record<string, unknown>;

/** Founder summary embedded in team responses */
export type TeamFounder = {
  id: string;
  name: string;
  nickname: string | null;
};

/** Full team entity */
export type Team = {
  id: string;
  name: string;
  /** Unique code other users join with */
  teamCode: string;
  /** Only exposed to team admins */
  inviteToken?: string | null;
  inviteExpiresAt?: string | null;
  founderUserId: string;
  settings: TeamSettings;
  createdAt: string;
  updatedAt: string;
};

/** Team as seen by one of its members */
export type TeamSummary = Team & {
  founder: TeamFounder | null;
  /** Whether the requesting user administers this team */
  isAdmin: boolean;
};

/** The (user, team) relationship */
export type Membership = {
  userId: string;
  teamId: string;
  isAdmin: boolean;
};
