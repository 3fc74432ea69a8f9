/**
 * Access Control Model
 *
 * Pure predicates deciding whether an actor may perform an operation on a
 * team or an entry. Membership is resolved beforehand into a
 * MembershipSnapshot (see membershipRepository.ts); nothing in this module
 * touches storage and nothing in it throws.
 *
 * A `null` membership means "not a member". A snapshot whose team or user
 * does not match the resource and actor under evaluation never grants.
 */

/** The actor's (or a target's) relationship to one team, as of lookup time */
export type MembershipSnapshot = {
  userId: string;
  teamId: string;
  isAdmin: boolean;
  isFounder: boolean;
};

/** Ownership facts of the entry an operation is about */
export type EntryOwnership = {
  teamId: string;
  /** Creator of the entry */
  userId: string;
};

/** Everything a predicate may look at */
export type AccessContext = {
  /** Team the request is scoped to */
  teamId: string;
  /** Actor's membership of `teamId`, or null when not a member */
  membership: MembershipSnapshot | null;
  /** Present for entry operations */
  entry?: EntryOwnership;
  /** Target user's membership, for admin management */
  target?: MembershipSnapshot | null;
};

export type EntryOperation =
  | 'viewAny'
  | 'view'
  | 'create'
  | 'update'
  | 'delete'
  | 'restore'
  | 'forceDelete';

export type TeamOperation =
  | 'viewTeam'
  | 'updateTeam'
  | 'updateSettings'
  | 'manageInvites'
  | 'addAdmin'
  | 'removeAdmin'
  | 'leave'
  | 'deleteTeam';

export type AccessOperation = EntryOperation | TeamOperation;

type Predicate = (actorId: string, context: AccessContext) => boolean;

/** Team the operation actually targets: the entry's team when there is one */
function resourceTeamId(context: AccessContext): string {
  return context.entry?.teamId ?? context.teamId;
}

function belongsTo(
  snapshot: MembershipSnapshot | null | undefined,
  userId: string,
  teamId: string,
): snapshot is MembershipSnapshot {
  return (
    snapshot != null && snapshot.userId === userId && snapshot.teamId === teamId
  );
}

export function isMember(actorId: string, context: AccessContext): boolean {
  return belongsTo(context.membership, actorId, resourceTeamId(context));
}

export function isAdmin(actorId: string, context: AccessContext): boolean {
  const { membership } = context;
  return (
    belongsTo(membership, actorId, resourceTeamId(context)) &&
    membership.isAdmin
  );
}

export function isFounder(actorId: string, context: AccessContext): boolean {
  const { membership } = context;
  return (
    belongsTo(membership, actorId, resourceTeamId(context)) &&
    membership.isFounder
  );
}

export function isEntryCreator(
  actorId: string,
  context: AccessContext,
): boolean {
  return context.entry !== undefined && context.entry.userId === actorId;
}

// Entry operations

export const canViewAny: Predicate = isMember;
export const canView: Predicate = (actorId, context) =>
  context.entry !== undefined && isMember(actorId, context);
export const canCreate: Predicate = isMember;

/** Creator or team admin. Also governs soft delete and restore. */
export const canUpdate: Predicate = (actorId, context) =>
  context.entry !== undefined &&
  (isEntryCreator(actorId, context) || isAdmin(actorId, context));

/** Ownership alone is not enough to erase an entry */
export const canForceDelete: Predicate = (actorId, context) =>
  context.entry !== undefined && isAdmin(actorId, context);

// Team operations

export const canAddAdmin: Predicate = (actorId, context) => {
  const { target } = context;
  return (
    isAdmin(actorId, context) &&
    target != null &&
    target.teamId === context.teamId
  );
};

/** The founder can never be demoted */
export const canRemoveAdmin: Predicate = (actorId, context) => {
  const { target } = context;
  return (
    isAdmin(actorId, context) &&
    target != null &&
    target.teamId === context.teamId &&
    target.isAdmin &&
    !target.isFounder
  );
};

export const canLeave: Predicate = (actorId, context) =>
  isMember(actorId, context) && !isFounder(actorId, context);

const POLICIES: Record<AccessOperation, Predicate> = {
  viewAny: canViewAny,
  view: canView,
  create: canCreate,
  update: canUpdate,
  delete: canUpdate,
  restore: canUpdate,
  forceDelete: canForceDelete,
  viewTeam: isMember,
  updateTeam: isAdmin,
  updateSettings: isAdmin,
  manageInvites: isAdmin,
  addAdmin: canAddAdmin,
  removeAdmin: canRemoveAdmin,
  leave: canLeave,
  deleteTeam: isAdmin,
};

/**
 * Decide whether `actorId` may perform `operation` given a resolved
 * snapshot of the actor's (and, for admin management, the target's)
 * membership.
 */
export function authorize(
  operation: AccessOperation,
  actorId: string,
  context: AccessContext,
): boolean {
  return POLICIES[operation](actorId, context);
}
