/**
 * Entry Service - team-scoped entries with priority scoring, soft delete
 * and CSV export.
 *
 * Lookups are always scoped to the team in the URL, so an entry id from
 * another team is reported as not found.
 */
import type { Logger } from 'pino';
import type {
  CreateEntryRequest,
  Effort,
  Entry,
  ListEntriesQuery,
  PriorityInputs,
  UpdateEntryRequest,
} from '@brainswarming/types';
import type { AuthUser } from '../types/index.ts';
import {
  executeQuery,
  executeQueryAll,
  executeUpdate,
  type QueryParams,
} from '../utils/database.ts';
import {
  fromSQLiteBoolean,
  nowIso,
  parseJsonObject,
  toSQLiteBoolean,
} from '../utils/databaseHelpers.ts';
import { formatCsvTimestamp, toCsv } from '../utils/csv.ts';
import { ForbiddenError, NotFoundError, ValidationError } from '../utils/errors.ts';
import { generateId } from '../utils/generateId.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import {
  authorize,
  type AccessContext,
  type EntryOperation,
} from './accessControl.ts';
import {
  membershipRepository,
  type MembershipRepository,
} from './membershipRepository.ts';
import {
  computePriority,
  mergePriorityInputs,
  priorityFromInputs,
  touchesPriority,
} from './priorityEngine.ts';

const moduleLogger = createChildLogger('entry-service');

/** Entry row joined with its author */
type EntryRow = {
  id: string;
  teamId: string;
  userId: string;
  problem: string;
  solution: string;
  area: string;
  timeSavedPerYear: number | null;
  grossProfitPerYear: number | null;
  // Guaranteed by the CHECK constraint on entries.effort
  effort: Effort;
  monetaryExplanation: string;
  link: string | null;
  anonymous: number;
  manualOverridePrio: number;
  finalPrio: number;
  deletedAt: string | null;
  createdAt: string;
  updatedAt: string;
  authorName: string | null;
  authorNickname: string | null;
};

type TeamSettingsRow = {
  settings: string | null;
};

export type EntryMessageResult = {
  message: string;
  entry: Entry;
};

/** CSV export columns, in output order */
export const EXPORT_COLUMNS = [
  'ID',
  'Problem',
  'Solution',
  'Area',
  'Time Saved Per Year',
  'Gross Profit Per Year',
  'Effort',
  'Monetary Explanation',
  'Link',
  'Anonymous',
  'Final Priority',
  'Created At',
] as const;

const ENTRY_SELECT = `
  SELECT
    e.id,
    e.team_id AS teamId,
    e.user_id AS userId,
    e.problem,
    e.solution,
    e.area,
    e.time_saved_per_year AS timeSavedPerYear,
    e.gross_profit_per_year AS grossProfitPerYear,
    e.effort,
    e.monetary_explanation AS monetaryExplanation,
    e.link,
    e.anonymous,
    e.manual_override_prio AS manualOverridePrio,
    e.final_prio AS finalPrio,
    e.deleted_at AS deletedAt,
    e.created_at AS createdAt,
    e.updated_at AS updatedAt,
    u.name AS authorName,
    u.nickname AS authorNickname
  FROM entries e
  LEFT JOIN user u ON u.id = e.user_id`;

// Ties keep submission order
const RANKING_ORDER = 'ORDER BY e.final_prio DESC, e.rowid ASC';

/** Update payload field -> column, for partial updates */
const UPDATABLE_COLUMNS: ReadonlyArray<
  readonly [keyof UpdateEntryRequest, string]
> = [
  ['problem', 'problem'],
  ['solution', 'solution'],
  ['area', 'area'],
  ['timeSavedPerYear', 'time_saved_per_year'],
  ['grossProfitPerYear', 'gross_profit_per_year'],
  ['effort', 'effort'],
  ['monetaryExplanation', 'monetary_explanation'],
  ['link', 'link'],
  ['anonymous', 'anonymous'],
  ['manualOverridePrio', 'manual_override_prio'],
];

const DENIED_MESSAGES: Record<EntryOperation, string> = {
  viewAny: 'You do not have permission to view entries of this team',
  view: 'You do not have permission to view this entry',
  create: 'You do not have permission to create entries in this team',
  update: 'You do not have permission to update this entry',
  delete: 'You do not have permission to delete this entry',
  restore: 'You do not have permission to restore this entry',
  forceDelete: 'You do not have permission to permanently delete this entry',
};

/**
 * Map a row to the API shape. The author is hidden on anonymous entries
 * from everyone but the author.
 */
function toEntry(row: EntryRow, viewerId: string): Entry {
  const anonymous = fromSQLiteBoolean(row.anonymous);
  const showAuthor = !anonymous || row.userId === viewerId;

  return {
    id: row.id,
    teamId: row.teamId,
    ...(showAuthor && { userId: row.userId }),
    problem: row.problem,
    solution: row.solution,
    area: row.area,
    timeSavedPerYear: row.timeSavedPerYear,
    grossProfitPerYear: row.grossProfitPerYear,
    effort: row.effort,
    monetaryExplanation: row.monetaryExplanation,
    link: row.link,
    anonymous,
    manualOverridePrio: row.manualOverridePrio,
    finalPrio: row.finalPrio,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt,
    ...(showAuthor &&
      row.authorName !== null && {
        user: {
          id: row.userId,
          name: row.authorName,
          nickname: row.authorNickname,
        },
      }),
  };
}

function priorityInputsOf(row: EntryRow): PriorityInputs {
  return {
    manualOverridePrio: row.manualOverridePrio,
    timeSavedPerYear: row.timeSavedPerYear,
    grossProfitPerYear: row.grossProfitPerYear,
    effort: row.effort,
  };
}

function toColumnValue(
  value: string | number | boolean | null | undefined,
): string | number | null {
  if (value === undefined || value === null) return null;
  return typeof value === 'boolean' ? toSQLiteBoolean(value) : value;
}

class EntryService {
  constructor(private readonly memberships: MembershipRepository) {}

  private requireTeamSettings(teamId: string): Record<string, unknown> {
    const team = executeQuery<TeamSettingsRow>(
      'SELECT settings FROM teams WHERE id = ?',
      [teamId],
      `finding team ${teamId}`,
    );
    if (!team) {
      throw new NotFoundError('Team not found');
    }
    return parseJsonObject(team.settings);
  }

  private findEntryRow(
    teamId: string,
    entryId: string,
    trashed: boolean | 'any',
  ): EntryRow {
    const deletedFilter =
      trashed === 'any'
        ? ''
        : trashed
          ? ' AND e.deleted_at IS NOT NULL'
          : ' AND e.deleted_at IS NULL';
    const row = executeQuery<EntryRow>(
      `${ENTRY_SELECT} WHERE e.id = ? AND e.team_id = ?${deletedFilter}`,
      [entryId, teamId],
      `finding entry ${entryId}`,
    );
    if (!row) {
      throw new NotFoundError('Entry not found');
    }
    return row;
  }

  private contextFor(
    userId: string,
    teamId: string,
    entry?: EntryRow,
  ): AccessContext {
    return {
      teamId,
      membership: this.memberships.findMembership(userId, teamId),
      ...(entry && { entry: { teamId: entry.teamId, userId: entry.userId } }),
    };
  }

  private assertAllowed(
    operation: EntryOperation,
    userId: string,
    context: AccessContext,
    logger: Logger,
  ): void {
    if (!authorize(operation, userId, context)) {
      logger.warn(
        { action: operation, userId, teamId: context.teamId },
        'Entry operation denied',
      );
      throw new ForbiddenError(DENIED_MESSAGES[operation]);
    }
  }

  private assertAnonymityAllowed(
    settings: Record<string, unknown>,
    anonymous: boolean | undefined,
  ): void {
    if (anonymous === true && settings.allowAnonymousEntries === false) {
      throw new ValidationError('Anonymous entries are not allowed in this team');
    }
  }

  private liveEntries(teamId: string, area?: string): EntryRow[] {
    const params: QueryParams = [teamId];
    let areaFilter = '';
    if (area !== undefined) {
      areaFilter = ' AND e.area = ?';
      params.push(area);
    }

    return executeQueryAll<EntryRow>(
      `${ENTRY_SELECT} WHERE e.team_id = ? AND e.deleted_at IS NULL${areaFilter} ${RANKING_ORDER}`,
      params,
      `listing entries of team ${teamId}`,
    );
  }

  /**
   * Live entries of a team, highest priority first
   */
  async listEntries(
    userId: string,
    teamId: string,
    query: ListEntriesQuery = {},
    logger: Logger = moduleLogger,
  ): Promise<Entry[]> {
    this.requireTeamSettings(teamId);
    this.assertAllowed('viewAny', userId, this.contextFor(userId, teamId), logger);

    const rows = this.liveEntries(teamId, query.area);
    logger.debug(
      { action: 'listEntries', teamId, area: query.area, count: rows.length },
      'Listed entries',
    );
    return rows.map((row) => toEntry(row, userId));
  }

  /**
   * Soft-deleted entries of a team, most recently deleted first
   */
  async listDeletedEntries(
    userId: string,
    teamId: string,
    logger: Logger = moduleLogger,
  ): Promise<Entry[]> {
    this.requireTeamSettings(teamId);
    this.assertAllowed('viewAny', userId, this.contextFor(userId, teamId), logger);

    return executeQueryAll<EntryRow>(
      `${ENTRY_SELECT} WHERE e.team_id = ? AND e.deleted_at IS NOT NULL
       ORDER BY e.deleted_at DESC, e.rowid DESC`,
      [teamId],
      `listing deleted entries of team ${teamId}`,
    ).map((row) => toEntry(row, userId));
  }

  async getEntry(
    userId: string,
    teamId: string,
    entryId: string,
    logger: Logger = moduleLogger,
  ): Promise<Entry> {
    this.requireTeamSettings(teamId);
    const row = this.findEntryRow(teamId, entryId, false);
    this.assertAllowed('view', userId, this.contextFor(userId, teamId, row), logger);

    return toEntry(row, userId);
  }

  /**
   * Create an entry. `anonymous` defaults to the author's preference where
   * the team allows anonymous entries.
   */
  async createEntry(
    user: AuthUser,
    teamId: string,
    input: CreateEntryRequest,
    logger: Logger = moduleLogger,
  ): Promise<Entry> {
    const settings = this.requireTeamSettings(teamId);
    this.assertAllowed('create', user.id, this.contextFor(user.id, teamId), logger);

    // Only an explicit request is refused; the profile default yields to the team
    this.assertAnonymityAllowed(settings, input.anonymous);
    const anonymous =
      input.anonymous ??
      (user.anonymous && settings.allowAnonymousEntries !== false);

    const manualOverridePrio = input.manualOverridePrio ?? 0;
    const timeSavedPerYear = input.timeSavedPerYear ?? null;
    const grossProfitPerYear = input.grossProfitPerYear ?? null;
    const finalPrio = computePriority(
      manualOverridePrio,
      timeSavedPerYear,
      grossProfitPerYear,
      input.effort,
    );

    const entryId = generateId();
    const now = nowIso();
    executeUpdate(
      `INSERT INTO entries
         (id, team_id, user_id, problem, solution, area, time_saved_per_year,
          gross_profit_per_year, effort, monetary_explanation, link, anonymous,
          manual_override_prio, final_prio, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entryId,
        teamId,
        user.id,
        input.problem,
        input.solution,
        input.area,
        timeSavedPerYear,
        grossProfitPerYear,
        input.effort,
        input.monetaryExplanation,
        input.link ?? null,
        toSQLiteBoolean(anonymous),
        manualOverridePrio,
        finalPrio,
        now,
        now,
      ],
      `creating entry in team ${teamId}`,
    );

    logger.info(
      { action: 'createEntry', teamId, entryId, finalPrio },
      'Entry created',
    );
    return toEntry(this.findEntryRow(teamId, entryId, false), user.id);
  }

  /**
   * Partial update. The score is recomputed from the merged record when
   * the payload carries any priority field.
   */
  async updateEntry(
    userId: string,
    teamId: string,
    entryId: string,
    patch: UpdateEntryRequest,
    logger: Logger = moduleLogger,
  ): Promise<Entry> {
    const settings = this.requireTeamSettings(teamId);
    const row = this.findEntryRow(teamId, entryId, false);
    this.assertAllowed('update', userId, this.contextFor(userId, teamId, row), logger);
    this.assertAnonymityAllowed(settings, patch.anonymous);

    const assignments: string[] = [];
    const params: QueryParams = [];
    for (const [field, column] of UPDATABLE_COLUMNS) {
      if (patch[field] === undefined) continue;
      assignments.push(`${column} = ?`);
      params.push(toColumnValue(patch[field]));
    }

    if (touchesPriority(patch)) {
      const merged = mergePriorityInputs(priorityInputsOf(row), patch);
      assignments.push('final_prio = ?');
      params.push(priorityFromInputs(merged));
    }

    if (assignments.length > 0) {
      assignments.push('updated_at = ?');
      params.push(nowIso(), entryId);
      executeUpdate(
        `UPDATE entries SET ${assignments.join(', ')} WHERE id = ?`,
        params,
        `updating entry ${entryId}`,
      );
    }

    logger.info(
      { action: 'updateEntry', teamId, entryId, fields: Object.keys(patch) },
      'Entry updated',
    );
    return toEntry(this.findEntryRow(teamId, entryId, false), userId);
  }

  /**
   * Soft delete: the entry disappears from listings but can be restored
   */
  async deleteEntry(
    userId: string,
    teamId: string,
    entryId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    this.requireTeamSettings(teamId);
    const row = this.findEntryRow(teamId, entryId, false);
    this.assertAllowed('delete', userId, this.contextFor(userId, teamId, row), logger);

    const now = nowIso();
    executeUpdate(
      'UPDATE entries SET deleted_at = ?, updated_at = ? WHERE id = ?',
      [now, now, entryId],
      `soft deleting entry ${entryId}`,
    );
    logger.info({ action: 'deleteEntry', teamId, entryId }, 'Entry soft deleted');
  }

  async restoreEntry(
    userId: string,
    teamId: string,
    entryId: string,
    logger: Logger = moduleLogger,
  ): Promise<EntryMessageResult> {
    this.requireTeamSettings(teamId);
    const row = this.findEntryRow(teamId, entryId, true);
    this.assertAllowed('restore', userId, this.contextFor(userId, teamId, row), logger);

    executeUpdate(
      'UPDATE entries SET deleted_at = NULL, updated_at = ? WHERE id = ?',
      [nowIso(), entryId],
      `restoring entry ${entryId}`,
    );
    logger.info({ action: 'restoreEntry', teamId, entryId }, 'Entry restored');

    return {
      message: 'Entry restored successfully',
      entry: toEntry(this.findEntryRow(teamId, entryId, false), userId),
    };
  }

  /**
   * Remove an entry permanently, whether or not it was soft deleted
   */
  async forceDeleteEntry(
    userId: string,
    teamId: string,
    entryId: string,
    logger: Logger = moduleLogger,
  ): Promise<void> {
    this.requireTeamSettings(teamId);
    const row = this.findEntryRow(teamId, entryId, 'any');
    this.assertAllowed(
      'forceDelete',
      userId,
      this.contextFor(userId, teamId, row),
      logger,
    );

    executeUpdate('DELETE FROM entries WHERE id = ?', [entryId], `erasing entry ${entryId}`);
    logger.info({ action: 'forceDeleteEntry', teamId, entryId }, 'Entry permanently deleted');
  }

  /**
   * CSV of the team's live entries in ranking order
   */
  async exportCsv(
    userId: string,
    teamId: string,
    logger: Logger = moduleLogger,
  ): Promise<string> {
    this.requireTeamSettings(teamId);
    this.assertAllowed('viewAny', userId, this.contextFor(userId, teamId), logger);

    const rows = this.liveEntries(teamId);
    logger.info({ action: 'exportEntries', teamId, count: rows.length }, 'Exporting entries');

    return toCsv(
      EXPORT_COLUMNS,
      rows.map((row) => [
        row.id,
        row.problem,
        row.solution,
        row.area,
        row.timeSavedPerYear,
        row.grossProfitPerYear,
        row.effort,
        row.monetaryExplanation,
        row.link,
        fromSQLiteBoolean(row.anonymous) ? 'Yes' : 'No',
        row.finalPrio,
        formatCsvTimestamp(row.createdAt),
      ]),
    );
  }
}

// Export singleton instance
export const entryService = new EntryService(membershipRepository);
