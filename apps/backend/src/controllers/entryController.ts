import type { Response } from 'express';
import type {
  CreateEntryRequest,
  EntryResponse,
  ListEntriesQuery,
  ListEntriesResponse,
  MessageResponse,
  RestoreEntryResponse,
  UpdateEntryRequest,
} from '@brainswarming/types';
import type { AuthenticatedRequest } from '../types/index.ts';
import { entryService } from '../services/entryService.ts';

type TeamParams = { teamId: string };
type EntryParams = TeamParams & { id: string };

/**
 * Controller class for the entries of a team
 * Mounted under /api/teams/:teamId/entries.
 *
 * All methods are static and follow Express route handler pattern (req, res).
 * Request-scoped logging is available via req.log.
 */
export class EntryController {
  /**
   * Live entries, highest priority first, optionally filtered by area
   */
  static async listEntries(
    req: AuthenticatedRequest<TeamParams, unknown, ListEntriesQuery>,
    res: Response,
  ): Promise<void> {
    const entries = await entryService.listEntries(
      req.user.id,
      req.params.teamId,
      req.query,
      req.log,
    );
    const response: ListEntriesResponse = { entries };
    res.json(response);
  }

  static async listDeletedEntries(
    req: AuthenticatedRequest<TeamParams>,
    res: Response,
  ): Promise<void> {
    const entries = await entryService.listDeletedEntries(
      req.user.id,
      req.params.teamId,
      req.log,
    );
    const response: ListEntriesResponse = { entries };
    res.json(response);
  }

  static async createEntry(
    req: AuthenticatedRequest<TeamParams, CreateEntryRequest>,
    res: Response,
  ): Promise<void> {
    const entry = await entryService.createEntry(
      req.user,
      req.params.teamId,
      req.body,
      req.log,
    );
    const response: EntryResponse = { entry };
    res.status(201).json(response);
  }

  static async getEntry(
    req: AuthenticatedRequest<EntryParams>,
    res: Response,
  ): Promise<void> {
    const entry = await entryService.getEntry(
      req.user.id,
      req.params.teamId,
      req.params.id,
      req.log,
    );
    const response: EntryResponse = { entry };
    res.json(response);
  }

  static async updateEntry(
    req: AuthenticatedRequest<EntryParams, UpdateEntryRequest>,
    res: Response,
  ): Promise<void> {
    const entry = await entryService.updateEntry(
      req.user.id,
      req.params.teamId,
      req.params.id,
      req.body,
      req.log,
    );
    const response: EntryResponse = { entry };
    res.json(response);
  }

  /**
   * Soft delete
   */
  static async deleteEntry(
    req: AuthenticatedRequest<EntryParams>,
    res: Response,
  ): Promise<void> {
    await entryService.deleteEntry(
      req.user.id,
      req.params.teamId,
      req.params.id,
      req.log,
    );
    const response: MessageResponse = { message: 'Entry deleted successfully' };
    res.json(response);
  }

  static async restoreEntry(
    req: AuthenticatedRequest<EntryParams>,
    res: Response,
  ): Promise<void> {
    const result = await entryService.restoreEntry(
      req.user.id,
      req.params.teamId,
      req.params.id,
      req.log,
    );
    const response: RestoreEntryResponse = result;
    res.json(response);
  }

  static async forceDeleteEntry(
    req: AuthenticatedRequest<EntryParams>,
    res: Response,
  ): Promise<void> {
    await entryService.forceDeleteEntry(
      req.user.id,
      req.params.teamId,
      req.params.id,
      req.log,
    );
    const response: MessageResponse = {
      message: 'Entry permanently deleted successfully',
    };
    res.json(response);
  }

  /**
   * Download the team's live entries as CSV
   */
  static async exportEntries(
    req: AuthenticatedRequest<TeamParams>,
    res: Response,
  ): Promise<void> {
    const csv = await entryService.exportCsv(
      req.user.id,
      req.params.teamId,
      req.log,
    );

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename=entries.csv');
    res.send(csv);
  }
}
