import express from 'express';
import { EntryController } from '../controllers/entryController.ts';
import { entryWriteLimiter } from '../middleware/rateLimiter.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { entryValidationSchemas } from '../validation/entrySchemas.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';

// Mounted under /api/teams/:teamId/entries behind authMiddleware
const router = express.Router({ mergeParams: true });

router.get(
  '/',
  validateRequest(entryValidationSchemas.listEntries),
  asyncHandler(EntryController.listEntries, 'list entries'),
);

router.post(
  '/',
  entryWriteLimiter,
  validateRequest(entryValidationSchemas.createEntry),
  asyncHandler(EntryController.createEntry, 'create entry'),
);

// Fixed paths must be registered before /:id
router.get(
  '/deleted',
  validateRequest(entryValidationSchemas.teamScoped),
  asyncHandler(EntryController.listDeletedEntries, 'list deleted entries'),
);

router.get(
  '/export',
  validateRequest(entryValidationSchemas.teamScoped),
  asyncHandler(EntryController.exportEntries, 'export entries'),
);

router.get(
  '/:id',
  validateRequest(entryValidationSchemas.entryScoped),
  asyncHandler(EntryController.getEntry, 'get entry'),
);

router.patch(
  '/:id',
  entryWriteLimiter,
  validateRequest(entryValidationSchemas.updateEntry),
  asyncHandler(EntryController.updateEntry, 'update entry'),
);

router.delete(
  '/:id',
  entryWriteLimiter,
  validateRequest(entryValidationSchemas.entryScoped),
  asyncHandler(EntryController.deleteEntry, 'delete entry'),
);

router.post(
  '/:id/restore',
  entryWriteLimiter,
  validateRequest(entryValidationSchemas.entryScoped),
  asyncHandler(EntryController.restoreEntry, 'restore entry'),
);

router.delete(
  '/:id/force',
  entryWriteLimiter,
  validateRequest(entryValidationSchemas.entryScoped),
  asyncHandler(EntryController.forceDeleteEntry, 'permanently delete entry'),
);

export { router as entryRouter };
