import express from 'express';
import { TeamController } from '../controllers/teamController.ts';
import {
  authMiddleware,
  optionalAuth,
} from '../middleware/betterAuthMiddleware.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { teamValidationSchemas } from '../validation/teamSchemas.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';
import { teamOperationLimiter } from '../middleware/rateLimiter.ts';
import { entryRouter } from './entryRoutes.ts';

const router = express.Router();

// Invite acceptance answers guests too, so it sits in front of authMiddleware
router.post(
  '/invite/accept',
  teamOperationLimiter,
  optionalAuth,
  validateRequest(teamValidationSchemas.acceptInvite),
  asyncHandler(TeamController.acceptInvite, 'accept invite'),
);

// Everything below requires a bearer session
router.use(authMiddleware);

router.get('/', asyncHandler(TeamController.listTeams, 'list teams'));

router.post(
  '/',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.createTeam),
  asyncHandler(TeamController.createTeam, 'create team'),
);

router.post(
  '/join',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.joinByCode),
  asyncHandler(TeamController.joinByCode, 'join team'),
);

router.get(
  '/join/:token',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.joinByLink),
  asyncHandler(TeamController.joinByLink, 'join team by link'),
);

router.use('/:teamId/entries', entryRouter);

const teamIdRouter = express.Router({ mergeParams: true });

teamIdRouter.get(
  '/',
  validateRequest(teamValidationSchemas.getTeam),
  asyncHandler(TeamController.getTeam, 'get team'),
);

teamIdRouter.delete(
  '/',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.deleteTeam),
  asyncHandler(TeamController.deleteTeam, 'delete team'),
);

teamIdRouter.delete(
  '/leave',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.leaveTeam),
  asyncHandler(TeamController.leaveTeam, 'leave team'),
);

teamIdRouter.patch(
  '/name',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.updateName),
  asyncHandler(TeamController.updateName, 'update team name'),
);

teamIdRouter.patch(
  '/settings',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.updateSettings),
  asyncHandler(TeamController.updateSettings, 'update team settings'),
);

teamIdRouter.post(
  '/invite/generate',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.generateInvite),
  asyncHandler(TeamController.generateInvite, 'generate invite link'),
);

teamIdRouter.post(
  '/admins/add',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.addAdmin),
  asyncHandler(TeamController.addAdmin, 'add team admin'),
);

teamIdRouter.post(
  '/admins/remove',
  teamOperationLimiter,
  validateRequest(teamValidationSchemas.removeAdmin),
  asyncHandler(TeamController.removeAdmin, 'remove team admin'),
);

router.use('/:teamId', teamIdRouter);

export { router as teamRouter };
