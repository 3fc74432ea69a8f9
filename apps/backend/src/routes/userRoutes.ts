import express from 'express';
import { UserController } from '../controllers/userController.ts';
import { authMiddleware } from '../middleware/betterAuthMiddleware.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';

const router = express.Router();

router.get(
  '/user',
  authMiddleware,
  asyncHandler(UserController.getCurrentUser, 'get current user'),
);

router.get(
  '/me/teams',
  authMiddleware,
  asyncHandler(UserController.getTeams, 'get user teams'),
);

export { router as userRouter };
