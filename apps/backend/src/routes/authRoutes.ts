import express from 'express';
import { AuthController } from '../controllers/authController.ts';
import { authMiddleware } from '../middleware/betterAuthMiddleware.ts';
import { authLimiter } from '../middleware/rateLimiter.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { authValidationSchemas } from '../validation/authSchemas.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';

const router = express.Router();

// Public endpoints
router.post(
  '/register',
  authLimiter,
  validateRequest(authValidationSchemas.register),
  asyncHandler(AuthController.register, 'register user'),
);

router.post(
  '/login',
  authLimiter,
  validateRequest(authValidationSchemas.login),
  asyncHandler(AuthController.login, 'log in'),
);

router.post(
  '/logout',
  authMiddleware,
  asyncHandler(AuthController.logout, 'log out'),
);

export { router as authRouter };
