import express from 'express';
import { StatusController } from '../controllers/statusController.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { statusValidationSchemas } from '../validation/statusSchemas.ts';

const router = express.Router();

router.get(
  '/',
  validateRequest(statusValidationSchemas.getStatus),
  asyncHandler(StatusController.getStatus, 'get status'),
);

export { router as statusRouter };
