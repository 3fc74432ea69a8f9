/**
 * Backend-specific TypeScript types.
 *
 * These types depend on Express/Pino, so they are NOT in the shared
 * @brainswarming/types package.
 */

// Request types
export type { RequestWithLogger, TypedRequest } from './request.ts';

// Auth types
export type {
  AuthUser,
  AuthSession,
  AuthenticatingRequest,
  AuthenticatedRequest,
} from './auth.ts';

// Error and validation types
export type {
  AppError,
  ValidationSchema,
  ValidationErrorDetail,
} from './errors.ts';
