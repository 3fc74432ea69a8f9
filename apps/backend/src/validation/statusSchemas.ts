// validation/statusSchemas.ts
import { emptyStrictSchema } from './shared.ts';

/**
 * Validation schemas for status endpoints
 */
export const statusValidationSchemas = {
  /**
   * GET /api/status - Health check
   * Public endpoint; no query parameters accepted
   */
  getStatus: {
    query: emptyStrictSchema,
  },
} as const;
