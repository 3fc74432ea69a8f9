/**
 * Error and validation types for Express middleware.
 */

import type { ZodType } from 'zod';

/**
 * Error as seen by the final error middleware. Body-parser and other
 * Express middleware attach `statusCode`/`status`; HttpError sets
 * `statusCode` and `code`.
 */
export type AppError = Error & {
  /** HTTP status code to return */
  statusCode?: number;
  status?: number;
  /** Error code (e.g., 'NOT_FOUND', 'entity.parse.failed') */
  code?: string;
  type?: string;
};

/**
 * Schema configuration for request validation middleware.
 * Defines Zod schemas for body, query, and params validation.
 */
export type ValidationSchema = {
  /** Schema for request body validation */
  body?: ZodType;
  /** Schema for query parameters validation */
  query?: ZodType;
  /** Schema for URL parameters validation */
  params?: ZodType;
};

export type { ValidationErrorDetail } from '@brainswarming/types';
