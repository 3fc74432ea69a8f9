/**
 * API Response Types
 *
 * Shapes shared by every endpoint.
 */

/** Validation error detail returned alongside a 400 */
export type ValidationErrorDetail = {
  /** Dotted path to the invalid field */
  path: string;
  message: string;
  /** Zod issue code */
  code: string;
};

/** Error body returned by every failing endpoint */
export type ApiErrorResponse = {
  error: string;
  code?: string;
  details?: Array<ValidationErrorDetail>;
};

/** Plain acknowledgement */
export type MessageResponse = {
  message: string;
};
