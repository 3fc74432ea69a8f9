/**
 * HTTP error classes.
 *
 * Services throw these; asyncHandler and errorHandler turn them into
 * responses using `statusCode` and `code`.
 *
 *   throw new NotFoundError('Team not found')
 *   throw new ForbiddenError('You do not have permission to update this entry')
 */

export type ErrorCode =
  | 'BAD_REQUEST'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'INVALID_PRIORITY_INPUT';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 403 */
export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden') {
    super(403, message, 'FORBIDDEN');
  }
}

/** 404 */
export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message, 'NOT_FOUND');
  }
}

/** 409 */
export class ConflictError extends HttpError {
  constructor(message = 'Conflict') {
    super(409, message, 'CONFLICT');
  }
}

/** 422 - well-formed request that breaks a domain rule */
export class ValidationError extends HttpError {
  constructor(message = 'Validation failed', code: ErrorCode = 'VALIDATION_ERROR') {
    super(422, message, code);
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}
