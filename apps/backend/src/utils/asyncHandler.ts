import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';
import type { ApiErrorResponse } from '@brainswarming/types';
import { createChildLogger } from './logging/logger.ts';
import { isHttpError } from './errors.ts';

const defaultLogger = createChildLogger('async-handler');

type RequestWithOptionalLogger = Omit<Request, 'log'> & {
  log?: Logger;
};

/**
 * Controller handler. Controllers declare the request shape the route's
 * middleware chain establishes (authenticated user, validated body).
 */
type ControllerHandler<TReq> = (
  req: TReq,
  res: Response,
  next: NextFunction,
) => Promise<void>;

/**
 * Async handler wrapper for Express route handlers.
 * Catches promise rejections; HttpError subclasses answer with their own
 * status and code, anything else becomes a 500 named after the operation.
 */
export const asyncHandler = <TReq = Request>(
  fn: ControllerHandler<TReq>,
  operation?: string,
): RequestHandler => {
  return async (
    req: RequestWithOptionalLogger,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      // The route's middleware has populated what TReq declares
      await fn(req as unknown as TReq, res, next);
    } catch (error) {
      const logger = req.log || defaultLogger;

      if (isHttpError(error) && error.statusCode < 500) {
        logger.warn(
          { err: error, operation, statusCode: error.statusCode },
          `Rejected ${operation || 'request'}: ${error.message}`,
        );
        const rejection: ApiErrorResponse = {
          error: error.message,
          code: error.code,
        };
        res.status(error.statusCode).json(rejection);
        return;
      }

      logger.error(
        { err: error, operation },
        `Error ${operation || 'in request'}`,
      );

      const errorMessage =
        error instanceof Error ? error.message : String(error);
      const responseMessage = operation
        ? `Failed to ${operation}`
        : errorMessage || 'An error occurred';
      const failure: ApiErrorResponse = { error: responseMessage };
      res.status(500).json(failure);
    }
  };
};
