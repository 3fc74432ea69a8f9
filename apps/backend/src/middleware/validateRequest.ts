import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';
import type { ZodError, ZodIssue } from 'zod';
import type { ApiErrorResponse } from '@brainswarming/types';
import type {
  ValidationErrorDetail,
  ValidationSchema,
} from '../types/index.ts';

/** Extended request with logger */
type RequestWithOptionalLogger = Omit<Request, 'log'> & {
  log?: Logger;
};

type ValidationTarget = keyof ValidationSchema;

const TARGETS: ReadonlyArray<{
  target: ValidationTarget;
  code: string;
  label: string;
}> = [
  { target: 'body', code: 'INVALID_REQUEST_BODY', label: 'Request body' },
  { target: 'query', code: 'INVALID_QUERY_PARAMETERS', label: 'Query parameters' },
  { target: 'params', code: 'INVALID_ROUTE_PARAMETERS', label: 'Route parameters' },
];

/**
 * Validation middleware factory. Each configured part of the request is
 * parsed with its zod schema and replaced by the parsed value, so
 * controllers see defaults and coerced types.
 * @param schema - Zod schemas for body, query, and params
 */
export function validateRequest(schema: ValidationSchema): RequestHandler {
  return (
    req: RequestWithOptionalLogger,
    res: Response,
    next: NextFunction,
  ): void => {
    const logger = req.log?.child({ middleware: 'validateRequest' });

    try {
      for (const { target, code, label } of TARGETS) {
        const targetSchema = schema[target];
        if (!targetSchema) continue;

        const result = targetSchema.safeParse(req[target]);
        if (!result.success) {
          const errors = mapZodErrors(result.error);

          logger?.warn(
            { action: 'validateRequest', target, errors },
            `${label} validation failed`,
          );

          const response: ApiErrorResponse = {
            error: 'Validation error',
            code,
            details: errors,
          };
          res.status(400).json(response);
          return;
        }

        // Express 5 exposes query through a getter, so redefine instead of assigning
        Object.defineProperty(req, target, {
          value: result.data,
          writable: true,
          enumerable: true,
          configurable: true,
        });
      }

      next();
    } catch (error) {
      logger?.error(
        { err: error },
        'Unexpected error in validation middleware',
      );
      res.status(500).json({
        error: 'Internal validation error',
        code: 'VALIDATION_ERROR',
      });
    }
  };
}

/**
 * Map Zod errors to validation error details
 */
function mapZodErrors(error: ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue: ZodIssue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}
