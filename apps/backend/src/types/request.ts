/**
 * Express request types with Pino logger integration.
 */

import type { Request } from 'express';
import type { Logger } from 'pino';

/**
 * Express request extended with request-scoped Pino logger.
 * The `log` property is attached by the pino-http middleware.
 */
export type RequestWithLogger = Omit<Request, 'log'> & {
  /** Request-scoped Pino logger (set by pino-http) */
  log: Logger;
};

/**
 * Request whose params, body and query have been validated by
 * validateRequest. Express types them loosely; routes declare the
 * parsed shapes here.
 */
export type TypedRequest<
  TParams = Record<string, string>,
  TBody = unknown,
  TQuery = Record<string, unknown>,
> = Omit<RequestWithLogger, 'params' | 'body' | 'query'> & {
  params: TParams;
  body: TBody;
  query: TQuery;
};
