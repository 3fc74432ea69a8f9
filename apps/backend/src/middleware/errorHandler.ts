import type { Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';
import type { ApiErrorResponse } from '@brainswarming/types';
import type { AppError, RequestWithLogger } from '../types/index.ts';
import { isHttpError } from '../utils/errors.ts';

type ErrorHandlerRequest = Omit<RequestWithLogger, 'log'> & {
  log?: Logger;
};

/** Resolve the status for errors raised by Express itself or by body-parser */
function statusOf(err: AppError): number {
  const status = err.statusCode ?? err.status;
  return status && status >= 400 && status < 600 ? status : 500;
}

const errorHandler: ErrorRequestHandler = (
  err: AppError,
  req: ErrorHandlerRequest,
  res: Response,
  next: NextFunction,
): void => {
  const logger = req.log?.child({ middleware: 'errorHandler' });

  if (res.headersSent) {
    logger?.error(
      { action: 'errorHandler', err },
      'Error after response headers were sent',
    );
    next(err);
    return;
  }

  const statusCode = statusOf(err);
  let message =
    statusCode < 500 && err.message ? err.message : 'Internal Server Error';
  let code = isHttpError(err) ? err.code : undefined;

  // body-parser rejects malformed JSON with type 'entity.parse.failed'
  if (err.type === 'entity.parse.failed') {
    message = 'Malformed JSON body';
    code = 'BAD_REQUEST';
  }

  const logPayload = {
    action: 'errorHandler',
    err,
    statusCode,
    code,
    path: req.path,
    method: req.method,
  };
  if (statusCode >= 500) {
    logger?.error(logPayload, 'Error occurred');
  } else {
    logger?.warn(logPayload, 'Request rejected');
  }

  const body: ApiErrorResponse = {
    error: message,
    ...(code && { code }),
  };
  res.status(statusCode).json(
    process.env.NODE_ENV === 'development' ? { ...body, stack: err.stack } : body,
  );
};

export { errorHandler };
