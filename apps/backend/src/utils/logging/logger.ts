import pino from 'pino';
import type { Logger } from 'pino';
import { createConsoleStream } from './streamFactories.ts';

// Determine environment from NODE_ENV
const env = process.env.NODE_ENV || 'development';

interface ErrorInfo {
  constructor: { name: string };
  message: string;
  stack?: string;
  code?: string;
  statusCode?: number;
}

interface RequestInfo {
  method?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
}

interface ResponseInfo {
  statusCode?: number;
}

// Custom serializers for enhanced logging
const serializers = {
  // Error serializer carrying HttpError status and code
  err: (err: ErrorInfo | null | undefined) => {
    if (!err) return err;
    return {
      type: err.constructor.name,
      message: err.message,
      stack: err.stack,
      code: err.code,
      statusCode: err.statusCode,
    };
  },

  // HTTP request serializer; never logs the Authorization header
  req: (req: RequestInfo | null | undefined) => {
    if (!req) return req;
    return {
      method: req.method,
      url: req.url,
      headers: {
        'user-agent': req.headers?.['user-agent'],
        'content-type': req.headers?.['content-type'],
      },
    };
  },

  res: (res: ResponseInfo | null | undefined) => {
    if (!res) return res;
    return {
      statusCode: res.statusCode,
    };
  },
};

const logger: Logger = pino(
  {
    level: process.env.LOG_LEVEL || (env === 'development' ? 'debug' : 'info'),
    serializers,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {}, // Remove all base fields for cleaner logs
  },
  createConsoleStream(env),
);

/**
 * Create child logger factory
 */
export const createChildLogger = (
  name: string,
  additionalContext: Record<string, unknown> = {},
): Logger => {
  return logger.child({ ...additionalContext, module: name });
};

// Export main logger
export { logger };
