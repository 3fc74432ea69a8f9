import rateLimit from 'express-rate-limit';
import { RATE_LIMIT } from '../constants.ts';

/** Configuration for creating a rate limiter */
type RateLimiterConfig = {
  /** Time window in milliseconds */
  readonly windowMs: number;
  /** Maximum requests allowed in window */
  readonly maxRequests: number;
  /** Environment variable name for test overrides */
  readonly testEnvVar: string;
  /** Operation name for error message */
  readonly operationName: string;
};

/**
 * Allow tests to override rate limits via environment variables
 */
const getLimit = (defaultValue: number, envVar: string): number => {
  const override = parseInt(process.env[envVar] ?? '', 10);
  return Number.isInteger(override) && override > 0 ? override : defaultValue;
};

/**
 * Factory function to create rate limiters with consistent configuration.
 * Reduces duplication across rate limiter definitions.
 */
const createRateLimiter = (config: RateLimiterConfig) =>
  rateLimit({
    windowMs: config.windowMs,
    limit: getLimit(config.maxRequests, config.testEnvVar),
    message: {
      error: `Too many ${config.operationName} from this IP, please try again later.`,
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

// Registration and login, keyed per IP to slow credential stuffing
export const authLimiter = createRateLimiter({
  windowMs: RATE_LIMIT.WINDOW_FIFTEEN_MINUTES_MS,
  maxRequests: RATE_LIMIT.AUTH_MAX,
  testEnvVar: 'TEST_RATE_LIMIT_AUTH',
  operationName: 'authentication attempts',
});

// Team management, joining and invite operations
export const teamOperationLimiter = createRateLimiter({
  windowMs: RATE_LIMIT.WINDOW_FIFTEEN_MINUTES_MS,
  maxRequests: RATE_LIMIT.TEAM_OPERATIONS_MAX,
  testEnvVar: 'TEST_RATE_LIMIT_TEAM_OPS',
  operationName: 'team operations',
});

// Entry creation, updates and deletions
export const entryWriteLimiter = createRateLimiter({
  windowMs: RATE_LIMIT.WINDOW_ONE_MINUTE_MS,
  maxRequests: RATE_LIMIT.ENTRY_WRITES_MAX,
  testEnvVar: 'TEST_RATE_LIMIT_ENTRY_WRITES',
  operationName: 'entry changes',
});
