/**
 * Application-wide constants
 */

export const RATE_LIMIT = {
  WINDOW_FIFTEEN_MINUTES_MS: 15 * 60 * 1000,
  WINDOW_ONE_MINUTE_MS: 60 * 1000,
  AUTH_MAX: 20,
  TEAM_OPERATIONS_MAX: 100,
  ENTRY_WRITES_MAX: 120,
} as const;

export const TEAMS = {
  INVITE_TOKEN_BYTES: 24,
  INVITE_EXPIRY_DAYS_DEFAULT: 7,
  INVITE_EXPIRY_DAYS_MAX: 365,
  DEFAULT_SETTINGS: {
    allowAnonymousEntries: true,
    requireApproval: false,
  },
} as const;

export const PRIORITY = {
  TIME_SAVED_DIVISOR: 100,
  GROSS_PROFIT_DIVISOR: 1000,
  EFFORT_FACTORS: {
    low: 3,
    medium: 2,
    high: 1,
  },
} as const;

export const SERVER_SHUTDOWN = {
  CLOSE_SERVER_TIMEOUT_MS: 10000,
} as const;
