// config/default.ts
import path from 'path';
import { TEAMS } from '../constants.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const configLogger = createChildLogger('config');

function determineStorageBase(): string {
  // If explicitly set through environment variable, use that
  if (process.env.STORAGE_BASE) {
    return process.env.STORAGE_BASE;
  }

  return path.join(process.cwd(), 'storage');
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

interface DatabaseConfig {
  /** File path of the SQLite database, or ':memory:' */
  path: string;
}

interface ServerConfig {
  port: number;
  /** Public base URL used when building invite links */
  publicUrl: string;
  corsOrigins: string[];
}

interface TeamsConfig {
  inviteExpiryDays: number;
}

export interface Config {
  env: string | undefined;
  secretKey: string;
  database: DatabaseConfig;
  server: ServerConfig;
  teams: TeamsConfig;
}

const storageBase = determineStorageBase();
const port = parsePositiveInt(process.env.PORT, 3000);

export const config: Config = {
  env: process.env.NODE_ENV,
  secretKey:
    process.env.SECRET_KEY ||
    (() => {
      if (process.env.NODE_ENV === 'production') {
        throw new Error(
          'SECRET_KEY environment variable is required in production!',
        );
      }
      configLogger.warn(
        'Using development SECRET_KEY. Set SECRET_KEY environment variable for production.',
      );
      return 'dev-secret-key-for-brainswarming-change-in-production';
    })(),
  database: {
    path:
      process.env.DATABASE_PATH || path.join(storageBase, 'brainswarming.db'),
  },
  server: {
    port,
    publicUrl: (process.env.APP_URL || `http://localhost:${port}`).replace(
      /\/+$/,
      '',
    ),
    corsOrigins: parseList(process.env.CORS_ORIGINS, [
      'http://localhost:5173',
    ]),
  },
  teams: {
    inviteExpiryDays: parsePositiveInt(
      process.env.INVITE_EXPIRY_DAYS,
      TEAMS.INVITE_EXPIRY_DAYS_DEFAULT,
    ),
  },
};
