import { getMigrations } from 'better-auth/db';
import { auth } from '../lib/auth.ts';
import { getDatabase } from '../utils/database.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { applyAppSchema } from './schema.ts';

const logger = createChildLogger('migration');

// Function to run database migrations
export async function runMigrations(): Promise<void> {
  logger.info('Running database migrations...');

  // better-auth owns user, session, account and verification
  const { toBeCreated, toBeAdded, runMigrations: runAuthMigrations } =
    await getMigrations(auth.options);

  if (toBeCreated.length > 0 || toBeAdded.length > 0) {
    logger.info(
      {
        createTables: toBeCreated.map((table) => table.table),
        alterTables: toBeAdded.map((table) => table.table),
      },
      'Applying auth schema changes',
    );
    await runAuthMigrations();
  }

  applyAppSchema(getDatabase());
  logger.info('✓ Database migrations complete');
}
