import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from '../config/default.ts';
import { createChildLogger } from './logging/logger.ts';

// Module-level logger for database operations
const logger = createChildLogger('database');

// Single connection shared by better-auth and the app tables
let db: Database.Database | null = null;

/** Positional parameters accepted by prepared statements */
export type QueryParams = Array<string | number | bigint | null>;

/**
 * Get or create the database connection
 * @returns The database instance
 */
export function getDatabase(): Database.Database {
  if (!db) {
    const dbPath = config.database.path;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    db = new Database(dbPath);

    // Enable WAL mode for better concurrent access
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL'); // Faster writes, still safe with WAL
    // Membership and entry cleanup rely on ON DELETE CASCADE
    db.pragma('foreign_keys = ON');

    logger.debug({ dbPath }, 'Database connection opened');
  }
  return db;
}

/**
 * Close the connection; the next getDatabase() call opens a fresh one
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Database connection closed');
  }
}

/**
 * Execute a query with error handling
 * @param query - SQL query
 * @param params - Query parameters
 * @param operation - Description of operation for error logging
 * @returns First row, if any
 */
export function executeQuery<T>(
  query: string,
  params: QueryParams = [],
  operation = 'query',
): T | undefined {
  try {
    const stmt = getDatabase().prepare<QueryParams, T>(query);
    return stmt.get(...params);
  } catch (error) {
    logger.error(
      { err: error, operation, query, paramCount: params.length },
      `DB error during ${operation}`,
    );
    throw error;
  }
}

/**
 * Execute a query that returns multiple rows
 * @param query - SQL query
 * @param params - Query parameters
 * @param operation - Description of operation for error logging
 * @returns Query results
 */
export function executeQueryAll<T>(
  query: string,
  params: QueryParams = [],
  operation = 'query',
): T[] {
  try {
    const stmt = getDatabase().prepare<QueryParams, T>(query);
    return stmt.all(...params);
  } catch (error) {
    logger.error(
      { err: error, operation, query, paramCount: params.length },
      `DB error during ${operation}`,
    );
    throw error;
  }
}

/**
 * Execute a query that modifies data
 * @param query - SQL query
 * @param params - Query parameters
 * @param operation - Description of operation for error logging
 * @returns Query result
 */
export function executeUpdate(
  query: string,
  params: QueryParams = [],
  operation = 'update',
): Database.RunResult {
  try {
    const stmt = getDatabase().prepare<QueryParams>(query);
    return stmt.run(...params);
  } catch (error) {
    logger.error(
      { err: error, operation, query, paramCount: params.length },
      `DB error during ${operation}`,
    );
    throw error;
  }
}

/**
 * Execute multiple statements in a transaction
 * @param transactionFn - Function that receives the database instance
 * @param operation - Description of operation for error logging
 * @returns Transaction result
 */
export function executeTransaction<T>(
  transactionFn: (database: Database.Database) => T,
  operation = 'transaction',
): T {
  const database = getDatabase();
  const transaction = database.transaction(transactionFn);

  try {
    return transaction(database);
  } catch (error) {
    logger.error(
      { err: error, operation },
      `DB transaction error during ${operation}`,
    );
    throw error;
  }
}
