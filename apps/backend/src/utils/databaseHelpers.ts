/**
 * Database Helper Utilities
 * Conversions between SQLite storage types and JavaScript values.
 *
 * SQLite stores booleans as integers (0 or 1) and JSON as text.
 */

import { isSettingsObject } from '@brainswarming/types';

/**
 * Convert a SQLite boolean integer (0/1) to a JavaScript boolean
 *
 * @example
 * fromSQLiteBoolean(1) // true
 * fromSQLiteBoolean(null) // false
 */
export function fromSQLiteBoolean(value: number | boolean | null | undefined): boolean {
  return value === 1 || value === true;
}

/** Convert a JavaScript boolean to the integer SQLite stores */
export function toSQLiteBoolean(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

/**
 * Parse a JSON object column, falling back to an empty object for
 * NULL, malformed text or non-object JSON
 */
export function parseJsonObject(
  value: string | null | undefined,
): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isSettingsObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** Current time as the ISO string stored in timestamp columns */
export function nowIso(): string {
  return new Date().toISOString();
}
