import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique identifier (UUID v4).
 * Used for user-facing IDs of teams and entries.
 */
export function generateId(): string {
  return uuidv4();
}
