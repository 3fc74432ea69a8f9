/**
 * Domain Type Guards
 *
 * Runtime type guards for domain values.
 */

import { EFFORT_LEVELS, type Effort } from '../domain/entry.ts';

/** Check if value is one of the accepted effort levels */
export function isEffort(value: unknown): value is Effort {
  return EFFORT_LEVELS.some((level) => level === value);
}

/** Check if value is a plain settings object (not an array or null) */
export function isSettingsObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
