// validation/shared.ts
import { z } from 'zod';

/**
 * Non-empty string identifier with a field-specific message
 * @example requiredId('Team ID')
 */
export const requiredId = (fieldName: string) =>
  z.string().min(1, `${fieldName} is required`);

/** Query or body that must not carry any property */
export const emptyStrictSchema = z.object({}).strict();

/** Trimmed, non-empty text capped at `max` characters */
export const requiredText = (fieldName: string, max?: number) => {
  const base = z.string().trim().min(1, `${fieldName} is required`);
  return max === undefined
    ? base
    : base.max(max, `${fieldName} must not exceed ${max} characters`);
};

/** Route parameters of team-scoped routes */
export const teamParamsSchema = z.object({
  teamId: requiredId('Team ID'),
});

/** Route parameters of single-entry routes */
export const entryParamsSchema = teamParamsSchema.extend({
  id: requiredId('Entry ID'),
});
