// validation/entrySchemas.ts
import { z } from 'zod';
import { EFFORT_LEVELS } from '@brainswarming/types';
import { entryParamsSchema, requiredText, teamParamsSchema } from './shared.ts';

const effortSchema = z.enum(['low', 'medium', 'high'], {
  errorMap: () => ({
    message: `Effort must be one of ${EFFORT_LEVELS.join(', ')}`,
  }),
});

const entryFields = z.object({
  problem: requiredText('Problem'),
  solution: requiredText('Solution'),
  area: requiredText('Area', 255),
  timeSavedPerYear: z
    .number()
    .int('Time saved must be a whole number of hours')
    .min(0, 'Time saved cannot be negative')
    .safe('Time saved is too large')
    .nullable()
    .optional(),
  grossProfitPerYear: z
    .number()
    .int('Gross profit must be a whole number')
    .safe('Gross profit is out of range')
    .nullable()
    .optional(),
  effort: effortSchema,
  monetaryExplanation: requiredText('Monetary explanation'),
  link: z.string().url('Link must be a valid URL').nullable().optional(),
  anonymous: z.boolean().optional(),
  manualOverridePrio: z
    .number()
    .int('Manual override priority must be a whole number')
    .safe('Manual override priority is out of range')
    .optional(),
});

export const entryValidationSchemas = {
  /**
   * GET /api/teams/:teamId/entries - Optional area filter
   */
  listEntries: {
    params: teamParamsSchema,
    query: z.object({
      area: z.string().min(1).optional(),
    }),
  },

  /**
   * GET /api/teams/:teamId/entries/deleted and /export
   */
  teamScoped: {
    params: teamParamsSchema,
  },

  /**
   * POST /api/teams/:teamId/entries
   */
  createEntry: {
    params: teamParamsSchema,
    body: entryFields,
  },

  /**
   * GET, DELETE /api/teams/:teamId/entries/:id and restore/force variants
   */
  entryScoped: {
    params: entryParamsSchema,
  },

  /**
   * PATCH /api/teams/:teamId/entries/:id - Absent keys keep their value
   */
  updateEntry: {
    params: entryParamsSchema,
    body: entryFields.partial(),
  },
};
