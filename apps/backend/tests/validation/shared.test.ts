import { describe, it, expect } from 'vitest';
import {
  emptyStrictSchema,
  entryParamsSchema,
  requiredId,
  requiredText,
  teamParamsSchema,
} from '../../src/validation/shared.ts';

describe('shared validation', () => {
  describe('requiredId', () => {
    it('should reject empty strings with the field name', () => {
      const result = requiredId('Team ID').safeParse('');

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe('Team ID is required');
    });
  });

  describe('requiredText', () => {
    it('should trim input', () => {
      expect(requiredText('Name').parse('  Ops  ')).toBe('Ops');
    });

    it('should reject whitespace-only input', () => {
      const result = requiredText('Name').safeParse('   ');

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe('Name is required');
    });

    it('should enforce the maximum length when given', () => {
      const schema = requiredText('Team code', 5);

      expect(schema.safeParse('ABCDE').success).toBe(true);
      const result = schema.safeParse('ABCDEF');
      expect(result.error?.issues[0].message).toBe(
        'Team code must not exceed 5 characters',
      );
    });
  });

  describe('emptyStrictSchema', () => {
    it('should accept only an empty object', () => {
      expect(emptyStrictSchema.safeParse({}).success).toBe(true);
      expect(emptyStrictSchema.safeParse({ x: '1' }).success).toBe(false);
    });
  });

  describe('route parameter schemas', () => {
    it('should require the team id', () => {
      expect(teamParamsSchema.safeParse({ teamId: 'team-1' }).success).toBe(true);
      expect(teamParamsSchema.safeParse({}).success).toBe(false);
    });

    it('should require both ids for entries', () => {
      expect(
        entryParamsSchema.safeParse({ teamId: 'team-1', id: 'entry-1' }).success,
      ).toBe(true);
      expect(entryParamsSchema.safeParse({ teamId: 'team-1' }).success).toBe(false);
    });
  });
});
