import { describe, it, expect } from 'vitest';
import { entryValidationSchemas as schemas } from '../../src/validation/entrySchemas.ts';

const validEntry = {
  problem: 'Manual invoice matching',
  solution: 'Match invoices automatically',
  area: 'Finance',
  timeSavedPerYear: 300,
  grossProfitPerYear: 6000,
  effort: 'low',
  monetaryExplanation: 'Clerk time',
};

describe('entrySchemas', () => {
  describe('createEntry', () => {
    it('should accept a complete entry', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        link: 'https://example.com/idea',
        anonymous: true,
        manualOverridePrio: -2,
      });

      expect(result.success).toBe(true);
    });

    it('should accept missing or null figures', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        timeSavedPerYear: null,
        grossProfitPerYear: undefined,
        link: null,
      });

      expect(result.success).toBe(true);
    });

    it('should reject an unknown effort', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        effort: 'extreme',
      });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe(
        'Effort must be one of low, medium, high',
      );
    });

    it('should require the text fields', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        problem: '',
      });

      expect(result.error?.issues[0].message).toBe('Problem is required');
    });

    it('should reject negative or fractional time saved', () => {
      expect(
        schemas.createEntry.body.safeParse({ ...validEntry, timeSavedPerYear: -1 })
          .success,
      ).toBe(false);
      expect(
        schemas.createEntry.body.safeParse({ ...validEntry, timeSavedPerYear: 1.5 })
          .success,
      ).toBe(false);
    });

    it('should reject figures beyond the safe integer range', () => {
      const tooLarge = schemas.createEntry.body.safeParse({
        ...validEntry,
        grossProfitPerYear: 9007199254740993,
      });
      expect(tooLarge.success).toBe(false);
      expect(tooLarge.error?.issues).toEqual([
        expect.objectContaining({
          path: ['grossProfitPerYear'],
          message: 'Gross profit is out of range',
        }),
      ]);

      const huge = schemas.createEntry.body.safeParse({
        ...validEntry,
        timeSavedPerYear: 1e21,
      });
      expect(huge.error?.issues[0].message).toBe('Time saved is too large');

      const override = schemas.updateEntry.body.safeParse({
        manualOverridePrio: -9007199254740993,
      });
      expect(override.error?.issues[0].message).toBe(
        'Manual override priority is out of range',
      );
    });

    it('should accept the largest safe integer', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        grossProfitPerYear: Number.MAX_SAFE_INTEGER,
      });

      expect(result.success).toBe(true);
    });

    it('should reject links that are not URLs', () => {
      const result = schemas.createEntry.body.safeParse({
        ...validEntry,
        link: 'not a url',
      });

      expect(result.error?.issues[0].message).toBe('Link must be a valid URL');
    });
  });

  describe('updateEntry', () => {
    it('should accept partial payloads', () => {
      expect(schemas.updateEntry.body.safeParse({ effort: 'high' }).success).toBe(true);
      expect(schemas.updateEntry.body.safeParse({}).success).toBe(true);
    });

    it('should still validate the fields it gets', () => {
      expect(schemas.updateEntry.body.safeParse({ effort: 'huge' }).success).toBe(false);
    });

    it('should require both route ids', () => {
      expect(
        schemas.updateEntry.params.safeParse({ teamId: 'team-1', id: 'entry-1' })
          .success,
      ).toBe(true);
      expect(schemas.updateEntry.params.safeParse({ teamId: 'team-1' }).success).toBe(
        false,
      );
    });
  });

  describe('listEntries', () => {
    it('should take an optional area filter', () => {
      expect(schemas.listEntries.query.safeParse({}).success).toBe(true);
      expect(schemas.listEntries.query.safeParse({ area: 'Finance' }).success).toBe(true);
      expect(schemas.listEntries.query.safeParse({ area: '' }).success).toBe(false);
    });
  });
});
