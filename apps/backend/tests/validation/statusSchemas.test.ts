import { describe, it, expect } from 'vitest';
import { statusValidationSchemas as schemas } from '../../src/validation/statusSchemas.ts';

describe('statusSchemas', () => {
  describe('getStatus', () => {
    it('should accept an empty query', () => {
      expect(schemas.getStatus.query.safeParse({}).success).toBe(true);
    });

    it('should reject unexpected query parameters', () => {
      const result = schemas.getStatus.query.safeParse({ verbose: 'true' });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].code).toBe('unrecognized_keys');
    });
  });
});
