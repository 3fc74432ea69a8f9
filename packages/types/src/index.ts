/**
 * @brainswarming/types
 *
 * Shared TypeScript types for the brainswarming monorepo.
 *
 * @example
 * ```typescript
 * import type { Entry, Team, User } from '@brainswarming/types';
 * import { isEffort } from '@brainswarming/types';
 * ```
 */

// Domain types
export * from './domain/index.ts';

// API types
export * from './api/index.ts';

// Type guards
export * from './guards/index.ts';
