/**
 * Test Setup
 *
 * Global test configuration that runs before each test file.
 *
 * We do NOT mock the logger globally. LOG_LEVEL=silent suppresses output
 * (set TEST_LOG_LEVEL=debug to see logs) and tests use real loggers.
 */

import { vi, afterEach } from 'vitest';

// ============================================================================
// Environment Configuration
// ============================================================================

// Tests often create multiple module instances with process listeners
process.setMaxListeners(0);

// Set test environment variables BEFORE any imports
process.env.NODE_ENV = 'test';
process.env.SECRET_KEY = 'test-secret';
process.env.DATABASE_PATH = ':memory:';
process.env.PORT = '3001';
process.env.APP_URL = 'http://localhost:3001';

// Route tests fire many requests from one IP
process.env.TEST_RATE_LIMIT_AUTH = '10000';
process.env.TEST_RATE_LIMIT_TEAM_OPS = '10000';
process.env.TEST_RATE_LIMIT_ENTRY_WRITES = '10000';

// Suppress logger output by default (set TEST_LOG_LEVEL=debug to see logs)
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';

// ============================================================================
// Test Lifecycle Hooks
// ============================================================================

afterEach(() => {
  // Clean up any lingering timers
  vi.useRealTimers();
});
