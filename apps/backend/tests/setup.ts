/**
 * Test Setup
 *
 * Global test configuration that runs before each test file.
 * Configures environment and provides test utilities.
 *
 * The logger is not mocked globally. Instead:
 * 1. LOG_LEVEL=silent suppresses output (configurable via TEST_LOG_LEVEL)
 * 2. Tests that assert on log output pass createTestLogger() from fixtures
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Environment Configuration
// ============================================================================

// Set test environment variables BEFORE the config module is first loaded
process.env.NODE_ENV = 'test';
process.env.STORAGE_DRIVER = 'memory';
process.env.STORAGE_BASE = '/tmp/worklane-test-storage';

// Keep PBKDF2 cheap in tests
process.env.PASSWORD_HASH_ITERATIONS = '1000';

// Suppress logger output by default (set TEST_LOG_LEVEL=debug to see logs)
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';

// ============================================================================
// Test Lifecycle Hooks
// ============================================================================

afterEach(() => {
  // Clean up any lingering fake timers
  vi.useRealTimers();
});
