/**
 * Global test setup for Vitest
 *
 * This file is automatically loaded before all tests.
 */

import { afterAll, afterEach, vi } from 'vitest';
import { resetLoggerProvider } from '../src/lib/logger.js';

afterEach(() => {
  resetLoggerProvider();
  vi.unstubAllGlobals();
});

afterAll(() => {
  vi.restoreAllMocks();
});

// Export nothing - this is just for side effects
export {};
