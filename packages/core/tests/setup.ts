/**
 * @fileoverview Vitest Test Setup
 *
 * @license Apache-2.0
 */

import { afterEach, vi } from 'vitest';

// Spies on console (the default logger) must not leak between tests
afterEach(() => {
  vi.restoreAllMocks();
});
