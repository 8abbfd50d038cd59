/**
 * Vitest global test setup
 */
import { afterEach, vi } from 'vitest';

afterEach(() => {
  // Reset mocks and timers after each test
  vi.clearAllMocks();
  vi.restoreAllMocks();
  vi.useRealTimers();
});
