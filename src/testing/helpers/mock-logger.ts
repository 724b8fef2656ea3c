import { vi } from 'vitest';
import type { Logger } from '@/observability/logger.js';

/** Create a silent mock Logger. */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}
