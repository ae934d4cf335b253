/**
 * Mock pino logger for tests.
 */

import type { Logger } from 'pino';
import { vi } from 'vitest';

export interface MockLogger {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  child: ReturnType<typeof vi.fn>;
}

/** Create a mock logger; `child()` returns the same mock. */
export function createMockLogger(): { mock: MockLogger; logger: Logger } {
  const mock: MockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  const logger = mock as unknown as Logger;
  mock.child.mockReturnValue(logger);
  return { mock, logger };
}
