import { vi } from 'vitest';
import type { AppLogger } from '@deskflow/core/logger';

export function createMockLogger(): AppLogger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    http: vi.fn(),
    verbose: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    system: vi.fn(),
  };
}
