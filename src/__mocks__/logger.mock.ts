import { vi } from 'vitest';
import type { LogContext } from '../observability/index.js';

export function createMockLogger() {
  return {
    error: vi.fn((_message: string, _context?: LogContext): void => undefined),
    warn: vi.fn((_message: string, _context?: LogContext): void => undefined),
    info: vi.fn((_message: string, _context?: LogContext): void => undefined),
    debug: vi.fn((_message: string, _context?: LogContext): void => undefined),
    trace: vi.fn((_message: string, _context?: LogContext): void => undefined),
  };
}

export type MockLogger = ReturnType<typeof createMockLogger>;
