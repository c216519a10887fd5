/**
 * Mock Logger for testing
 *
 * Provides a no-op service logger that tracks calls for assertions.
 */

import { vi, type Mock } from 'vitest';
import type { ServiceLogger } from '@unitfleet/core';

type LogFn = ServiceLogger['info'];
type StartOperationFn = ServiceLogger['startOperation'];

export interface MockLoggerCalls {
  debug: string[];
  info: string[];
  success: string[];
  warn: string[];
  error: string[];
}

export interface MockServiceLogger {
  debug: Mock<LogFn>;
  info: Mock<LogFn>;
  success: Mock<LogFn>;
  warn: Mock<LogFn>;
  error: Mock<LogFn>;
  startOperation: Mock<StartOperationFn>;
  /** Logged messages by level, in order */
  getCalls: () => MockLoggerCalls;
  clearCalls: () => void;
}

/**
 * Create a mock service logger with startOperation support
 */
export function createMockServiceLogger(): MockServiceLogger {
  let calls: MockLoggerCalls = { debug: [], info: [], success: [], warn: [], error: [] };

  const record = (level: keyof MockLoggerCalls) =>
    vi.fn<LogFn>((message) => {
      calls[level].push(message);
    });

  return {
    debug: record('debug'),
    info: record('info'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
    startOperation: vi.fn<StartOperationFn>(() => ({
      success: vi.fn(),
      failure: vi.fn(),
    })),
    getCalls: () => ({
      debug: [...calls.debug],
      info: [...calls.info],
      success: [...calls.success],
      warn: [...calls.warn],
      error: [...calls.error],
    }),
    clearCalls: () => {
      calls = { debug: [], info: [], success: [], warn: [], error: [] };
    },
  };
}
