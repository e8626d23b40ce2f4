import { vi } from 'vitest';

// Silences pino in tests; every module logger is the same spy object.
vi.mock('@ledge/logger', () => {
  const silent = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
    child: vi.fn((): unknown => silent),
  };

  return {
    makeLogger: vi.fn(() => silent),
    getLogFilePath: vi.fn(() => null),
    closeLogger: vi.fn(),
  };
});
