import { vi, type Mock } from 'vitest'
import type { ILogger } from '@partprice/logger'

export interface MockLogger extends ILogger {
  debug: Mock<ILogger['debug']>
  info: Mock<ILogger['info']>
  warn: Mock<ILogger['warn']>
  error: Mock<ILogger['error']>
  fatal: Mock<ILogger['fatal']>
}

/** Logger whose child() returns itself, so every entry lands on one set of spies. */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn<ILogger['debug']>(),
    info: vi.fn<ILogger['info']>(),
    warn: vi.fn<ILogger['warn']>(),
    error: vi.fn<ILogger['error']>(),
    fatal: vi.fn<ILogger['fatal']>(),
    child: () => logger,
  }
  return logger
}
