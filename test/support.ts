import { vi } from 'vitest'
import type { Logger } from '../src/config'

/** Logger whose calls can be asserted and that keeps test output quiet. */
export function createTestLogger() {
  return {
    debug: vi.fn<Parameters<Logger['debug']>, void>(),
    info: vi.fn<Parameters<Logger['info']>, void>(),
    warn: vi.fn<Parameters<Logger['warn']>, void>(),
    error: vi.fn<Parameters<Logger['error']>, void>()
  }
}

/** Lets pending promise callbacks and zero-delay timers run. */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0))
}
