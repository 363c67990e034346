import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const

/**
 * Fastify logger whose level methods are `vi.fn()` spies.
 * `child()` hands out a fresh mock, so assertions on the parent only see
 * the parent's own calls.
 *
 * @example
 * const log = createMockLogger()
 * new ArrManagerService(log, config)
 * expect(log.warn).toHaveBeenCalledWith({ instance: 'Radarr 4K' }, expect.any(String))
 */
export function createMockLogger(): FastifyBaseLogger {
  const spies = Object.fromEntries(LEVELS.map((level) => [level, vi.fn()]))

  return {
    ...spies,
    level: 'info',
    child: vi.fn(() => createMockLogger()),
  } as unknown as FastifyBaseLogger
}
