import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { ArrManagerService } from '@services/arr-manager.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    arrManager: ArrManagerService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const {
      radarrInstances,
      sonarrInstances,
      libraryCacheTtlSeconds,
      requestTimeoutMs,
    } = fastify.config

    let manager: ArrManagerService
    try {
      manager = new ArrManagerService(fastify.log, {
        radarrInstances,
        sonarrInstances,
        cacheTtlSeconds: libraryCacheTtlSeconds,
        requestTimeoutMs,
      })
    } catch (error) {
      fastify.log.error({ error }, 'Failed to initialize library instances')
      throw error // Re-throw to prevent server start with broken state
    }

    fastify.decorate('arrManager', manager)
  },
  {
    name: 'arr-manager',
    dependencies: ['config'],
  },
)
