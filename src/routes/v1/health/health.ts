import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import { HealthCheckResponseSchema } from '@schemas/health/health.schema.js'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports store and SABnzbd reachability. A SABnzbd outage degrades the service; a store outage makes it unhealthy.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      let database: 'ok' | 'failed' = 'ok'

      try {
        await fastify.db.ping()
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: database connectivity error',
        )
        database = 'failed'
      }

      const sabnzbdResult = await fastify.sabnzbd.testConnection()
      const sabnzbd = sabnzbdResult.healthy ? 'ok' : 'failed'

      const status =
        database === 'failed'
          ? 'unhealthy'
          : sabnzbd === 'failed'
            ? 'degraded'
            : 'healthy'

      return reply.status(status === 'unhealthy' ? 503 : 200).send({
        status,
        timestamp,
        checks: { database, sabnzbd },
        ...(sabnzbdResult.error ? { error: sabnzbdResult.error } : {}),
      })
    },
  )
}

export default plugin
