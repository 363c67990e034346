import fp from 'fastify-plugin'
import sensible from '@fastify/sensible'
import type { FastifyInstance } from 'fastify'

/**
 * Adds `reply.notFound()`, `reply.badRequest()`, `reply.conflict()`,
 * `reply.badGateway()` and the matching `fastify.httpErrors`.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(sensible)
  },
  {
    name: 'sensible',
  },
)
