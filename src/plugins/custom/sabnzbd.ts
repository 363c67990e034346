import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { SabnzbdService } from '@services/sabnzbd.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    sabnzbd: SabnzbdService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { sabnzbdUrl, sabnzbdApiKey, historyLimit, requestTimeoutMs } =
      fastify.config

    const service = new SabnzbdService(fastify.log, {
      url: sabnzbdUrl,
      apiKey: sabnzbdApiKey,
      historyLimit,
      requestTimeoutMs,
    })
    fastify.decorate('sabnzbd', service)
  },
  {
    name: 'sabnzbd',
    dependencies: ['config'],
  },
)
