import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { DownloadSyncService } from '@services/download-sync.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    downloadSync: DownloadSyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const {
      missingCycleThreshold,
      retentionHours,
      maxConcurrentLookups,
      matchThreshold,
    } = fastify.config

    const service = new DownloadSyncService({
      db: fastify.db,
      sabnzbd: fastify.sabnzbd,
      arrManager: fastify.arrManager,
      logger: fastify.log,
      config: {
        missingCycleThreshold,
        retentionHours,
        maxConcurrentLookups,
        matchThreshold,
      },
    })
    fastify.decorate('downloadSync', service)

    fastify.addHook('onClose', async () => {
      fastify.log.info('Stopping media matcher...')
      await service.stop()
    })
  },
  {
    name: 'download-sync',
    dependencies: ['database', 'sabnzbd', 'arr-manager'],
  },
)
