import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { SchedulerService } from '@services/scheduler.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export const DOWNLOAD_SYNC_JOB = 'download-sync'
export const DOWNLOAD_RETENTION_JOB = 'download-retention'

export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(fastify.log)
    fastify.decorate('scheduler', scheduler)

    fastify.addHook('onReady', async () => {
      const { syncIntervalSeconds, retentionIntervalMinutes } = fastify.config

      scheduler.scheduleJob(
        DOWNLOAD_SYNC_JOB,
        { seconds: syncIntervalSeconds, runImmediately: true },
        async () => {
          const result = await fastify.downloadSync.syncDownloads()
          return result.status === 'skipped' ? 'skipped' : undefined
        },
      )

      scheduler.scheduleJob(
        DOWNLOAD_RETENTION_JOB,
        { minutes: retentionIntervalMinutes, runImmediately: true },
        async () => {
          await fastify.downloadSync.runCleanup()
        },
      )
    })

    fastify.addHook('onClose', async () => {
      scheduler.stopAll()
    })
  },
  {
    name: 'scheduler',
    dependencies: ['download-sync'],
  },
)
