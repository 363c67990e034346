import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import {
  CleanupResponseSchema,
  ResetPosterFlagsResponseSchema,
  SyncResponseSchema,
} from '@schemas/admin/admin.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/reset-poster-flags',
    {
      schema: {
        summary: 'Re-run media matching',
        operationId: 'resetPosterFlags',
        description:
          'Clears the match flag on every download and starts a new matching pass',
        response: {
          200: ResetPosterFlagsResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Admin'],
      },
    },
    async () => {
      const count = await fastify.downloadSync.resetPosterFlags()
      return {
        success: true,
        count,
        message: `Reset ${count} download(s) for media matching`,
      }
    },
  )

  fastify.post(
    '/sync',
    {
      schema: {
        summary: 'Run a sync cycle now',
        operationId: 'runDownloadSync',
        response: {
          200: SyncResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Admin'],
      },
    },
    async () => {
      return fastify.downloadSync.syncDownloads()
    },
  )

  fastify.post(
    '/cleanup',
    {
      schema: {
        summary: 'Run the retention sweep now',
        operationId: 'runDownloadCleanup',
        response: {
          200: CleanupResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Admin'],
      },
    },
    async () => {
      return fastify.downloadSync.runCleanup()
    },
  )
}

export default plugin
