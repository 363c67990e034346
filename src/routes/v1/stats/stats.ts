import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { DownloadStatsSchema } from '@schemas/stats/stats.schema.js'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Download statistics',
        operationId: 'getDownloadStats',
        description:
          'Record counts per status and the combined speed of active downloads',
        response: {
          200: DownloadStatsSchema,
          500: ErrorSchema,
        },
        tags: ['Stats'],
      },
    },
    async () => {
      return fastify.db.getDownloadStats()
    },
  )
}

export default plugin
