import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  DownloadIdParamsSchema,
  DownloadListQuerySchema,
  DownloadListSchema,
  DownloadStatusParamsSchema,
  PriorityUpdateBodySchema,
  PriorityUpdateResponseSchema,
} from '@schemas/downloads/downloads.schema.js'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'List downloads',
        operationId: 'getDownloads',
        description: 'All tracked downloads, optionally filtered by status',
        querystring: DownloadListQuerySchema,
        response: {
          200: DownloadListSchema,
          500: ErrorSchema,
        },
        tags: ['Downloads'],
      },
    },
    async (request) => {
      const { status } = request.query
      return status
        ? fastify.db.getDownloadsByStatus(status)
        : fastify.db.getAllDownloads()
    },
  )

  fastify.get(
    '/:status',
    {
      schema: {
        summary: 'List downloads by status',
        operationId: 'getDownloadsByStatus',
        params: DownloadStatusParamsSchema,
        response: {
          200: DownloadListSchema,
          400: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Downloads'],
      },
    },
    async (request) => {
      return fastify.db.getDownloadsByStatus(request.params.status)
    },
  )

  fastify.post(
    '/:id/priority',
    {
      schema: {
        summary: 'Change download priority',
        operationId: 'updateDownloadPriority',
        description:
          'Pushes a new priority to SABnzbd for a queued download and stores it once accepted',
        params: DownloadIdParamsSchema,
        body: PriorityUpdateBodySchema,
        response: {
          200: PriorityUpdateResponseSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Downloads'],
      },
    },
    async (request, reply) => {
      const result = await fastify.downloadSync.updatePriority(
        request.params.id,
        request.body.priority,
      )

      if (result.success) {
        return result
      }

      switch (result.reason) {
        case 'invalid_priority':
          return reply.badRequest(result.message)
        case 'not_found':
          return reply.notFound(result.message)
        case 'invalid_state':
          return reply.conflict(result.message)
        case 'controller_error':
          return reply.badGateway(result.message)
      }
    },
  )
}

export default plugin
