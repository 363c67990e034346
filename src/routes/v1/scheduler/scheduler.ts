import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import { JobStatusListSchema } from '@schemas/scheduler/scheduler.schema.js'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/jobs',
    {
      schema: {
        summary: 'List scheduled jobs',
        operationId: 'getScheduledJobs',
        description: 'Registered jobs with their last and next run',
        response: {
          200: JobStatusListSchema,
        },
        tags: ['Scheduler'],
      },
    },
    async () => {
      return fastify.scheduler.getJobStatuses()
    },
  )
}

export default plugin
