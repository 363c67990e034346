import type { ErrorResponse } from '@schemas/common/error.schema.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.statusCode ?? 500
    // Avoid logging the query string, it may carry API keys
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)

    // Only unexpected errors are masked; 502/503 raised on purpose keep their message
    const isUnexpected = statusCode === 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isUnexpected
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : statusCode >= 500
            ? 'Server Error'
            : 'Client Error',
      message: isUnexpected
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
