import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { EngineClosedError } from '@services/catalog/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

function statusFor(err: FastifyError): number {
  // The client only refuses work while the server is shutting down
  if (err instanceof EngineClosedError) return 503
  return err.statusCode ?? 500
}

/**
 * Maps thrown errors to the shared error payload. Server errors are
 * logged in full and answered with a generic message.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = statusFor(err)
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
    if (statusCode === 503) {
      const payload: ErrorResponse = {
        statusCode,
        code: 'SHUTTING_DOWN',
        error: 'Service Unavailable',
        message: 'Catalog client is shutting down',
      }
      return payload
    }

    const isServerError = statusCode >= 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : 'Client Error',
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
