import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const ROUTE_PREFIXES = ['/v1/anime', '/v1/manga', '/v1/credentials', '/health']

/**
 * Answers unmatched routes with the shared error payload. Unknown paths are
 * throttled harder than real routes.
 */
async function notFoundHandler(fastify: FastifyInstance) {
  fastify.setNotFoundHandler(
    {
      preHandler: fastify.rateLimit({
        max: 3,
        timeWindow: 500,
      }),
    },
    (request, reply) => {
      const path = request.url.split('?')[0]
      request.log.warn(
        { request: { id: request.id, method: request.method, path } },
        'No catalog route matched',
      )
      reply.code(404)
      const response: ErrorResponse = {
        statusCode: 404,
        code: 'NOT_FOUND',
        error: 'Not Found',
        message: `No route for ${request.method} ${path}; available under ${ROUTE_PREFIXES.join(', ')}`,
      }
      return response
    },
  )
}

export default fp(notFoundHandler, {
  name: 'not-found',
  dependencies: ['@fastify/rate-limit'],
})
