import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports whether the catalog client holds usable credentials. Always answers 200 while the server runs.',
        response: {
          200: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async () => {
      const needed = fastify.credentials.credentialsNeeded

      const response: HealthCheckResponse = {
        status: needed ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        checks: { credentials: needed ? 'needed' : 'ok' },
      }
      return response
    },
  )
}

export default plugin
