import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

const createRateLimitConfig = (fastify: FastifyInstance) => {
  return {
    max: fastify.config.rateLimitMax,
    timeWindow: '1 minute',
    // Health checks poll /health far more often than people call the API
    allowList: (req: FastifyRequest) => req.url.split('?')[0] === '/health',
  }
}

/**
 * Per-client request limit for the local API
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
