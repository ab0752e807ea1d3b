import sensible from '@fastify/sensible'
import fp from 'fastify-plugin'

/**
 * HTTP error helpers such as `reply.notFound()` and `reply.badGateway()`
 */
export default fp(
  async (fastify) => {
    await fastify.register(sensible)
  },
  {
    name: 'sensible',
  },
)
