import fastifySwagger from '@fastify/swagger'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => ({
  openapi: {
    info: {
      title: 'Catalog List Client',
      description: 'Local API over a remote anime and manga list catalog',
      version: '0.1.0',
    },
    servers: [{ url: `http://localhost:${fastify.config.port}` }],
    tags: [
      { name: 'System', description: 'Service health' },
      { name: 'Anime', description: 'Anime list and search' },
      { name: 'Manga', description: 'Manga list and search' },
      { name: 'Credentials', description: 'Catalog account credentials' },
    ],
  },
  hideUntagged: true,
  transform: jsonSchemaTransform,
})

export default fp(
  async (fastify: FastifyInstance) => {
    // Route schemas are zod objects
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    fastify.get('/api/openapi.json', { schema: { hide: true } }, async () =>
      fastify.swagger(),
    )
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
