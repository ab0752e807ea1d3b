import {
  type CredentialsBody,
  CredentialsBodySchema,
  CredentialsErrorSchema,
  type CredentialsStatus,
  CredentialsStatusSchema,
} from '@schemas/credentials/credentials.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  const status = (): CredentialsStatus => ({
    username: fastify.credentials.currentUsername,
    credentialsNeeded: fastify.credentials.credentialsNeeded,
  })

  fastify.get<{ Reply: CredentialsStatus }>(
    '/',
    {
      schema: {
        summary: 'Get credential status',
        operationId: 'getCredentials',
        description:
          'Returns the configured catalog username and whether the catalog needs new credentials. The password is never returned.',
        response: {
          200: CredentialsStatusSchema,
        },
        tags: ['Credentials'],
      },
    },
    async () => status(),
  )

  fastify.put<{ Body: CredentialsBody; Reply: CredentialsStatus }>(
    '/',
    {
      schema: {
        summary: 'Replace catalog credentials',
        operationId: 'updateCredentials',
        body: CredentialsBodySchema,
        response: {
          200: CredentialsStatusSchema,
          400: CredentialsErrorSchema,
        },
        tags: ['Credentials'],
      },
    },
    async (request) => {
      fastify.credentials.set(request.body.username, request.body.password)
      fastify.log.info(
        `Catalog credentials updated for ${request.body.username}`,
      )
      return status()
    },
  )
}

export default plugin
