import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    catalogBaseUrl: {
      type: 'string',
      default: 'https://myanimelist.net',
    },
    catalogUsername: {
      type: 'string',
      default: '',
    },
    catalogPassword: {
      type: 'string',
      default: '',
    },
    requestTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    userAgent: {
      type: 'string',
      default: 'catalog-list-client/0.1',
    },
  },
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const catalogUrl = fastify.config.catalogBaseUrl
    if (!/^https?:\/\//.test(catalogUrl)) {
      throw new Error(
        `catalogBaseUrl must start with http:// or https:// (got "${catalogUrl}")`,
      )
    }

    if (!fastify.config.catalogUsername) {
      fastify.log.warn(
        'No catalogUsername configured; list requests will wait for credentials',
      )
    }
  },
  {
    name: 'config',
  },
)
