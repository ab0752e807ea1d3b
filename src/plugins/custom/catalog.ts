/**
 * Catalog Plugin
 *
 * Builds the catalog client from config and closes it with the server
 */

import { CatalogClient } from '@services/catalog-client.service.js'
import { CredentialStore } from '@services/catalog/credential-store.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    catalog: CatalogClient
    credentials: CredentialStore
  }
}

/**
 * Decorates the instance with `catalog` and `credentials`, logs catalog
 * notifications and drains in-flight catalog requests on close.
 */
async function catalogPlugin(fastify: FastifyInstance) {
  const credentials = new CredentialStore(
    fastify.config.catalogUsername,
    fastify.config.catalogPassword,
  )

  const catalog = new CatalogClient(fastify.log, credentials, {
    baseUrl: fastify.config.catalogBaseUrl,
    timeoutMs: fastify.config.requestTimeoutMs,
    userAgent: fastify.config.userAgent,
  })

  catalog.events.on('list-updated', ({ kind, count }) => {
    fastify.log.debug(`${kind} list updated (${count} items)`)
  })
  catalog.events.on('credentials-needed', ({ reason, status }) => {
    fastify.log.warn(
      { reason, status },
      'Catalog credentials needed; send them to PUT /v1/credentials',
    )
  })

  fastify.decorate('credentials', credentials)
  fastify.decorate('catalog', catalog)

  fastify.addHook('onClose', async () => {
    await catalog.close()
  })
}

export default fp(catalogPlugin, {
  name: 'catalog',
  dependencies: ['config'],
})
