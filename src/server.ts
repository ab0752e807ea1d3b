import { createLoggerConfig } from '@utils/logger.js'
import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import serviceApp from './app.js'

/**
 * Starts the local API and closes the catalog client on shutdown signals
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '127.0.0.1',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void init()
