import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig, redactUrl, validLogLevels } from '@utils/logger.js'

/**
 * Starts the server: builds the app, applies the configured log level,
 * installs graceful shutdown and listens on the configured port.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }

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
      host: '0.0.0.0',
    })
    app.log.info(
      {
        sabnzbd: redactUrl(app.config.sabnzbdUrl),
        libraries: app.arrManager.getInstances().map((i) => i.name),
        syncIntervalSeconds: app.config.syncIntervalSeconds,
        retentionHours: app.config.retentionHours,
      },
      'Queuearr is mirroring SABnzbd',
    )
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

await init()
