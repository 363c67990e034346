import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { DatabaseService } from '@services/database.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    db: DatabaseService
  }
}

const migrationsDirectory = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '../../../migrations/migrations',
)

export default fp(
  async (fastify: FastifyInstance) => {
    const { dbPath } = fastify.config
    fs.mkdirSync(dirname(resolve(dbPath)), { recursive: true })

    const dbService = await DatabaseService.create(fastify.log, dbPath)
    fastify.addHook('onClose', async () => {
      fastify.log.info('Closing database service...')
      await dbService.close()
    })

    const [batch, applied] = await dbService.knex.migrate.latest({
      directory: migrationsDirectory,
    })
    if (applied.length > 0) {
      fastify.log.info({ batch, applied }, 'Applied database migrations')
    }

    fastify.decorate('db', dbService)
  },
  {
    name: 'database',
    dependencies: ['config'],
  },
)
