import statsRoutes from '@root/routes/v1/stats/stats.js'
import type { DatabaseService } from '@services/database.service.js'
import type { FastifyInstance } from 'fastify'
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { buildRoutes } from '../../helpers/app.js'
import {
  cleanupTestDatabase,
  initializeTestDatabase,
  makeNewDownload,
  resetDatabase,
  seedDownloads,
} from '../../helpers/database.js'

describe('GET /v1/stats', () => {
  let db: DatabaseService
  let app: FastifyInstance

  beforeAll(async () => {
    db = await initializeTestDatabase()
  })

  beforeEach(async () => {
    await resetDatabase()
    app = await buildRoutes(statsRoutes, '/v1/stats', (instance) => {
      instance.decorate('db', db)
    })
  })

  afterEach(async () => {
    await app.close()
  })

  afterAll(async () => {
    await cleanupTestDatabase()
  })

  it('should report zeros for an empty store', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/stats' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({
      queued: 0,
      downloading: 0,
      completed: 0,
      failed: 0,
      total: 0,
      totalSpeed: 0,
    })
  })

  it('should count downloads per status', async () => {
    await seedDownloads([
      makeNewDownload({ externalId: 'a', status: 'downloading', speed: 8.5 }),
      makeNewDownload({ externalId: 'b', queuePosition: 2 }),
      makeNewDownload({
        externalId: 'c',
        status: 'completed',
        queuePosition: null,
        completedAt: '2026-01-01T10:00:00.000Z',
      }),
    ])

    const response = await app.inject({ method: 'GET', url: '/v1/stats' })

    expect(response.json()).toEqual({
      queued: 1,
      downloading: 1,
      completed: 1,
      failed: 0,
      total: 3,
      totalSpeed: 8.5,
    })
  })
})
