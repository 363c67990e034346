import downloadsRoutes from '@root/routes/v1/downloads/downloads.js'
import type { PriorityUpdateResult } from '@root/types/download-sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { DownloadSyncService } from '@services/download-sync.service.js'
import type { FastifyInstance } from 'fastify'
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from 'vitest'
import { buildRoutes } from '../../helpers/app.js'
import { expectValidationError } from '../../helpers/assertions.js'
import {
  cleanupTestDatabase,
  initializeTestDatabase,
  makeNewDownload,
  resetDatabase,
  seedDownloads,
} from '../../helpers/database.js'
import { makeRecord } from '../../helpers/fixtures.js'

describe('Downloads routes', () => {
  let db: DatabaseService
  let app: FastifyInstance
  const updatePriority = vi.fn<(id: number, priority: string) => Promise<PriorityUpdateResult>>()

  beforeAll(async () => {
    db = await initializeTestDatabase()
  })

  beforeEach(async () => {
    await resetDatabase()
    updatePriority.mockReset()
    app = await buildRoutes(downloadsRoutes, '/v1/downloads', (instance) => {
      instance.decorate('db', db)
      instance.decorate(
        'downloadSync',
        { updatePriority } as unknown as DownloadSyncService,
      )
    })
  })

  afterEach(async () => {
    await app.close()
  })

  afterAll(async () => {
    await cleanupTestDatabase()
  })

  describe('GET /v1/downloads', () => {
    it('should list every download', async () => {
      await seedDownloads([
        makeNewDownload({ externalId: 'SABnzbd_nzo_a', status: 'downloading' }),
        makeNewDownload({ externalId: 'SABnzbd_nzo_b', queuePosition: 2 }),
      ])

      const response = await app.inject({ method: 'GET', url: '/v1/downloads' })

      expect(response.statusCode).toBe(200)
      const body = response.json<Array<{ externalId: string; posterAttempted: boolean }>>()
      expect(body.map((d) => d.externalId)).toEqual(['SABnzbd_nzo_a', 'SABnzbd_nzo_b'])
      expect(body[0]?.posterAttempted).toBe(false)
    })

    it('should filter by the status query', async () => {
      await seedDownloads([
        makeNewDownload({ externalId: 'SABnzbd_nzo_a', status: 'downloading' }),
        makeNewDownload({ externalId: 'SABnzbd_nzo_b', queuePosition: 2 }),
      ])

      const response = await app.inject({
        method: 'GET',
        url: '/v1/downloads?status=queued',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<Array<{ externalId: string }>>().map((d) => d.externalId)).toEqual([
        'SABnzbd_nzo_b',
      ])
    })

    it('should return an empty list for an empty store', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/downloads' })

      expect(response.statusCode).toBe(200)
      expect(response.json()).toEqual([])
    })
  })

  describe('GET /v1/downloads/:status', () => {
    it('should list downloads with the status', async () => {
      await seedDownloads([
        makeNewDownload({
          externalId: 'SABnzbd_nzo_done',
          status: 'completed',
          queuePosition: null,
          completedAt: '2026-01-01T10:00:00.000Z',
        }),
        makeNewDownload({ externalId: 'SABnzbd_nzo_waiting' }),
      ])

      const response = await app.inject({
        method: 'GET',
        url: '/v1/downloads/completed',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json()).toEqual([
        expect.objectContaining({
          externalId: 'SABnzbd_nzo_done',
          status: 'completed',
          completedAt: '2026-01-01T10:00:00.000Z',
        }),
      ])
    })

    it('should reject an unknown status', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/downloads/paused',
      })

      expectValidationError(response, 'status')
    })
  })

  describe('POST /v1/downloads/:id/priority', () => {
    it('should return the updated download', async () => {
      updatePriority.mockResolvedValue({
        success: true,
        download: makeRecord({ id: 7, priority: 'Force' }),
      })

      const response = await app.inject({
        method: 'POST',
        url: '/v1/downloads/7/priority',
        payload: { priority: 'force' },
      })

      expect(response.statusCode).toBe(200)
      expect(updatePriority).toHaveBeenCalledWith(7, 'force')
      expect(response.json()).toMatchObject({
        success: true,
        download: { id: 7, priority: 'Force' },
      })
    })

    it.each([
      ['invalid_priority', 400],
      ['not_found', 404],
      ['invalid_state', 409],
      ['controller_error', 502],
    ] as const)('should map %s to %i', async (reason, statusCode) => {
      updatePriority.mockResolvedValue({
        success: false,
        reason,
        message: `rejected: ${reason}`,
      })

      const response = await app.inject({
        method: 'POST',
        url: '/v1/downloads/7/priority',
        payload: { priority: 'High' },
      })

      expect(response.statusCode).toBe(statusCode)
      expect(response.json()).toMatchObject({
        statusCode,
        message: `rejected: ${reason}`,
      })
    })

    it('should validate the id before calling the service', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/downloads/abc/priority',
        payload: { priority: 'High' },
      })

      expect(response.statusCode).toBe(400)
      expect(updatePriority).not.toHaveBeenCalled()
    })

    it('should require a priority in the body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/downloads/7/priority',
        payload: {},
      })

      expectValidationError(response, 'priority')
      expect(updatePriority).not.toHaveBeenCalled()
    })
  })
})
