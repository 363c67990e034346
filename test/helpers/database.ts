import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { DatabaseService } from '@services/database.service.js'
import type { NewDownload } from '@root/types/download.types.js'
import { createMockLogger } from '../mocks/logger.js'

let anchorService: DatabaseService | null = null

export const TEST_DB_PATH = path.join(
  os.tmpdir(),
  `queuearr-test-${process.pid}.db`,
)

const migrationsDirectory = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../migrations/migrations',
)

/**
 * Initialize the test database service and run migrations
 * Uses a temp file per process so that worker forks never share a store
 */
export async function initializeTestDatabase(): Promise<DatabaseService> {
  if (anchorService) {
    return anchorService
  }

  anchorService = new DatabaseService(createMockLogger(), TEST_DB_PATH)
  await anchorService.knex.migrate.latest({ directory: migrationsDirectory })

  return anchorService
}

/**
 * Get the current test database service
 * Throws if database has not been initialized
 */
export function getTestDatabase(): DatabaseService {
  if (!anchorService) {
    throw new Error('Database connection not initialized')
  }
  return anchorService
}

/**
 * Reset database by truncating all tables except migrations
 * Call this in beforeEach hooks to ensure clean state between tests
 */
export async function resetDatabase(): Promise<void> {
  const db = getTestDatabase()

  const rows = await db
    .knex('sqlite_master')
    .select<{ name: string }[]>('name')
    .where('type', 'table')
    .whereNot('name', 'like', 'knex_%')
    .whereNot('name', 'like', 'sqlite_%')

  for (const { name } of rows) {
    await db.knex(name).del()
  }
}

/**
 * Clean up the test database connection and temp files
 */
export async function cleanupTestDatabase(): Promise<void> {
  if (anchorService) {
    await anchorService.close()
    anchorService = null
  }

  const filesToClean = [
    TEST_DB_PATH,
    `${TEST_DB_PATH}-shm`,
    `${TEST_DB_PATH}-wal`,
    `${TEST_DB_PATH}-journal`,
  ]
  for (const file of filesToClean) {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file)
    }
  }
}

/**
 * Builds a queued download with sensible defaults
 */
export function makeNewDownload(
  overrides: Partial<NewDownload> = {},
): NewDownload {
  return {
    externalId: 'SABnzbd_nzo_test1',
    name: 'Example.Movie.2021.1080p.WEB-DL.x264-GRP',
    status: 'queued',
    detailedStatus: 'Queued',
    progress: 0,
    speed: 0,
    sizeTotal: 1024,
    sizeLeft: 1024,
    timeLeft: '0:10:00',
    queuePosition: 1,
    category: 'movies',
    priority: 'Normal',
    failureReason: null,
    completedAt: null,
    consecutiveMisses: 0,
    ...overrides,
  }
}

/**
 * Inserts downloads through the reconciliation write path
 */
export async function seedDownloads(
  downloads: NewDownload[],
  now = new Date('2026-01-01T00:00:00.000Z'),
): Promise<void> {
  await getTestDatabase().applyReconciliationPlan(
    { inserts: downloads, updates: [], deletions: [] },
    now,
  )
}
