/**
 * Database Service
 *
 * Provides the primary interface for interacting with the application's better-sqlite3 database.
 * This service is exposed to the application via the 'database' Fastify plugin
 * and can be accessed through the fastify.db decorator.
 *
 * Responsible for:
 * - Download record storage (one row per SABnzbd item, keyed by nzo_id)
 * - Applying reconciliation plans atomically
 * - Media match claims and results
 * - Retention deletes and dashboard statistics
 *
 * Query methods live in `database/methods/*` and are declared on the class
 * through `database/types/*`.
 *
 * @example
 * fastify.get('/v1/downloads', async () => {
 *   return fastify.db.getAllDownloads()
 * })
 */
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import * as downloadMethods from '@services/database/methods/downloads.js'
import '@services/database/types/download-methods.js'

export class DatabaseService {
  readonly knex: Knex

  /**
   * Creates a new DatabaseService instance
   *
   * @param log - Fastify logger instance for recording database operations
   * @param dbPath - Path to the SQLite database file
   */
  constructor(
    readonly log: FastifyBaseLogger,
    dbPath: string,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(dbPath, log))
  }

  /**
   * Opens the database and verifies it answers a query.
   * A store that cannot be reached is fatal, so the error propagates.
   */
  static async create(
    log: FastifyBaseLogger,
    dbPath: string,
  ): Promise<DatabaseService> {
    const service = new DatabaseService(log, dbPath)
    try {
      await service.ping()
    } catch (error) {
      log.fatal({ error, dbPath }, 'Database is not reachable')
      await service.close()
      throw error
    }
    return service
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * @param dbPath - Path to the SQLite database file
   * @param log - Logger to use for database operations
   * @returns Knex configuration object
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  async ping(): Promise<void> {
    await this.knex.raw('select 1')
  }

  /**
   * Closes the database connection
   *
   * Should be called during application shutdown to properly clean up resources.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }
}

Object.assign(DatabaseService.prototype, downloadMethods)
