import type { Knex } from 'knex'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import fs from 'node:fs'
import dotenv from 'dotenv'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..')

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbDirectory(filename: string): string {
  const dbDirectory = dirname(filename)
  try {
    if (!fs.existsSync(dbDirectory)) {
      fs.mkdirSync(dbDirectory, { recursive: true })
    }
  } catch (err) {
    console.error('Failed to create database directory:', err)
    process.exit(1)
  }
  return filename
}

const getSqliteConnection = () => ({
  filename: ensureDbDirectory(
    resolve(projectRoot, process.env.dbPath || 'data/db/queuearr.db'),
  ),
})

export const migrationsDirectory = resolve(__dirname, 'migrations')

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'better-sqlite3',
    connection: getSqliteConnection(),
    useNullAsDefault: true,
    migrations: {
      directory: migrationsDirectory,
      loadExtensions: ['.ts', '.js'],
    },
  },
}

export default config
