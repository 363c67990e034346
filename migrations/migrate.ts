import knex from 'knex'
import config from './knexfile.js'

/**
 * Runs the latest database migrations using the development configuration.
 *
 * The connection is closed whether or not the migrations succeed.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    const [batch, applied] = await db.migrate.latest()
    console.log(
      applied.length > 0
        ? `Batch ${batch}: applied ${applied.length} migration(s)`
        : 'Database schema is up to date',
    )
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await migrate()
