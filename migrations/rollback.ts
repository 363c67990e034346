import knex from 'knex'
import config from './knexfile.js'

/**
 * Rolls back the latest batch of migrations.
 */
async function rollback() {
  const db = knex(config.development)

  try {
    const [batch, reverted] = await db.migrate.rollback()
    console.log(`Rolled back batch ${batch} (${reverted.length} migration(s))`)
  } catch (err) {
    console.error('Error rolling back migration:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await rollback()
