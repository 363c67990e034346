import type { Knex } from 'knex'

/**
 * Creates the `downloads` table: one row per SABnzbd item, keyed by its nzo_id,
 * with the media match columns on the same row.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('downloads', (table) => {
    table.increments('id').primary()
    table.string('external_id').notNullable().unique() // SABnzbd nzo_id
    table.string('name').notNullable()
    table
      .enum('status', ['queued', 'downloading', 'completed', 'failed'])
      .notNullable()
    table.string('detailed_status').nullable()
    table.float('progress').notNullable().defaultTo(0)
    table.float('speed').notNullable().defaultTo(0) // MB/s
    table.float('size_total').nullable() // MB
    table.float('size_left').nullable() // MB
    table.string('time_left').nullable()
    table.integer('queue_position').nullable()
    table.string('category').nullable()
    table.enum('priority', ['Force', 'High', 'Normal', 'Low']).nullable()
    table.text('failure_reason').nullable()
    table.string('completed_at').nullable()
    table.integer('consecutive_misses').notNullable().defaultTo(0)

    table.string('media_title').nullable()
    table.enum('media_type', ['movie', 'tv']).nullable()
    table.integer('year').nullable()
    table.integer('season').nullable()
    table.integer('episode').nullable()
    table.string('poster_url').nullable()
    table.string('source_instance').nullable()
    table.boolean('poster_attempted').notNullable().defaultTo(false)

    table.string('created_at').notNullable()
    table.string('updated_at').notNullable()

    table.index('status')
    table.index(['status', 'completed_at'])
    table.index('poster_attempted')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('downloads')
}
