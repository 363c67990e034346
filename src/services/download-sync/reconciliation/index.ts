/**
 * Reconciliation Module Index
 *
 * Exports the snapshot-to-plan functions used by the download sync
 */

export * from './plan-builder.js'
export * from './status-mapper.js'
