/**
 * Priority Updater
 *
 * Changes the priority of a queued download: validate the label, push the
 * numeric code to SABnzbd and store the label once SABnzbd accepts it.
 * Every rejection leaves the store untouched; the next sync cycle remains
 * the source of truth.
 */

import type { FastifyBaseLogger } from 'fastify'
import type { PriorityLabel } from '@root/types/download.types.js'
import type { PriorityUpdateResult } from '@root/types/download-sync.types.js'
import { PriorityValidationError } from '@root/types/errors.js'
import type { Clock } from '@root/types/scheduler.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { SabnzbdService } from '@services/sabnzbd.service.js'
import { normalizePriorityLabel, priorityLabelToCode } from '@utils/priority.js'

export interface PriorityUpdaterDeps {
  db: DatabaseService
  sabnzbd: SabnzbdService
  logger: FastifyBaseLogger
  clock: Clock
}

export async function updatePriority(
  id: number,
  requested: string,
  deps: PriorityUpdaterDeps,
): Promise<PriorityUpdateResult> {
  const { db, sabnzbd, logger, clock } = deps

  let label: PriorityLabel
  try {
    label = normalizePriorityLabel(requested)
  } catch (error) {
    if (error instanceof PriorityValidationError) {
      return {
        success: false,
        reason: 'invalid_priority',
        message: error.message,
      }
    }
    throw error
  }

  const download = await db.getDownloadById(id)
  if (!download) {
    return {
      success: false,
      reason: 'not_found',
      message: `Download ${id} not found`,
    }
  }

  if (download.status !== 'queued') {
    return {
      success: false,
      reason: 'invalid_state',
      message: `Priority can only be changed while queued (status: ${download.status})`,
    }
  }

  try {
    await sabnzbd.setPriority(download.externalId, priorityLabelToCode(label))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(
      { id, externalId: download.externalId, priority: label, error: message },
      'SABnzbd rejected priority change',
    )
    return { success: false, reason: 'controller_error', message }
  }

  await db.updateDownloadPriority(id, label, clock.now())
  logger.info(
    { id, name: download.name, from: download.priority, to: label },
    'Download priority updated',
  )

  return { success: true, download: { ...download, priority: label } }
}
