import {
  historyItemToState,
  queueItemStatus,
  queueItemToState,
  resolveQueuePriority,
} from '@services/download-sync/reconciliation/status-mapper.js'
import { describe, expect, it } from 'vitest'
import { makeHistoryItem, makeQueueItem } from '../../../../helpers/fixtures.js'
import { createMockLogger } from '../../../../mocks/logger.js'

const NOW = new Date('2026-01-02T12:00:00.000Z')

describe('status-mapper', () => {
  describe('queueItemStatus', () => {
    it('should report the first unpaused slot as downloading', () => {
      expect(queueItemStatus(makeQueueItem())).toBe('downloading')
    })

    it('should report a paused first slot as queued', () => {
      expect(queueItemStatus(makeQueueItem({ paused: true }))).toBe('queued')
    })

    it('should report later slots as queued', () => {
      expect(queueItemStatus(makeQueueItem({ position: 3 }))).toBe('queued')
    })
  })

  describe('resolveQueuePriority', () => {
    it('should map labels and codes', () => {
      expect(resolveQueuePriority(makeQueueItem({ rawPriority: 'High' }))).toBe(
        'High',
      )
      expect(resolveQueuePriority(makeQueueItem({ rawPriority: -1 }))).toBe('Low')
    })

    it('should return null when no priority is reported', () => {
      expect(resolveQueuePriority(makeQueueItem({ rawPriority: null }))).toBeNull()
      expect(resolveQueuePriority(makeQueueItem({ rawPriority: '' }))).toBeNull()
    })

    it('should return undefined and warn for unknown values', () => {
      const log = createMockLogger()

      expect(
        resolveQueuePriority(makeQueueItem({ rawPriority: 'Paused' }), log),
      ).toBeUndefined()
      expect(log.warn).toHaveBeenCalledTimes(1)
    })
  })

  describe('queueItemToState', () => {
    it('should omit priority when the value is unknown', () => {
      const state = queueItemToState(makeQueueItem({ rawPriority: '9' }))

      expect('priority' in state).toBe(false)
    })

    it('should use null for an empty detailed status', () => {
      const state = queueItemToState(makeQueueItem({ detailedStatus: '' }))

      expect(state.detailedStatus).toBeNull()
    })
  })

  describe('historyItemToState', () => {
    it('should report post-processing entries as downloading at 100', () => {
      const state = historyItemToState(
        makeHistoryItem({
          outcome: 'processing',
          detailedStatus: 'Extracting',
          completedAt: null,
        }),
        NOW,
      )

      expect(state.status).toBe('downloading')
      expect(state.progress).toBe(100)
      expect(state.sizeLeft).toBe(0)
      expect(state.completedAt).toBeNull()
      expect(state.detailedStatus).toBe('Extracting')
    })

    it('should keep the completion time from history', () => {
      const state = historyItemToState(makeHistoryItem(), NOW)

      expect(state.status).toBe('completed')
      expect(state.progress).toBe(100)
      expect(state.completedAt).toBe('2026-01-01T10:00:00.000Z')
    })

    it('should fall back to now when history has no completion time', () => {
      const state = historyItemToState(makeHistoryItem({ completedAt: null }), NOW)

      expect(state.completedAt).toBe('2026-01-02T12:00:00.000Z')
    })

    it('should carry the failure reason of a failed entry', () => {
      const state = historyItemToState(
        makeHistoryItem({
          outcome: 'failed',
          detailedStatus: 'Failed',
          failureReason: 'Out of retention',
        }),
        NOW,
      )

      expect(state.status).toBe('failed')
      expect(state.progress).toBe(0)
      expect(state.sizeLeft).toBeNull()
      expect(state.failureReason).toBe('Out of retention')
    })

    it('should give a failed entry without a message a default reason', () => {
      const state = historyItemToState(
        makeHistoryItem({ outcome: 'failed', failureReason: null }),
        NOW,
      )

      expect(state.failureReason).toBe('Download failed')
    })
  })
})
