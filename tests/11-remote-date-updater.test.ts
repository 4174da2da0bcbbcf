/**
 * Segment 11: Remote Date Updater Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { type Adapter, createMockAdapter } from '../src/adapter'
import { type DateCandidateStore, createDateCandidateStore } from '../src/date-candidate-store'
import { RemoteFetchError } from '../src/errors'
import { type RemoteDateUpdater, createRemoteDateUpdater } from '../src/remote-date-updater'
import {
  type FakeCdn, createFakeCdn, createSilentLogger, deferred, hang, type Reply,
} from './helpers/fake-cdn'
import { date, dates } from './helpers/fixtures'

const LIST_URL = 'https://meta.test/1f600.json'

const DOCUMENT = JSON.stringify({
  combinations: {
    '1f601': [{ date: '20250101', isLatest: true, leftEmoji: '😀' }],
    '1f602': [{ date: '20231128' }, { date: 'garbage' }],
  },
})

describe('createRemoteDateUpdater', () => {
  let cdn: FakeCdn
  let adapter: Adapter
  let store: DateCandidateStore
  let logger: ReturnType<typeof createSilentLogger>
  let onUpdate: ReturnType<typeof vi.fn>
  let updater: RemoteDateUpdater

  beforeEach(() => {
    cdn = createFakeCdn()
    adapter = createMockAdapter()
    store = createDateCandidateStore({ baseline: dates('20231128') })
    logger = createSilentLogger()
    onUpdate = vi.fn()
    updater = createRemoteDateUpdater({
      store, adapter, url: LIST_URL, timeoutMs: 1_000, fetch: cdn.fetch, logger, onUpdate,
    })
  })

  afterEach(() => {
    updater.stop()
  })

  // ==========================================================================
  // refresh
  // ==========================================================================

  describe('refresh', () => {
    it('merges dates from a metadata document and persists the list', async () => {
      cdn.route(LIST_URL, { status: 200, body: DOCUMENT })
      expect(await updater.refresh()).toEqual({ ok: true, added: 1, total: 2 })
      expect(store.snapshot()).toEqual(['20250101', '20231128'])
      expect(await adapter.loadDates()).toBe('["20250101","20231128"]')
      expect(onUpdate).toHaveBeenCalledWith(1, 2)
    })

    it('accepts a bare JSON array', async () => {
      cdn.route(LIST_URL, { status: 200, body: '["20240206", "20231128", 7]' })
      expect(await updater.refresh()).toEqual({ ok: true, added: 1, total: 2 })
    })

    it('persists remote dates the store already had without notifying', async () => {
      cdn.route(LIST_URL, { status: 200, body: '["20231128"]' })
      expect(await updater.refresh()).toEqual({ ok: true, added: 0, total: 1 })
      expect(await adapter.loadDates()).toBe('["20231128"]')
      expect(onUpdate).not.toHaveBeenCalled()
    })

    it('does not persist again when the remote list is unchanged', async () => {
      cdn.route(LIST_URL, { status: 200, body: DOCUMENT })
      await updater.refresh()
      const save = vi.spyOn(adapter, 'saveDates')
      expect(await updater.refresh()).toEqual({ ok: true, added: 0, total: 2 })
      expect(save).not.toHaveBeenCalled()
    })

    it('persists only dates taken from the remote list', async () => {
      const withExtras = createDateCandidateStore({
        baseline: dates('20231128'),
        extraDates: dates('20990101'),
      })
      const first = createRemoteDateUpdater({
        store: withExtras, adapter, url: LIST_URL, timeoutMs: 1_000, fetch: cdn.fetch, logger,
      })
      withExtras.merge(dates('20240301'))
      cdn.route(LIST_URL, { status: 200, body: '["20250501"]' })
      await first.refresh()
      expect(await adapter.loadDates()).toBe('["20250501"]')

      const restarted = createDateCandidateStore({ baseline: dates('20231128') })
      const second = createRemoteDateUpdater({
        store: restarted, adapter, url: LIST_URL, timeoutMs: 1_000, fetch: cdn.fetch, logger,
      })
      expect(await second.restore()).toBe(1)
      expect(restarted.snapshot()).toEqual(['20250501', '20231128'])
    })

    it.each([
      ['an HTTP error', { status: 500 }, `HTTP 500 from ${LIST_URL}`],
      ['an empty list', { status: 200, body: '[]' }, `Date list from ${LIST_URL} contained no valid dates`],
      ['a document without dates', { status: 200, body: '{"combinations":{}}' },
        `Date list from ${LIST_URL} contained no valid dates`],
    ])('reports %s and keeps the snapshot', async (_label, reply, message) => {
      cdn.route(LIST_URL, reply)
      const before = store.snapshot()
      const outcome = await updater.refresh()
      expect(outcome.ok).toBe(false)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(RemoteFetchError)
        expect(outcome.error.message).toBe(message)
      }
      expect(store.snapshot()).toBe(before)
      expect(logger.warn).toHaveBeenCalledWith(`Remote date update failed: ${message}`)
    })

    it('reports unparsable JSON', async () => {
      cdn.route(LIST_URL, { status: 200, body: '{"combinations":' })
      const outcome = await updater.refresh()
      expect(outcome.ok ? '' : outcome.error.message).toMatch(new RegExp(`^Invalid JSON from ${LIST_URL}: `))
    })

    it('reports a timeout', async () => {
      const slow = createRemoteDateUpdater({
        store, adapter, url: LIST_URL, timeoutMs: 20, fetch: cdn.fetch, logger,
      })
      cdn.route(LIST_URL, hang)
      const outcome = await slow.refresh()
      expect(outcome.ok ? '' : outcome.error.message).toBe(`Timed out after 20ms fetching ${LIST_URL}`)
    })

    it('keeps working when persisting fails', async () => {
      adapter.saveDates = async () => { throw new Error('read-only') }
      cdn.route(LIST_URL, { status: 200, body: DOCUMENT })
      expect(await updater.refresh()).toEqual({ ok: true, added: 1, total: 2 })
      expect(logger.warn).toHaveBeenCalledWith('Failed to persist candidate dates: read-only')
    })

    it('shares one request between concurrent refreshes', async () => {
      const gate = deferred<Reply>()
      cdn.route(LIST_URL, () => gate.promise)
      const first = updater.refresh()
      const second = updater.refresh()
      expect(second).toBe(first)
      gate.resolve({ status: 200, body: DOCUMENT })
      await Promise.all([first, second])
      expect(cdn.calls).toEqual([LIST_URL])

      cdn.route(LIST_URL, { status: 200, body: DOCUMENT })
      await updater.refresh()
      expect(cdn.calls).toHaveLength(2)
    })
  })

  // ==========================================================================
  // restore
  // ==========================================================================

  describe('restore', () => {
    it('merges the persisted list', async () => {
      await adapter.saveDates('["20250101","20231128"]')
      expect(await updater.restore()).toBe(1)
      expect(store.has(date('20250101'))).toBe(true)
    })

    it('keeps restored dates in the list it persists next', async () => {
      await adapter.saveDates('["20240101"]')
      await updater.restore()
      cdn.route(LIST_URL, { status: 200, body: '["20250501"]' })
      await updater.refresh()
      expect(await adapter.loadDates()).toBe('["20250501","20240101"]')
    })

    it('returns 0 when nothing was persisted', async () => {
      expect(await updater.restore()).toBe(0)
    })

    it('ignores an unreadable persisted list', async () => {
      await adapter.saveDates('{not json')
      expect(await updater.restore()).toBe(0)
      expect(logger.warn).toHaveBeenCalledTimes(1)
    })
  })

  // ==========================================================================
  // scheduling
  // ==========================================================================

  describe('start / stop', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('refreshes once per interval until stopped', async () => {
      cdn.route(LIST_URL, { status: 200, body: '["20231128"]' })
      updater.start(60_000)
      expect(updater.running).toBe(true)

      await vi.advanceTimersByTimeAsync(59_999)
      expect(cdn.calls).toHaveLength(0)
      await vi.advanceTimersByTimeAsync(1)
      expect(cdn.calls).toHaveLength(1)
      await vi.advanceTimersByTimeAsync(60_000)
      expect(cdn.calls).toHaveLength(2)

      updater.stop()
      expect(updater.running).toBe(false)
      await vi.advanceTimersByTimeAsync(120_000)
      expect(cdn.calls).toHaveLength(2)
    })

    it('ignores a second start', async () => {
      updater.start(60_000)
      updater.start(1_000)
      await vi.advanceTimersByTimeAsync(1_000)
      expect(cdn.calls).toHaveLength(0)
    })
  })
})
