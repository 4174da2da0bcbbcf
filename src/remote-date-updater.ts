/**
 * Remote Date Updater
 *
 * Keeps the candidate-date store fresh from the upstream date-list document and
 * persists what it learns so the next process starts with it. Only dates that
 * came from the remote list are persisted: baseline, configured extras and
 * metadata dates are rebuilt by each process. Every failure is logged and
 * reported in the outcome; the store simply keeps its snapshot.
 */

import type { Adapter } from './adapter'
import { type CandidateDate, sortNewestFirst } from './candidate-date'
import type { DateCandidateStore } from './date-candidate-store'
import { RemoteFetchError } from './errors'
import { type Logger, errorMessage } from './internal/helpers'
import { fetchJson, parseDateList } from './metadata-document'

export type RefreshOutcome =
  | { ok: true; added: number; total: number }
  | { ok: false; error: RemoteFetchError }

export type RemoteDateUpdaterOptions = {
  store: DateCandidateStore
  adapter: Adapter
  url: string
  timeoutMs: number
  fetch?: typeof fetch
  logger?: Logger
  onUpdate?: (added: number, total: number) => void
}

export type RemoteDateUpdater = {
  refresh(): Promise<RefreshOutcome>
  /** Merge the list persisted by an earlier refresh; returns dates added */
  restore(): Promise<number>
  start(intervalMs: number): void
  stop(): void
  readonly running: boolean
}

export function createRemoteDateUpdater(options: RemoteDateUpdaterOptions): RemoteDateUpdater {
  const { store, adapter, url, timeoutMs, onUpdate } = options
  const doFetch = options.fetch ?? fetch
  const logger = options.logger ?? console

  const remote = new Set<CandidateDate>()
  let current: Promise<RefreshOutcome> | null = null
  let timer: ReturnType<typeof setInterval> | null = null

  /** Adds to the remote set; returns how many were new to it */
  function remember(dates: readonly CandidateDate[]): number {
    const before = remote.size
    for (const d of dates) remote.add(d)
    return remote.size - before
  }

  async function persist(): Promise<void> {
    try {
      await adapter.saveDates(JSON.stringify(sortNewestFirst(remote)))
    } catch (e) {
      logger.warn(`Failed to persist candidate dates: ${errorMessage(e)}`)
    }
  }

  async function runRefresh(): Promise<RefreshOutcome> {
    try {
      const json = await fetchJson(url, { fetch: doFetch, timeoutMs })
      const dates = parseDateList(json)
      if (dates.length === 0) {
        throw new RemoteFetchError(`Date list from ${url} contained no valid dates`)
      }

      const learned = remember(dates)
      const added = store.merge(dates)
      const total = store.size()
      if (learned > 0) await persist()
      if (added > 0) {
        logger.info(`Candidate date list updated: ${added} new, ${total} total`)
        onUpdate?.(added, total)
      }
      return { ok: true, added, total }
    } catch (e) {
      const error = e instanceof RemoteFetchError
        ? e
        : new RemoteFetchError(`Date list refresh failed: ${errorMessage(e)}`, { cause: e })
      logger.warn(`Remote date update failed: ${error.message}`)
      return { ok: false, error }
    }
  }

  function refresh(): Promise<RefreshOutcome> {
    if (!current) {
      current = runRefresh().finally(() => {
        current = null
      })
    }
    return current
  }

  return {
    refresh,

    async restore() {
      let text: string | null
      try {
        text = await adapter.loadDates()
      } catch (e) {
        logger.warn(`Failed to load persisted candidate dates: ${errorMessage(e)}`)
        return 0
      }
      if (text === null) return 0

      let json: unknown
      try {
        json = JSON.parse(text)
      } catch (e) {
        logger.warn(`Ignoring unreadable persisted candidate dates: ${errorMessage(e)}`)
        return 0
      }
      const dates = parseDateList(json)
      remember(dates)
      return store.merge(dates)
    },

    start(intervalMs) {
      if (timer) return
      timer = setInterval(() => {
        void refresh()
      }, intervalMs)
      timer.unref()
    },

    stop() {
      if (timer) clearInterval(timer)
      timer = null
    },

    get running() {
      return timer !== null
    },
  }
}
