/**
 * Prober
 *
 * Resolves one pair to an image or a negative outcome by probing candidate
 * dates on the CDN.
 *
 * Each call probes at most `maxProbeDates` dates that have not yet been
 * confirmed missing for the pair, all at once through the shared limiter. The
 * first valid image wins and aborts the rest. Dates confirmed missing (every
 * URL answered 404) accumulate across calls, so a pair whose candidate list is
 * larger than the budget is covered over several calls; a not-found marker is
 * written only once the accumulated dates cover the whole snapshot. Timeouts
 * and other failures never count as coverage. No date is retried within a call.
 */

import type { CandidateDate } from './candidate-date'
import type { CacheStore } from './cache-store'
import type { CdnClient, ProbeResponse } from './cdn-client'
import type { DateCandidateStore } from './date-candidate-store'
import { type EmojiPair, type PairKey, type PairOrder, pairKeyOf } from './emoji-pair'
import { CdnUnavailableError, RateLimitedError } from './errors'
import { type Logger, createLruMap, errorMessage } from './internal/helpers'
import type { Limiter } from './limiter'
import type { ProbeUrlBuilder } from './url-builder'

// ============================================================================
// Types
// ============================================================================

export type ProbeOutcome =
  | { type: 'found'; key: PairKey; image: Uint8Array; sourceDate: CandidateDate | null; cached: boolean }
  /** `marked`: a not-found marker is on record for the pair */
  | { type: 'notFound'; key: PairKey; marked: boolean }
  | { type: 'infraError'; key: PairKey; error: Error }

/** Supplies a date known to hold the pair's image, tried before the date scan */
export type DateHintSource = {
  hintFor(pair: EmojiPair): Promise<CandidateDate | null>
}

export type ProberOptions = {
  cacheStore: CacheStore
  dateStore: DateCandidateStore
  limiter: Limiter
  cdnClient: CdnClient
  buildUrls: ProbeUrlBuilder
  maxProbeDates: number
  pairOrder: PairOrder
  hints?: DateHintSource
  logger?: Logger
  /** Called before each batch of network probes */
  onProbe?: (key: PairKey, dates: readonly CandidateDate[]) => void
}

export type Prober = {
  probe(pair: EmojiPair): Promise<ProbeOutcome>
  /** Dates confirmed missing for a key since its last marker or hit */
  progressOf(key: PairKey): CandidateDate[]
}

type BatchOutcome =
  | { type: 'found'; image: Uint8Array; date: CandidateDate }
  | { type: 'rateLimited'; error: RateLimitedError }
  | { type: 'exhausted'; missing: CandidateDate[]; errors: Error[] }

const MAX_TRACKED_KEYS = 1024

// ============================================================================
// Factory
// ============================================================================

export function createProber(options: ProberOptions): Prober {
  const {
    cacheStore, dateStore, limiter, cdnClient, buildUrls,
    maxProbeDates, pairOrder, hints, onProbe,
  } = options
  const logger = options.logger ?? console

  const inFlight = new Map<PairKey, Promise<ProbeOutcome>>()
  const progress = createLruMap<PairKey, Set<CandidateDate>>(MAX_TRACKED_KEYS)

  // ========== Network ==========

  async function request(url: string, signal: AbortSignal): Promise<ProbeResponse> {
    try {
      return await limiter.run(() => cdnClient.fetchImage(url, signal), signal)
    } catch (e) {
      if (signal.aborted) return { type: 'aborted' }
      throw e
    }
  }

  /**
   * Probe every URL of every date concurrently. Resolves on the first image
   * without waiting for the aborted requests to wind down.
   */
  function probeBatch(pair: EmojiPair, dates: readonly CandidateDate[]): Promise<BatchOutcome> {
    const controller = new AbortController()
    const requests = dates.flatMap(date => buildUrls(pair, date).map(url => ({ date, url })))
    const urlsPerDate = new Map<CandidateDate, number>()
    const missingPerDate = new Map<CandidateDate, number>()
    const errors: Error[] = []
    for (const { date } of requests) urlsPerDate.set(date, (urlsPerDate.get(date) ?? 0) + 1)

    return new Promise<BatchOutcome>((resolve, reject) => {
      let remaining = requests.length
      let settled = false

      function settle(outcome: BatchOutcome) {
        if (settled) return
        settled = true
        controller.abort()
        resolve(outcome)
      }

      function exhausted(): BatchOutcome {
        const missing = dates.filter(d => {
          const expected = urlsPerDate.get(d) ?? 0
          return expected > 0 && missingPerDate.get(d) === expected
        })
        return { type: 'exhausted', missing, errors }
      }

      function handle(date: CandidateDate, res: ProbeResponse) {
        switch (res.type) {
          case 'image':
            settle({ type: 'found', image: res.image, date })
            break
          case 'rateLimited':
            settle({ type: 'rateLimited', error: res.error })
            break
          case 'missing':
            missingPerDate.set(date, (missingPerDate.get(date) ?? 0) + 1)
            break
          case 'error':
            errors.push(res.error)
            break
          case 'aborted':
            break
        }
      }

      if (remaining === 0) {
        settle(exhausted())
        return
      }

      for (const { date, url } of requests) {
        void request(url, controller.signal).then(
          res => {
            // Late responses after a winner are discarded
            if (!settled) handle(date, res)
            remaining--
            if (remaining === 0) settle(exhausted())
          },
          (e: unknown) => {
            if (settled) return
            settled = true
            controller.abort()
            reject(e)
          },
        )
      }
    })
  }

  // ========== Cache writes ==========

  async function recordFound(key: PairKey, image: Uint8Array, date: CandidateDate): Promise<void> {
    try {
      await cacheStore.putFound(key, image, date)
    } catch (e) {
      logger.error(`Failed to cache image for ${key}: ${errorMessage(e)}`)
    }
  }

  async function recordNotFound(key: PairKey, tried: Set<CandidateDate>): Promise<boolean> {
    try {
      await cacheStore.putNotFound(key, tried, dateStore.fingerprint())
      return true
    } catch (e) {
      logger.error(`Failed to write not-found marker for ${key}: ${errorMessage(e)}`)
      return false
    }
  }

  // ========== Resolution ==========

  async function tryHint(
    pair: EmojiPair,
    key: PairKey,
    tried: Set<CandidateDate>,
  ): Promise<ProbeOutcome | null> {
    if (!hints) return null
    let date: CandidateDate | null
    try {
      date = await hints.hintFor(pair)
    } catch (e) {
      logger.debug(`Date hint lookup failed for ${key}: ${errorMessage(e)}`)
      return null
    }
    if (date === null || tried.has(date)) return null

    onProbe?.(key, [date])
    const batch = await probeBatch(pair, [date])
    if (batch.type === 'found') {
      await recordFound(key, batch.image, batch.date)
      return { type: 'found', key, image: batch.image, sourceDate: batch.date, cached: false }
    }
    if (batch.type === 'rateLimited') return { type: 'infraError', key, error: batch.error }
    for (const d of batch.missing) tried.add(d)
    return null
  }

  async function resolvePair(pair: EmojiPair, key: PairKey): Promise<ProbeOutcome> {
    const snapshot = dateStore.snapshot()

    const cached = await cacheStore.get(key, snapshot)
    if (cached?.type === 'found') {
      return { type: 'found', key, image: cached.image, sourceDate: cached.sourceDate, cached: true }
    }
    if (cached?.type === 'notFound') return { type: 'notFound', key, marked: true }

    if (snapshot.length === 0) {
      logger.warn('Candidate date list is empty; nothing to probe')
      return { type: 'notFound', key, marked: false }
    }

    const tried = progress.get(key) ?? new Set<CandidateDate>()
    progress.set(key, tried)

    const hinted = await tryHint(pair, key, tried)
    if (hinted) {
      if (hinted.type === 'found') progress.delete(key)
      return hinted
    }

    // the hint lookup may have merged dates from a metadata document

    const scan = dateStore.snapshot()
    const batchDates = scan.filter(d => !tried.has(d)).slice(0, maxProbeDates)
    let errors: Error[] = []
    let answered = 0
    if (batchDates.length > 0) {
      onProbe?.(key, batchDates)
      const batch = await probeBatch(pair, batchDates)
      if (batch.type === 'found') {
        progress.delete(key)
        await recordFound(key, batch.image, batch.date)
        return { type: 'found', key, image: batch.image, sourceDate: batch.date, cached: false }
      }
      if (batch.type === 'rateLimited') {
        return { type: 'infraError', key, error: batch.error }
      }
      for (const d of batch.missing) tried.add(d)
      errors = batch.errors
      answered = batch.missing.length
    }

    if (cacheStore.isFullCoverage(tried, scan)) {
      const marked = await recordNotFound(key, tried)
      if (marked) progress.delete(key)
      logger.info(`No combination exists for ${key} across ${scan.length} dates`)
      return { type: 'notFound', key, marked }
    }

    if (answered === 0 && errors.length > 0) {
      logger.info(`CDN unreachable for ${key}; not caching`)
      return {
        type: 'infraError',
        key,
        error: new CdnUnavailableError(
          `All ${errors.length} probes for ${key} failed`,
          { cause: errors[0] },
        ),
      }
    }

    logger.info(`No hit for ${key} (${tried.size}/${scan.length} dates covered)`)
    return { type: 'notFound', key, marked: false }
  }

  return {
    probe(pair) {
      const key = pairKeyOf(pair, pairOrder)
      const existing = inFlight.get(key)
      if (existing) return existing

      const run = resolvePair(pair, key)
        .catch((e: unknown): ProbeOutcome => {
          logger.error(`Unexpected failure resolving ${key}:`, e)
          return { type: 'infraError', key, error: e instanceof Error ? e : new Error(String(e)) }
        })
        .finally(() => inFlight.delete(key))
      inFlight.set(key, run)
      return run
    },

    progressOf(key) {
      return [...(progress.get(key) ?? [])].sort()
    },
  }
}
