/**
 * Resolver
 *
 * Consumer-facing entry point that wires the candidate store, remote updater,
 * cache store, limiter, CDN client, metadata index and prober together.
 * Holds no resolution state of its own beyond that composition.
 */

import type { Adapter } from './adapter'
import type { CandidateDate } from './candidate-date'
import { createCacheStore } from './cache-store'
import { createCdnClient } from './cdn-client'
import { type ResolverConfig, parseResolverConfig } from './config'
import { createDateCandidateStore } from './date-candidate-store'
import { type EmojiPair, type PairKey, emojiPairFromText, makeEmojiPair } from './emoji-pair'
import { ValidationError } from './errors'
import type { Logger } from './internal/helpers'
import { createLimiter } from './limiter'
import { createMetadataIndex } from './metadata-index'
import { type ProbeOutcome, createProber } from './prober'
import { type RefreshOutcome, createRemoteDateUpdater } from './remote-date-updater'
import { DATE_LIST_CODEPOINT, buildMetadataUrl, createProbeUrlBuilder } from './url-builder'

// ============================================================================
// Types
// ============================================================================

export type ResolverOptions = {
  adapter: Adapter
  /** Parsed configuration; omitted fields take their defaults */
  config?: Partial<ResolverConfig>
  fetch?: typeof fetch
  logger?: Logger
  now?: () => number
  /** Seed dates; defaults to the shipped baseline */
  baseline?: Iterable<CandidateDate>
  /** Consult upstream metadata for exact dates before scanning (default true) */
  useMetadata?: boolean
}

export type ResolveResult =
  | { type: 'image'; image: Uint8Array; sourceDate: CandidateDate | null; cached: boolean }
  | { type: 'notFound' }
  | { type: 'infraError'; error: Error }

export type ResolverEvents = {
  probe: { key: PairKey; dates: readonly CandidateDate[] }
  found: { key: PairKey; sourceDate: CandidateDate | null; cached: boolean }
  notFound: { key: PairKey; marked: boolean }
  infraError: { key: PairKey; error: Error }
  datesUpdated: { added: number; total: number }
}

export type ResolverEventName = keyof ResolverEvents

export type Resolver = {
  /** Resolve a pair given as codepoint strings, e.g. ('1f600', '2764-fe0f') */
  resolve(a: string, b: string): Promise<ResolveResult>
  /** Resolve a pair given as emoji text, e.g. ('😀', '❤️') */
  resolveEmoji(a: string, b: string): Promise<ResolveResult>
  /** Restore persisted state and begin periodic date refresh */
  start(): Promise<void>
  refreshDates(): Promise<RefreshOutcome>
  candidateDates(): readonly CandidateDate[]
  on<E extends ResolverEventName>(event: E, handler: (payload: ResolverEvents[E]) => void): () => void
  close(): Promise<void>
  readonly config: Readonly<ResolverConfig>
}

// ============================================================================
// Helpers
// ============================================================================

function validateConfig(config: ResolverConfig): void {
  const positive: Array<keyof ResolverConfig> = [
    'requestTimeoutMs', 'maxProbeDates', 'concurrencyLimit', 'dateRefreshIntervalMs',
  ]
  for (const field of positive) {
    const value = config[field]
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ValidationError(`${field} must be a positive integer`)
    }
  }
  if (!Number.isFinite(config.notfoundExpireDays) || config.notfoundExpireDays < 0) {
    throw new ValidationError('notfoundExpireDays must be >= 0')
  }
}

function toResult(outcome: ProbeOutcome): ResolveResult {
  switch (outcome.type) {
    case 'found':
      return { type: 'image', image: outcome.image, sourceDate: outcome.sourceDate, cached: outcome.cached }
    case 'notFound':
      return { type: 'notFound' }
    case 'infraError':
      return { type: 'infraError', error: outcome.error }
  }
}

// ============================================================================
// Implementation
// ============================================================================

export function createResolver(options: ResolverOptions): Resolver {
  if (!options.adapter || typeof options.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }

  const config: ResolverConfig = Object.freeze({ ...parseResolverConfig({}), ...options.config })
  validateConfig(config)

  const { adapter } = options
  const logger = options.logger ?? console
  const doFetch = options.fetch ?? fetch
  const now = options.now ?? Date.now

  // Event handlers
  const eventHandlers: { [E in ResolverEventName]: Array<(payload: ResolverEvents[E]) => void> } = {
    probe: [], found: [], notFound: [], infraError: [], datesUpdated: [],
  }

  function emit<E extends ResolverEventName>(event: E, payload: ResolverEvents[E]): void {
    const handlers: Array<(payload: ResolverEvents[E]) => void> = eventHandlers[event]
    for (const handler of [...handlers]) {
      try { handler(payload) } catch (e) { console.error(`Event handler error on '${event}':`, e) }
    }
  }

  // Composition
  const dateStore = createDateCandidateStore({
    ...(options.baseline !== undefined ? { baseline: options.baseline } : {}),
    extraDates: config.extraDates,
  })
  const cacheStore = createCacheStore({
    adapter,
    notfoundExpireDays: config.notfoundExpireDays,
    now,
    logger,
  })
  const updater = createRemoteDateUpdater({
    store: dateStore,
    adapter,
    url: buildMetadataUrl(config.githubProxy, DATE_LIST_CODEPOINT),
    timeoutMs: config.requestTimeoutMs,
    fetch: doFetch,
    logger,
    onUpdate: (added, total) => emit('datesUpdated', { added, total }),
  })
  const metadata = options.useMetadata === false
    ? undefined
    : createMetadataIndex({
        adapter,
        dateStore,
        githubProxy: config.githubProxy,
        timeoutMs: config.requestTimeoutMs,
        maxAgeDays: config.metadataMaxAgeDays,
        fetch: doFetch,
        now,
        logger,
      })
  const prober = createProber({
    cacheStore,
    dateStore,
    limiter: createLimiter(config.concurrencyLimit),
    cdnClient: createCdnClient({ fetch: doFetch, timeoutMs: config.requestTimeoutMs, logger }),
    buildUrls: createProbeUrlBuilder(config),
    maxProbeDates: config.maxProbeDates,
    pairOrder: config.pairOrder,
    ...(metadata ? { hints: metadata } : {}),
    logger,
    onProbe: (key, dates) => emit('probe', { key, dates }),
  })

  let started = false

  async function resolvePair(pair: EmojiPair): Promise<ResolveResult> {
    const outcome = await prober.probe(pair)
    switch (outcome.type) {
      case 'found':
        emit('found', { key: outcome.key, sourceDate: outcome.sourceDate, cached: outcome.cached })
        break
      case 'notFound':
        emit('notFound', { key: outcome.key, marked: outcome.marked })
        break
      case 'infraError':
        logger.error(`Resolution failed for ${outcome.key}: ${outcome.error.message}`)
        emit('infraError', { key: outcome.key, error: outcome.error })
        break
    }
    return toResult(outcome)
  }

  return {
    async resolve(a, b) {
      return resolvePair(makeEmojiPair(a, b))
    },

    async resolveEmoji(a, b) {
      return resolvePair(emojiPairFromText(a, b))
    },

    async start() {
      if (started) return
      started = true
      const restored = await updater.restore()
      const loaded = metadata ? await metadata.load() : 0
      updater.start(config.dateRefreshIntervalMs)
      logger.info(`Resolver started: ${dateStore.size()} candidate dates (${restored} restored, ${loaded} metadata documents)`)
      // Freshness only; resolution works from the current snapshot meanwhile
      void updater.refresh()
    },

    refreshDates() {
      return updater.refresh()
    },

    candidateDates() {
      return dateStore.snapshot()
    },

    on(event, handler) {
      const list: Array<typeof handler> = eventHandlers[event]
      list.push(handler)
      return () => {
        const idx = list.indexOf(handler)
        if (idx !== -1) list.splice(idx, 1)
      }
    },

    async close() {
      updater.stop()
      started = false
      await adapter.close?.()
    },

    config,
  }
}
