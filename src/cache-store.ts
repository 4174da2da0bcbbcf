/**
 * Cache Store
 *
 * Maps a pair key to a found image, a not-found marker, or nothing.
 *
 * Not-found markers are invalidated lazily at read time: when they expire,
 * when they fail schema validation, or when the candidate list has grown past
 * the dates the marker covered. There is no background sweep.
 */

import { z } from 'zod'
import type { Adapter } from './adapter'
import { type CandidateDate, parseCandidateDate } from './candidate-date'
import type { PairKey } from './emoji-pair'
import { CacheCorruptionError } from './errors'
import { type Logger, errorMessage, isPng } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type FoundEntry = {
  type: 'found'
  image: Uint8Array
  sourceDate: CandidateDate | null
}

export type NotFoundEntry = {
  type: 'notFound'
  probedDates: CandidateDate[]
  /** Epoch milliseconds */
  createdAt: number
}

export type CacheEntry = FoundEntry | NotFoundEntry

export type CacheStoreOptions = {
  adapter: Adapter
  notfoundExpireDays: number
  now?: () => number
  logger?: Logger
}

export type CacheStore = {
  get(key: PairKey, snapshot?: readonly CandidateDate[]): Promise<CacheEntry | null>
  putFound(key: PairKey, image: Uint8Array, sourceDate: CandidateDate | null): Promise<void>
  putNotFound(key: PairKey, probedDates: Iterable<CandidateDate>, fingerprint?: string): Promise<void>
  isFullCoverage(probedDates: Iterable<CandidateDate>, snapshot: readonly CandidateDate[]): boolean
}

export const MS_PER_DAY = 86_400_000

// ============================================================================
// Marker Schema
// ============================================================================

const candidateDateSchema = z.string().transform((value, ctx): CandidateDate => {
  const parsed = parseCandidateDate(value)
  if (parsed.ok) return parsed.value
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
  return z.NEVER
})

export const notFoundMarkerSchema = z.object({
  probedDates: z.array(candidateDateSchema),
  createdAt: z.number().int().nonnegative(),
  fingerprint: z.string().optional(),
})

export type NotFoundMarker = z.infer<typeof notFoundMarkerSchema>

// ============================================================================
// Coverage
// ============================================================================

/** True iff every date in the snapshot was probed */
export function isFullCoverage(
  probedDates: Iterable<CandidateDate>,
  snapshot: readonly CandidateDate[],
): boolean {
  const probed = new Set(probedDates)
  return snapshot.every(d => probed.has(d))
}

// ============================================================================
// Factory
// ============================================================================

export function createCacheStore(options: CacheStoreOptions): CacheStore {
  const { adapter, notfoundExpireDays } = options
  const now = options.now ?? Date.now
  const logger = options.logger ?? console
  const ttlMs = notfoundExpireDays * MS_PER_DAY

  function parseMarker(key: PairKey, text: string): NotFoundMarker {
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (e) {
      throw new CacheCorruptionError(key, `Unreadable not-found marker for ${key}: ${errorMessage(e)}`)
    }
    const result = notFoundMarkerSchema.safeParse(json)
    if (!result.success) {
      throw new CacheCorruptionError(key, `Malformed not-found marker for ${key}: ${result.error.message}`)
    }
    return result.data
  }

  async function getFound(key: PairKey): Promise<FoundEntry | null> {
    const stored = await adapter.getImage(key)
    if (!stored) return null
    if (!isPng(stored.image)) {
      logger.warn(`Discarding corrupt cached image for ${key}`)
      await adapter.deleteImage(key)
      return null
    }
    const date = stored.sourceDate === null ? null : parseCandidateDate(stored.sourceDate)
    return {
      type: 'found',
      image: stored.image,
      sourceDate: date?.ok ? date.value : null,
    }
  }

  async function getNotFound(key: PairKey, snapshot?: readonly CandidateDate[]): Promise<NotFoundEntry | null> {
    const text = await adapter.getMarker(key)
    if (text === null) return null

    let marker: NotFoundMarker
    try {
      marker = parseMarker(key, text)
    } catch (e) {
      if (!(e instanceof CacheCorruptionError)) throw e
      logger.warn(e.message)
      await adapter.deleteMarker(key)
      return null
    }

    if (now() >= marker.createdAt + ttlMs) {
      await adapter.deleteMarker(key)
      return null
    }
    if (snapshot && !isFullCoverage(marker.probedDates, snapshot)) {
      logger.debug(`Not-found marker for ${key} predates new candidate dates`)
      await adapter.deleteMarker(key)
      return null
    }
    return { type: 'notFound', probedDates: marker.probedDates, createdAt: marker.createdAt }
  }

  return {
    async get(key, snapshot) {
      const found = await getFound(key)
      if (found) return found
      return getNotFound(key, snapshot)
    },

    async putFound(key, image, sourceDate) {
      await adapter.putImage(key, image, sourceDate)
      await adapter.deleteMarker(key)
    },

    async putNotFound(key, probedDates, fingerprint) {
      const marker: NotFoundMarker = {
        probedDates: [...new Set(probedDates)].sort(),
        createdAt: now(),
        ...(fingerprint !== undefined ? { fingerprint } : {}),
      }
      await adapter.putMarker(key, JSON.stringify(marker))
    },

    isFullCoverage,
  }
}
