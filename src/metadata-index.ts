/**
 * Metadata Index
 *
 * In-memory index of the upstream per-emoji documents, used to hint the exact
 * date a pair was published under before falling back to a date scan.
 * Documents are persisted through the adapter and re-fetched once older than
 * `maxAgeDays`. Every date a document mentions is merged into the candidate store.
 */

import type { Adapter } from './adapter'
import type { CandidateDate } from './candidate-date'
import { MS_PER_DAY } from './cache-store'
import type { DateCandidateStore } from './date-candidate-store'
import { type Codepoint, type EmojiPair, isCodepoint } from './emoji-pair'
import { type Logger, errorMessage } from './internal/helpers'
import { extractDocumentDates, extractPartnerDates, fetchJson } from './metadata-document'
import type { DateHintSource } from './prober'
import { buildMetadataUrl } from './url-builder'

export type MetadataIndexOptions = {
  adapter: Adapter
  dateStore: DateCandidateStore
  githubProxy: string
  timeoutMs: number
  maxAgeDays: number
  fetch?: typeof fetch
  now?: () => number
  logger?: Logger
}

export type MetadataIndex = DateHintSource & {
  /** Index every persisted document; returns how many were loaded */
  load(): Promise<number>
  lookup(a: Codepoint, b: Codepoint): CandidateDate | null
  /** Fetch the document for `cp` if absent or stale; true when a fresh copy was stored */
  ensure(cp: Codepoint): Promise<boolean>
}

type IndexEntry = {
  fetchedAt: number
  partners: Map<string, CandidateDate>
}

export function createMetadataIndex(options: MetadataIndexOptions): MetadataIndex {
  const { adapter, dateStore, githubProxy, timeoutMs, maxAgeDays } = options
  const doFetch = options.fetch ?? fetch
  const now = options.now ?? Date.now
  const logger = options.logger ?? console

  const index = new Map<string, IndexEntry>()

  function indexDocument(cp: string, text: string, fetchedAt: number): boolean {
    let doc: unknown
    try {
      doc = JSON.parse(text)
    } catch (e) {
      logger.warn(`Ignoring unreadable metadata for ${cp}: ${errorMessage(e)}`)
      return false
    }
    index.set(cp, { fetchedAt, partners: extractPartnerDates(doc) })
    dateStore.merge(extractDocumentDates(doc))
    return true
  }

  async function entryFor(cp: Codepoint): Promise<IndexEntry | null> {
    const cached = index.get(cp)
    if (cached) return cached
    const stored = await adapter.getMetadata(cp)
    if (!stored) return null
    return indexDocument(cp, stored.text, stored.fetchedAt) ? index.get(cp) ?? null : null
  }

  function lookup(a: Codepoint, b: Codepoint): CandidateDate | null {
    return index.get(a)?.partners.get(b) ?? index.get(b)?.partners.get(a) ?? null
  }

  async function ensure(cp: Codepoint): Promise<boolean> {
    const entry = await entryFor(cp)
    if (entry && now() - entry.fetchedAt <= maxAgeDays * MS_PER_DAY) return false

    const url = buildMetadataUrl(githubProxy, cp)
    try {
      const doc = await fetchJson(url, { fetch: doFetch, timeoutMs })
      const text = JSON.stringify(doc)
      const fetchedAt = now()
      await adapter.putMetadata(cp, text, fetchedAt)
      return indexDocument(cp, text, fetchedAt)
    } catch (e) {
      logger.debug(`Metadata fetch failed for ${cp}: ${errorMessage(e)}`)
      return false
    }
  }

  return {
    async load() {
      let loaded = 0
      for (const cp of await adapter.listMetadata()) {
        if (!isCodepoint(cp)) continue
        const stored = await adapter.getMetadata(cp)
        if (stored && indexDocument(cp, stored.text, stored.fetchedAt)) loaded++
      }
      return loaded
    },

    lookup,
    ensure,

    async hintFor(pair: EmojiPair) {
      await Promise.all([entryFor(pair.first), entryFor(pair.second)])
      const known = lookup(pair.first, pair.second)
      if (known) return known

      const fetched = await Promise.all([ensure(pair.first), ensure(pair.second)])
      return fetched.some(Boolean) ? lookup(pair.first, pair.second) : null
    },
  }
}
