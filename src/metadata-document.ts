/**
 * Metadata Documents
 *
 * Parsing and fetching of the upstream per-emoji JSON documents:
 *
 *   { "combinations": { "<partnerCp>": [{ "date": "20231128", "isLatest": true, ... }] } }
 *
 * Parsing is lenient: entries that do not match are skipped, never fatal.
 */

import { z } from 'zod'
import { type CandidateDate, parseCandidateDate, parseCandidateDates, sortNewestFirst } from './candidate-date'
import { RemoteFetchError } from './errors'
import { errorMessage, isAbortError } from './internal/helpers'

// ============================================================================
// Schema
// ============================================================================

const combinationSchema = z.object({
  date: z.string(),
  isLatest: z.boolean().optional(),
}).passthrough()

const documentSchema = z.object({
  combinations: z.record(z.string(), z.unknown()),
}).passthrough()

type Combination = z.infer<typeof combinationSchema>

function combinationsOf(doc: unknown): Array<[partner: string, combos: Combination[]]> {
  const parsed = documentSchema.safeParse(doc)
  if (!parsed.success) return []

  const out: Array<[string, Combination[]]> = []
  for (const [partner, list] of Object.entries(parsed.data.combinations)) {
    if (!Array.isArray(list)) continue
    const combos: Combination[] = []
    for (const item of list) {
      const combo = combinationSchema.safeParse(item)
      if (combo.success) combos.push(combo.data)
    }
    if (combos.length > 0) out.push([partner, combos])
  }
  return out
}

// ============================================================================
// Extraction
// ============================================================================

/** Every valid date mentioned anywhere in the document, newest first */
export function extractDocumentDates(doc: unknown): CandidateDate[] {
  const dates: CandidateDate[] = []
  for (const [, combos] of combinationsOf(doc)) {
    dates.push(...parseCandidateDates(combos.map(c => c.date)))
  }
  return sortNewestFirst(dates)
}

/**
 * Partner codepoint → the date its combination was published under.
 * The entry flagged `isLatest` wins; otherwise the first listed.
 */
export function extractPartnerDates(doc: unknown): Map<string, CandidateDate> {
  const index = new Map<string, CandidateDate>()
  for (const [partner, combos] of combinationsOf(doc)) {
    const chosen = combos.find(c => c.isLatest === true) ?? combos[0]
    if (!chosen) continue
    const date = parseCandidateDate(chosen.date)
    if (date.ok) index.set(partner, date.value)
  }
  return index
}

/** A date list is either a bare JSON array of dates or a metadata document */
export function parseDateList(json: unknown): CandidateDate[] {
  if (Array.isArray(json)) return sortNewestFirst(parseCandidateDates(json))
  return extractDocumentDates(json)
}

// ============================================================================
// Fetching
// ============================================================================

export type FetchJsonOptions = {
  fetch: typeof fetch
  timeoutMs: number
}

/** GET a JSON document; any failure becomes a RemoteFetchError */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), options.timeoutMs)
  try {
    const res = await options.fetch(url, { signal: controller.signal })
    if (res.status !== 200) {
      throw new RemoteFetchError(`HTTP ${res.status} from ${url}`)
    }
    const body = await res.text()
    try {
      return JSON.parse(body)
    } catch (e) {
      throw new RemoteFetchError(`Invalid JSON from ${url}: ${errorMessage(e)}`, { cause: e })
    }
  } catch (e) {
    if (e instanceof RemoteFetchError) throw e
    if (isAbortError(e)) {
      throw new RemoteFetchError(`Timed out after ${options.timeoutMs}ms fetching ${url}`, { cause: e })
    }
    throw new RemoteFetchError(`Failed to fetch ${url}: ${errorMessage(e)}`, { cause: e })
  } finally {
    clearTimeout(timer)
  }
}
