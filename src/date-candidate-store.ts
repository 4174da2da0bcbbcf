/**
 * Date Candidate Store
 *
 * Owns the deduplicated candidate-date list: shipped baseline, remote dates and
 * user extra dates. Every merge builds a new frozen array and swaps it in, so a
 * snapshot taken by a reader never changes underneath it.
 */

import { createHash } from 'node:crypto'
import { type CandidateDate, BASELINE_DATES, sortNewestFirst } from './candidate-date'

export type DateCandidateStoreOptions = {
  /** Defaults to the shipped baseline */
  baseline?: Iterable<CandidateDate>
  extraDates?: Iterable<CandidateDate>
}

export type DateCandidateStore = {
  /** Union new dates into the set; returns how many were not already known */
  merge(dates: Iterable<CandidateDate>): number
  /** Full candidate list, newest first */
  snapshot(): readonly CandidateDate[]
  has(date: CandidateDate): boolean
  size(): number
  /** Short hash identifying the current snapshot */
  fingerprint(): string
}

export function fingerprintDates(dates: readonly CandidateDate[]): string {
  return createHash('md5').update(dates.join(',')).digest('hex').slice(0, 8)
}

export function createDateCandidateStore(options: DateCandidateStoreOptions = {}): DateCandidateStore {
  let current: readonly CandidateDate[] = Object.freeze(
    sortNewestFirst([...(options.baseline ?? BASELINE_DATES), ...(options.extraDates ?? [])]),
  )
  let members = new Set(current)
  let cachedFingerprint: string | null = null

  return {
    merge(dates) {
      const added = [...new Set(dates)].filter(d => !members.has(d))
      if (added.length === 0) return 0

      const next = Object.freeze(sortNewestFirst([...current, ...added]))
      current = next
      members = new Set(next)
      cachedFingerprint = null
      return added.length
    },

    snapshot() {
      return current
    },

    has(date) {
      return members.has(date)
    },

    size() {
      return current.length
    },

    fingerprint() {
      if (cachedFingerprint === null) cachedFingerprint = fingerprintDates(current)
      return cachedFingerprint
    },
  }
}
