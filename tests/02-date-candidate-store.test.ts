/**
 * Segment 02: Date Candidate Store Tests
 *
 * Merge semantics, copy-on-write snapshots and fingerprints.
 */

import { describe, it, expect } from 'vitest'
import { BASELINE_DATES } from '../src/candidate-date'
import { createDateCandidateStore, fingerprintDates } from '../src/date-candidate-store'
import { date, dates } from './helpers/fixtures'

describe('createDateCandidateStore', () => {
  it('starts from the shipped baseline by default', () => {
    const store = createDateCandidateStore()
    expect(store.snapshot()).toEqual(BASELINE_DATES)
    expect(store.size()).toBe(34)
  })

  it('seeds from a custom baseline plus extra dates', () => {
    const store = createDateCandidateStore({
      baseline: dates('20230301', '20220110'),
      extraDates: dates('20250101', '20230301'),
    })
    expect(store.snapshot()).toEqual(['20250101', '20230301', '20220110'])
  })

  it('accepts an empty baseline', () => {
    const store = createDateCandidateStore({ baseline: [] })
    expect(store.snapshot()).toEqual([])
    expect(store.size()).toBe(0)
  })
})

describe('merge', () => {
  it('adds unknown dates and reports how many were new', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301') })
    expect(store.merge(dates('20250101', '20230301', '20250101'))).toBe(1)
    expect(store.snapshot()).toEqual(['20250101', '20230301'])
    expect(store.has(date('20250101'))).toBe(true)
  })

  it('returns 0 and keeps the same snapshot when nothing is new', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301') })
    const before = store.snapshot()
    expect(store.merge(dates('20230301'))).toBe(0)
    expect(store.snapshot()).toBe(before)
  })

  it('never removes dates', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301', '20220110') })
    store.merge([])
    store.merge(dates('20240206'))
    expect(store.snapshot()).toEqual(['20240206', '20230301', '20220110'])
  })

  it('leaves earlier snapshots untouched', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301') })
    const before = store.snapshot()
    store.merge(dates('20250101'))
    expect(before).toEqual(['20230301'])
    expect(Object.isFrozen(before)).toBe(true)
    expect(store.snapshot()).not.toBe(before)
  })
})

describe('fingerprint', () => {
  it('is an 8-character hex digest of the snapshot', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301', '20220110') })
    expect(store.fingerprint()).toMatch(/^[0-9a-f]{8}$/)
    expect(store.fingerprint()).toBe(fingerprintDates(dates('20230301', '20220110')))
  })

  it('changes when a date is added', () => {
    const store = createDateCandidateStore({ baseline: dates('20230301') })
    const before = store.fingerprint()
    store.merge(dates('20250101'))
    expect(store.fingerprint()).not.toBe(before)
    expect(store.fingerprint()).toBe(fingerprintDates(dates('20250101', '20230301')))
  })
})
