/**
 * Candidate Dates
 *
 * A candidate date names one generation batch on the CDN and is used verbatim
 * as a URL path segment. Stored as the compact YYYYMMDD form, so lexicographic
 * order equals chronological order.
 */

import { Result, Ok, Err } from './result'
import baselineDates from './data/baseline-dates.json'

// ============================================================================
// Branded Type
// ============================================================================

declare const __candidateDate: unique symbol

/** Compact calendar date string: YYYYMMDD */
export type CandidateDate = string & { readonly [__candidateDate]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Calendar Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

// ============================================================================
// Parsing
// ============================================================================

export function parseCandidateDate(str: string): Result<CandidateDate, ParseError> {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid candidate date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in candidate date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in candidate date: '${str}'`))

  return Ok(str as CandidateDate)
}

/**
 * Parse every string that is a valid candidate date and drop the rest.
 * Surrounding whitespace is trimmed; non-string entries are skipped.
 */
export function parseCandidateDates(values: Iterable<unknown>): CandidateDate[] {
  const out: CandidateDate[] = []
  for (const value of values) {
    if (typeof value !== 'string') continue
    const parsed = parseCandidateDate(value.trim())
    if (parsed.ok) out.push(parsed.value)
  }
  return out
}

/** Parse the newline-separated `extra_dates` configuration field */
export function parseExtraDates(text: string): CandidateDate[] {
  return parseCandidateDates(text.split(/\r?\n/))
}

// ============================================================================
// Ordering
// ============================================================================

/** Comparator that sorts newest first */
export function compareNewestFirst(a: CandidateDate, b: CandidateDate): number {
  if (a === b) return 0
  return a > b ? -1 : 1
}

export function sortNewestFirst(dates: Iterable<CandidateDate>): CandidateDate[] {
  return [...new Set(dates)].sort(compareNewestFirst)
}

// ============================================================================
// Baseline
// ============================================================================

/** Generation dates known when this package was built, newest first */
export const BASELINE_DATES: readonly CandidateDate[] = Object.freeze(
  sortNewestFirst(parseCandidateDates(baselineDates)),
)
