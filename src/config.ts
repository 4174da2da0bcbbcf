/**
 * Configuration
 *
 * Validates the plugin-style snake_case settings record and resolves it into
 * the camelCase ResolverConfig the rest of the library consumes. Malformed
 * numeric values fall back to their defaults instead of failing startup.
 */

import { z } from 'zod'
import { type CandidateDate, parseExtraDates } from './candidate-date'
import type { PairOrder } from './emoji-pair'
import { ValidationError } from './errors'

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CDN_BASE = 'https://www.gstatic.cn'
export const DEFAULT_GITHUB_PROXY = 'https://ghfast.top'

export const CONFIG_DEFAULTS = {
  notfoundExpireDays: 7,
  requestTimeoutSeconds: 10,
  maxProbeDates: 10,
  concurrencyLimit: 4,
  dateRefreshHours: 24,
  metadataMaxAgeDays: 7,
} as const

const CDN_PRESETS: ReadonlyArray<readonly [string, string]> = [
  ['www.gstatic.cn', 'https://www.gstatic.cn'],
  ['www.gstatic.com', 'https://www.gstatic.com'],
]

const PROXY_PRESETS: ReadonlyArray<readonly [string, string]> = [
  ['ghfast.top', 'https://ghfast.top'],
  ['gh-proxy.com', 'https://gh-proxy.com'],
]

// ============================================================================
// Types
// ============================================================================

export type ResolverConfig = {
  /** CDN origin without trailing slash */
  cdnBase: string
  /** GitHub proxy origin, or '' to fetch raw.githubusercontent.com directly */
  githubProxy: string
  extraDates: CandidateDate[]
  notfoundExpireDays: number
  requestTimeoutMs: number
  maxProbeDates: number
  concurrencyLimit: number
  dateRefreshIntervalMs: number
  metadataMaxAgeDays: number
  pairOrder: PairOrder
}

// ============================================================================
// Schema
// ============================================================================

const text = z.unknown().transform(v => (v == null ? '' : String(v)))

function int(fallback: number, min: number) {
  return z.unknown().transform(v => {
    const n = typeof v === 'number' ? v
      : typeof v === 'string' && v.trim() !== '' ? Number(v)
        : NaN
    return Number.isInteger(n) && n >= min ? n : fallback
  })
}

export const rawConfigSchema = z.object({
  cdn_source: text,
  cdn_url: text,
  github_proxy_source: text,
  github_proxy: text,
  extra_dates: text,
  notfound_expire_days: int(CONFIG_DEFAULTS.notfoundExpireDays, 0),
  request_timeout: int(CONFIG_DEFAULTS.requestTimeoutSeconds, 1),
  max_probe_dates: int(CONFIG_DEFAULTS.maxProbeDates, 1),
  concurrency_limit: int(CONFIG_DEFAULTS.concurrencyLimit, 1),
  date_refresh_hours: int(CONFIG_DEFAULTS.dateRefreshHours, 1),
  metadata_max_age_days: int(CONFIG_DEFAULTS.metadataMaxAgeDays, 0),
  pair_order: z.enum(['commutative', 'ordered']).catch('commutative'),
})

export type RawResolverConfig = z.input<typeof rawConfigSchema>

// ============================================================================
// URL Resolution
// ============================================================================

function trimOrigin(url: string): string {
  return url.trim().replace(/\/+$/, '')
}

/** Preset source wins; 'custom' uses cdn_url; an empty source honours a legacy cdn_url */
export function resolveCdnBase(source: string, customUrl: string): string {
  for (const [prefix, origin] of CDN_PRESETS) {
    if (source.startsWith(prefix)) return origin
  }
  if (source === 'custom' || source === '') {
    const custom = trimOrigin(customUrl)
    if (custom) return custom
  }
  return DEFAULT_CDN_BASE
}

/** Returns '' for a direct connection */
export function resolveGithubProxy(source: string, customProxy: string): string {
  for (const [prefix, origin] of PROXY_PRESETS) {
    if (source.startsWith(prefix)) return origin
  }
  if (source === 'direct') return ''
  if (source === 'custom' || source === '') {
    const custom = trimOrigin(customProxy)
    if (custom) return custom
  }
  return DEFAULT_GITHUB_PROXY
}

// ============================================================================
// Parsing
// ============================================================================

export function parseResolverConfig(raw: unknown = {}): ResolverConfig {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError('Resolver configuration must be an object')
  }
  const result = rawConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ValidationError(`Invalid resolver configuration: ${result.error.message}`)
  }
  const c = result.data

  return {
    cdnBase: resolveCdnBase(c.cdn_source, c.cdn_url),
    githubProxy: resolveGithubProxy(c.github_proxy_source, c.github_proxy),
    extraDates: parseExtraDates(c.extra_dates),
    notfoundExpireDays: c.notfound_expire_days,
    requestTimeoutMs: c.request_timeout * 1000,
    maxProbeDates: c.max_probe_dates,
    concurrencyLimit: c.concurrency_limit,
    dateRefreshIntervalMs: c.date_refresh_hours * 3_600_000,
    metadataMaxAgeDays: c.metadata_max_age_days,
    pairOrder: c.pair_order,
  }
}
