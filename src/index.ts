/**
 * emoji-kitchen-resolver
 *
 * Public API exports
 */

// Error system
export {
  ResolverError, ResolverErrorCode,
  ParseError, ValidationError,
  CdnUnavailableError, RateLimitedError, RemoteFetchError,
  CacheCorruptionError, InvalidDataError,
} from './errors'
export type { ResolverErrorCode as ResolverErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Candidate dates
export type { CandidateDate } from './candidate-date'
export {
  parseCandidateDate, parseCandidateDates, parseExtraDates,
  compareNewestFirst, sortNewestFirst, BASELINE_DATES,
} from './candidate-date'
export type { DateCandidateStore, DateCandidateStoreOptions } from './date-candidate-store'
export { createDateCandidateStore, fingerprintDates } from './date-candidate-store'
export type { RemoteDateUpdater, RemoteDateUpdaterOptions, RefreshOutcome } from './remote-date-updater'
export { createRemoteDateUpdater } from './remote-date-updater'

// Emoji pairs & URLs
export type { Codepoint, PairKey, PairOrder, EmojiPair } from './emoji-pair'
export {
  emojiToCodepoint, parseCodepoint, codepointToUrlSegment,
  makeEmojiPair, emojiPairFromText, pairKeyOf,
} from './emoji-pair'
export type { ProbeUrlBuilder, UrlBuilderConfig } from './url-builder'
export { buildImageUrl, buildProbeUrls, buildMetadataUrl, createProbeUrlBuilder } from './url-builder'

// Configuration
export type { ResolverConfig, RawResolverConfig } from './config'
export { parseResolverConfig, resolveCdnBase, resolveGithubProxy, CONFIG_DEFAULTS } from './config'

// Adapters (persistence interface + in-memory mock + backends)
export type { Adapter, StoredImage, StoredMetadata } from './adapter'
export { createMockAdapter } from './adapter'
export type { FileAdapter } from './file-adapter'
export { createFileAdapter } from './file-adapter'

// Cache store
export type { CacheStore, CacheStoreOptions, CacheEntry, FoundEntry, NotFoundEntry } from './cache-store'
export { createCacheStore, isFullCoverage } from './cache-store'

// Probing
export type { Limiter } from './limiter'
export { createLimiter } from './limiter'
export type { CdnClient, ProbeResponse } from './cdn-client'
export { createCdnClient } from './cdn-client'
export type { Prober, ProberOptions, ProbeOutcome, DateHintSource } from './prober'
export { createProber } from './prober'
export type { MetadataIndex, MetadataIndexOptions } from './metadata-index'
export { createMetadataIndex } from './metadata-index'

// High-level API (wraps all modules into one resolver object)
export type {
  Resolver, ResolverOptions, ResolveResult,
  ResolverEvents, ResolverEventName,
} from './resolver'
export { createResolver } from './resolver'
export type { Logger } from './internal/helpers'
