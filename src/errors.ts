/**
 * Consolidated error system for the resolver.
 *
 * All error classes extend ResolverError, which carries a typed error code.
 * A pair with no composite image is a result, not an error, and has no class here.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ResolverErrorCode = {
  // Parsing & configuration
  PARSE_ERROR: 'PARSE_ERROR',
  VALIDATION: 'VALIDATION',

  // Network
  CDN_UNAVAILABLE: 'CDN_UNAVAILABLE',
  RATE_LIMITED: 'RATE_LIMITED',
  REMOTE_FETCH: 'REMOTE_FETCH',

  // Adapter layer
  CACHE_CORRUPTION: 'CACHE_CORRUPTION',
  INVALID_DATA: 'INVALID_DATA',
} as const

export type ResolverErrorCode = (typeof ResolverErrorCode)[keyof typeof ResolverErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ResolverError extends Error {
  readonly code: ResolverErrorCode

  constructor(code: ResolverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResolverError'
    this.code = code
  }
}

// ============================================================================
// Parsing & Configuration Errors
// ============================================================================

export class ParseError extends ResolverError {
  constructor(message: string) {
    super(ResolverErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class ValidationError extends ResolverError {
  constructor(message: string) {
    super(ResolverErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Network Errors
// ============================================================================

/** Every probe in a resolution call failed without a definitive answer */
export class CdnUnavailableError extends ResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ResolverErrorCode.CDN_UNAVAILABLE, message, options)
    this.name = 'CdnUnavailableError'
  }
}

/** The CDN answered 429; probing for the call stops immediately */
export class RateLimitedError extends ResolverError {
  readonly url: string

  constructor(url: string) {
    super(ResolverErrorCode.RATE_LIMITED, `CDN rate limited request: ${url}`)
    this.name = 'RateLimitedError'
    this.url = url
  }
}

export class RemoteFetchError extends ResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ResolverErrorCode.REMOTE_FETCH, message, options)
    this.name = 'RemoteFetchError'
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class CacheCorruptionError extends ResolverError {
  readonly key: string

  constructor(key: string, message: string) {
    super(ResolverErrorCode.CACHE_CORRUPTION, message)
    this.name = 'CacheCorruptionError'
    this.key = key
  }
}

export class InvalidDataError extends ResolverError {
  constructor(message: string) {
    super(ResolverErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}
