/**
 * Segment 15: Error System Tests
 */

import { describe, it, expect } from 'vitest'
import {
  CacheCorruptionError,
  CdnUnavailableError,
  InvalidDataError,
  ParseError,
  RateLimitedError,
  RemoteFetchError,
  ResolverError,
  ResolverErrorCode,
  ValidationError,
} from '../src/errors'
import * as api from '../src/index'

describe('Error classes', () => {
  it.each([
    [new ParseError('p'), 'ParseError', ResolverErrorCode.PARSE_ERROR],
    [new ValidationError('v'), 'ValidationError', ResolverErrorCode.VALIDATION],
    [new CdnUnavailableError('c'), 'CdnUnavailableError', ResolverErrorCode.CDN_UNAVAILABLE],
    [new RateLimitedError('https://cdn.test/x.png'), 'RateLimitedError', ResolverErrorCode.RATE_LIMITED],
    [new RemoteFetchError('r'), 'RemoteFetchError', ResolverErrorCode.REMOTE_FETCH],
    [new CacheCorruptionError('k', 'm'), 'CacheCorruptionError', ResolverErrorCode.CACHE_CORRUPTION],
    [new InvalidDataError('i'), 'InvalidDataError', ResolverErrorCode.INVALID_DATA],
  ])('%s carries its name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(ResolverError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })

  it('keeps the rate-limited URL in the message', () => {
    const error = new RateLimitedError('https://cdn.test/x.png')
    expect(error.url).toBe('https://cdn.test/x.png')
    expect(error.message).toBe('CDN rate limited request: https://cdn.test/x.png')
  })

  it('records the corrupted key', () => {
    expect(new CacheCorruptionError('1f600_1f601', 'bad').key).toBe('1f600_1f601')
  })

  it('chains a cause', () => {
    const cause = new TypeError('fetch failed')
    expect(new RemoteFetchError('wrapped', { cause }).cause).toBe(cause)
  })
})

describe('Public exports', () => {
  it('exposes the same error classes', () => {
    expect(api.ResolverError).toBe(ResolverError)
    expect(api.RateLimitedError).toBe(RateLimitedError)
  })

  it('exposes the resolver factory and adapters', () => {
    expect(typeof api.createResolver).toBe('function')
    expect(typeof api.createMockAdapter).toBe('function')
    expect(typeof api.createFileAdapter).toBe('function')
  })
})
