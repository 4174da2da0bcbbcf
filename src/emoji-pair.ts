/**
 * Emoji Pairs
 *
 * Codepoint conversion and the cache key derived from a pair.
 */

import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

declare const __codepoint: unique symbol
declare const __pairKey: unique symbol

/** Lowercase hex codepoints of one emoji joined by '-', e.g. '2764-fe0f' */
export type Codepoint = string & { readonly [__codepoint]: true }

/** Stable cache address of a pair */
export type PairKey = string & { readonly [__pairKey]: true }

/**
 * 'commutative': (A,B) and (B,A) share one key and both URL directions are probed.
 * 'ordered': the pair keeps its order and only the A→B URL is probed.
 */
export type PairOrder = 'commutative' | 'ordered'

export type EmojiPair = Readonly<{
  first: Codepoint
  second: Codepoint
}>

// ============================================================================
// Codepoints
// ============================================================================

const CODEPOINT_RE = /^[0-9a-f]{1,6}(?:-[0-9a-f]{1,6})*$/

export function isCodepoint(value: string): value is Codepoint {
  return CODEPOINT_RE.test(value)
}

/** '😀' → '1f600', '❤️' → '2764-fe0f' */
export function emojiToCodepoint(emoji: string): Codepoint {
  if (emoji.length === 0) throw new ValidationError('Emoji must not be empty')
  const parts: string[] = []
  for (const ch of emoji) {
    const cp = ch.codePointAt(0)
    if (cp !== undefined) parts.push(cp.toString(16))
  }
  return parseCodepoint(parts.join('-'))
}

/** Accepts either case; returns the canonical lowercase form */
export function parseCodepoint(value: string): Codepoint {
  const lower = value.trim().toLowerCase()
  if (!isCodepoint(lower)) throw new ValidationError(`Invalid codepoint: '${value}'`)
  return lower
}

/** '2764-fe0f' → 'u2764-ufe0f' */
export function codepointToUrlSegment(cp: Codepoint): string {
  return cp.split('-').map(part => `u${part}`).join('-')
}

// ============================================================================
// Pairs
// ============================================================================

export function makeEmojiPair(first: string, second: string): EmojiPair {
  return Object.freeze({ first: parseCodepoint(first), second: parseCodepoint(second) })
}

export function emojiPairFromText(first: string, second: string): EmojiPair {
  return Object.freeze({ first: emojiToCodepoint(first), second: emojiToCodepoint(second) })
}

export function pairKeyOf(pair: EmojiPair, order: PairOrder): PairKey {
  if (order === 'ordered') return `${pair.first}_${pair.second}` as PairKey
  return (pair.first <= pair.second
    ? `${pair.first}_${pair.second}`
    : `${pair.second}_${pair.first}`) as PairKey
}
