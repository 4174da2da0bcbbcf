/**
 * Internal Helpers
 *
 * Pure utility functions shared across internal modules.
 */

// ============================================================================
// Logging
// ============================================================================

/** Subset of `console` the library logs through */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

// ============================================================================
// Image Validation
// ============================================================================

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47] as const

/** True when the bytes start with the PNG signature */
export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_MAGIC.length) return false
  return PNG_MAGIC.every((b, i) => bytes[i] === b)
}

// ============================================================================
// Errors
// ============================================================================

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError')
}

// ============================================================================
// Bounded Map
// ============================================================================

export type LruMap<K, V> = {
  get(key: K): V | undefined
  set(key: K, value: V): void
  delete(key: K): boolean
  readonly size: number
}

/**
 * Map that evicts its least recently touched entry once `capacity` is reached.
 * `get` counts as a touch.
 */
export function createLruMap<K, V>(capacity: number): LruMap<K, V> {
  const entries = new Map<K, V>()

  return {
    get(key) {
      const value = entries.get(key)
      if (value !== undefined) {
        entries.delete(key)
        entries.set(key, value)
      }
      return value
    },

    set(key, value) {
      entries.delete(key)
      if (entries.size >= capacity) {
        const oldest = entries.keys().next()
        if (!oldest.done) entries.delete(oldest.value)
      }
      entries.set(key, value)
    },

    delete(key) {
      return entries.delete(key)
    },

    get size() {
      return entries.size
    },
  }
}
