/**
 * Adapter
 *
 * Storage-oriented persistence interface + in-memory mock implementation.
 * Adapters move bytes and text; the schema of markers, date lists and metadata
 * documents belongs to the domain modules that read them, so corruption is
 * detected in one place regardless of backend.
 */

import { InvalidDataError } from './errors'

export { InvalidDataError }

// ============================================================================
// Entity Types
// ============================================================================

export type StoredImage = {
  image: Uint8Array
  /** Generation date the image was found under; null when unknown */
  sourceDate: string | null
}

export type StoredMetadata = {
  text: string
  /** Epoch milliseconds */
  fetchedAt: number
}

// ============================================================================
// Adapter Interface
// ============================================================================

/**
 * Every write replaces the previous value atomically: a concurrent reader sees
 * the old complete value or the new complete value, never a mix.
 */
export interface Adapter {
  // Found images
  getImage(key: string): Promise<StoredImage | null>
  putImage(key: string, image: Uint8Array, sourceDate: string | null): Promise<void>
  deleteImage(key: string): Promise<void>

  // Not-found markers (serialized JSON)
  getMarker(key: string): Promise<string | null>
  putMarker(key: string, text: string): Promise<void>
  deleteMarker(key: string): Promise<void>

  // Remote candidate-date list (serialized JSON)
  loadDates(): Promise<string | null>
  saveDates(text: string): Promise<void>

  // Per-emoji metadata documents
  getMetadata(codepoint: string): Promise<StoredMetadata | null>
  putMetadata(codepoint: string, text: string, fetchedAt: number): Promise<void>
  listMetadata(): Promise<string[]>

  // Lifecycle: released by Resolver.close()
  close?(): Promise<void>
}

// ============================================================================
// Key Validation
// ============================================================================

const STORAGE_KEY_RE = /^[0-9a-z][0-9a-z_-]*$/

/** Keys become file names and primary keys; restrict them to a safe alphabet */
export function assertStorageKey(key: string): void {
  if (!STORAGE_KEY_RE.test(key)) {
    throw new InvalidDataError(`Invalid storage key: '${key}'`)
  }
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state: {
    images: Map<string, StoredImage>
    markers: Map<string, string>
    dates: string | null
    metadata: Map<string, StoredMetadata>
  } = {
    images: new Map(),
    markers: new Map(),
    dates: null,
    metadata: new Map(),
  }

  // ---- Helpers ----
  function copyImage(stored: StoredImage): StoredImage {
    return { image: stored.image.slice(), sourceDate: stored.sourceDate }
  }

  return {
    // ================================================================
    // Images
    // ================================================================
    async getImage(key) {
      const stored = state.images.get(key)
      return stored ? copyImage(stored) : null
    },

    async putImage(key, image, sourceDate) {
      assertStorageKey(key)
      state.images.set(key, copyImage({ image, sourceDate }))
    },

    async deleteImage(key) {
      state.images.delete(key)
    },

    // ================================================================
    // Markers
    // ================================================================
    async getMarker(key) {
      return state.markers.get(key) ?? null
    },

    async putMarker(key, text) {
      assertStorageKey(key)
      state.markers.set(key, text)
    },

    async deleteMarker(key) {
      state.markers.delete(key)
    },

    // ================================================================
    // Dates
    // ================================================================
    async loadDates() {
      return state.dates
    },

    async saveDates(text) {
      state.dates = text
    },

    // ================================================================
    // Metadata
    // ================================================================
    async getMetadata(codepoint) {
      const stored = state.metadata.get(codepoint)
      return stored ? { ...stored } : null
    },

    async putMetadata(codepoint, text, fetchedAt) {
      assertStorageKey(codepoint)
      state.metadata.set(codepoint, { text, fetchedAt })
    },

    async listMetadata() {
      return [...state.metadata.keys()].sort()
    },
  }
}
