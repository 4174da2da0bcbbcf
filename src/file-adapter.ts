/**
 * File Adapter
 *
 * Production implementation of the adapter on the local file system.
 *
 * Layout under the root directory:
 *   images/{key}.png       raw image bytes
 *   images/{key}.json      { sourceDate }
 *   notfound/{key}.json    not-found marker
 *   metadata/{cp}.json     upstream metadata document (mtime = fetch time)
 *   dates.json             remote candidate-date list
 *
 * Every write lands in a uniquely named temp file in the target directory and
 * is then renamed over the destination.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, readFile, readdir, rename, stat, unlink, utimes, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { type Adapter, assertStorageKey } from './adapter'

export type FileAdapter = Adapter & {
  readonly root: string
}

// ============================================================================
// Helpers
// ============================================================================

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e
}

function isMissing(e: unknown): boolean {
  return isErrnoException(e) && e.code === 'ENOENT'
}

async function readOrNull(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path)
  } catch (e) {
    if (isMissing(e)) return null
    throw e
  }
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (e) {
    if (!isMissing(e)) throw e
  }
}

/**
 * Write through a temp file and rename over `path`. Temp names are unique per
 * call, so concurrent writers to the same path never share a temp file.
 */
export async function writeFileAtomic(
  path: string,
  data: Uint8Array | string,
  options: { mtimeMs?: number } = {},
): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`)
  try {
    await writeFile(tmp, data)
    if (options.mtimeMs !== undefined) {
      const seconds = options.mtimeMs / 1000
      await utimes(tmp, seconds, seconds)
    }
    await rename(tmp, path)
  } catch (e) {
    await removeIfPresent(tmp)
    throw e
  }
}

function parseSourceDate(raw: Buffer | null): string | null {
  if (raw === null) return null
  try {
    const parsed: unknown = JSON.parse(raw.toString('utf8'))
    if (typeof parsed === 'object' && parsed !== null && 'sourceDate' in parsed) {
      return typeof parsed.sourceDate === 'string' ? parsed.sourceDate : null
    }
    return null
  } catch {
    // An unreadable sidecar only loses the source date, not the image
    return null
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createFileAdapter(root: string): Promise<FileAdapter> {
  const dirs = {
    images: join(root, 'images'),
    notfound: join(root, 'notfound'),
    metadata: join(root, 'metadata'),
  }
  for (const dir of Object.values(dirs)) {
    await mkdir(dir, { recursive: true })
  }
  const datesPath = join(root, 'dates.json')

  function imagePath(key: string): string {
    assertStorageKey(key)
    return join(dirs.images, `${key}.png`)
  }

  function imageMetaPath(key: string): string {
    assertStorageKey(key)
    return join(dirs.images, `${key}.json`)
  }

  function markerPath(key: string): string {
    assertStorageKey(key)
    return join(dirs.notfound, `${key}.json`)
  }

  function metadataPath(codepoint: string): string {
    assertStorageKey(codepoint)
    return join(dirs.metadata, `${codepoint}.json`)
  }

  return {
    root,

    // ================================================================
    // Images
    // ================================================================
    async getImage(key) {
      const image = await readOrNull(imagePath(key))
      if (image === null) return null
      const sourceDate = parseSourceDate(await readOrNull(imageMetaPath(key)))
      return { image: new Uint8Array(image), sourceDate }
    },

    async putImage(key, image, sourceDate) {
      // Sidecar first: a reader that sees the new image also sees its date
      await writeFileAtomic(imageMetaPath(key), JSON.stringify({ sourceDate }))
      await writeFileAtomic(imagePath(key), image)
    },

    async deleteImage(key) {
      await removeIfPresent(imagePath(key))
      await removeIfPresent(imageMetaPath(key))
    },

    // ================================================================
    // Markers
    // ================================================================
    async getMarker(key) {
      const raw = await readOrNull(markerPath(key))
      return raw === null ? null : raw.toString('utf8')
    },

    async putMarker(key, text) {
      await writeFileAtomic(markerPath(key), text)
    },

    async deleteMarker(key) {
      await removeIfPresent(markerPath(key))
    },

    // ================================================================
    // Dates
    // ================================================================
    async loadDates() {
      const raw = await readOrNull(datesPath)
      return raw === null ? null : raw.toString('utf8')
    },

    async saveDates(text) {
      await writeFileAtomic(datesPath, text)
    },

    // ================================================================
    // Metadata
    // ================================================================
    async getMetadata(codepoint) {
      const path = metadataPath(codepoint)
      try {
        const [raw, info] = await Promise.all([readFile(path), stat(path)])
        return { text: raw.toString('utf8'), fetchedAt: info.mtimeMs }
      } catch (e) {
        if (isMissing(e)) return null
        throw e
      }
    },

    async putMetadata(codepoint, text, fetchedAt) {
      await writeFileAtomic(metadataPath(codepoint), text, { mtimeMs: fetchedAt })
    },

    async listMetadata() {
      const names = await readdir(dirs.metadata)
      return names
        .filter(name => name.endsWith('.json') && !name.startsWith('.'))
        .map(name => name.slice(0, -'.json'.length))
        .sort()
    },
  }
}
