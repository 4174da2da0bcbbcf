/**
 * Shared test fixtures: candidate dates, pairs and temp directories.
 */
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { type CandidateDate, parseCandidateDate } from '../../src/candidate-date'
import { type EmojiPair, type PairKey, makeEmojiPair, pairKeyOf } from '../../src/emoji-pair'

export function date(str: string): CandidateDate {
  const parsed = parseCandidateDate(str)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export function dates(...strs: string[]): CandidateDate[] {
  return strs.map(date)
}

export function pair(first: string, second: string): EmojiPair {
  return makeEmojiPair(first, second)
}

export function key(first: string, second: string): PairKey {
  return pairKeyOf(pair(first, second), 'commutative')
}

export async function makeTempDir(): Promise<{ path: string; cleanup(): Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'ek-resolver-'))
  return {
    path,
    cleanup: () => rm(path, { recursive: true, force: true }),
  }
}
