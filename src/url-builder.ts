/**
 * URL Builder
 *
 * Pure URL templating for the CDN and the upstream metadata repository.
 */

import type { CandidateDate } from './candidate-date'
import { type Codepoint, type EmojiPair, type PairOrder, codepointToUrlSegment } from './emoji-pair'

export const METADATA_RAW_BASE =
  'https://raw.githubusercontent.com/xsalazar/emoji-kitchen-backend/main/emoji/data'

/** Document whose combinations list every published generation date */
export const DATE_LIST_CODEPOINT = '1f600' as Codepoint

export type UrlBuilderConfig = {
  cdnBase: string
  githubProxy: string
  pairOrder: PairOrder
}

/** Builds every URL that may hold the image for a pair on one date */
export type ProbeUrlBuilder = (pair: EmojiPair, date: CandidateDate) => string[]

export function buildImageUrl(cdnBase: string, date: CandidateDate, left: Codepoint, right: Codepoint): string {
  const l = codepointToUrlSegment(left)
  const r = codepointToUrlSegment(right)
  return `${cdnBase}/android/keyboard/emojikitchen/${date}/${l}/${l}_${r}.png`
}

export function buildProbeUrls(config: UrlBuilderConfig, pair: EmojiPair, date: CandidateDate): string[] {
  const forward = buildImageUrl(config.cdnBase, date, pair.first, pair.second)
  if (config.pairOrder === 'ordered' || pair.first === pair.second) return [forward]
  return [forward, buildImageUrl(config.cdnBase, date, pair.second, pair.first)]
}

export function createProbeUrlBuilder(config: UrlBuilderConfig): ProbeUrlBuilder {
  return (pair, date) => buildProbeUrls(config, pair, date)
}

export function buildMetadataUrl(githubProxy: string, cp: Codepoint): string {
  const raw = `${METADATA_RAW_BASE}/${cp}.json`
  return githubProxy ? `${githubProxy}/${raw}` : raw
}
