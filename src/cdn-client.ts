/**
 * CDN Client
 *
 * One HTTP GET per call, with its own timeout, classified into the outcomes
 * the prober cares about. Never throws for HTTP or network failures.
 */

import { CdnUnavailableError, RateLimitedError } from './errors'
import { type Logger, errorMessage, isAbortError, isPng } from './internal/helpers'

export type ProbeResponse =
  | { type: 'image'; image: Uint8Array }
  /** 404: the image definitely does not exist at this URL */
  | { type: 'missing' }
  /** 429: stop probing for this call */
  | { type: 'rateLimited'; error: RateLimitedError }
  /** Timeout, network failure, unexpected status or non-PNG body */
  | { type: 'error'; error: CdnUnavailableError }
  /** The caller's signal fired first; the response is irrelevant */
  | { type: 'aborted' }

export type CdnClientOptions = {
  fetch?: typeof fetch
  timeoutMs: number
  logger?: Logger
}

export type CdnClient = {
  fetchImage(url: string, signal?: AbortSignal): Promise<ProbeResponse>
}

export function createCdnClient(options: CdnClientOptions): CdnClient {
  const doFetch = options.fetch ?? fetch
  const logger = options.logger ?? console
  const { timeoutMs } = options

  async function discardBody(res: Response): Promise<void> {
    try {
      await res.body?.cancel()
    } catch (e) {
      logger.debug(`Failed to discard response body: ${errorMessage(e)}`)
    }
  }

  function failure(url: string, message: string, cause?: unknown): ProbeResponse {
    logger.warn(`CDN probe failed (${message}): ${url}`)
    return { type: 'error', error: new CdnUnavailableError(`${message}: ${url}`, { cause }) }
  }

  return {
    async fetchImage(url, signal) {
      if (signal?.aborted) return { type: 'aborted' }

      const controller = new AbortController()
      const onAbort = () => controller.abort(signal?.reason)
      signal?.addEventListener('abort', onAbort, { once: true })
      const timer = setTimeout(() => controller.abort(), timeoutMs)

      try {
        const res = await doFetch(url, { signal: controller.signal })
        if (res.status === 404) {
          await discardBody(res)
          return { type: 'missing' }
        }
        if (res.status === 429) {
          await discardBody(res)
          logger.warn(`CDN rate limited: ${url}`)
          return { type: 'rateLimited', error: new RateLimitedError(url) }
        }
        if (res.status !== 200) {
          await discardBody(res)
          return failure(url, `HTTP ${res.status}`)
        }

        const image = new Uint8Array(await res.arrayBuffer())
        if (!isPng(image)) return failure(url, 'response is not a PNG')
        return { type: 'image', image }
      } catch (e) {
        if (signal?.aborted) return { type: 'aborted' }
        if (isAbortError(e)) return failure(url, `timed out after ${timeoutMs}ms`, e)
        return failure(url, errorMessage(e), e)
      } finally {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }
    },
  }
}
