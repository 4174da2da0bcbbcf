/**
 * Concurrency Limiter
 *
 * Counting semaphore shared by every resolution in a resolver, capping the
 * number of simultaneous CDN requests. Waiters are served FIFO; a waiter whose
 * signal aborts leaves the queue without ever taking a slot.
 */

import { ValidationError } from './errors'

export type Limiter = {
  /** Run `fn` once a slot is free; the slot is released when it settles */
  run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T>
  readonly limit: number
  /** Slots currently held */
  readonly active: number
  /** Callers waiting for a slot */
  readonly pending: number
}

type Waiter = {
  grant: () => void
}

export function createLimiter(limit: number): Limiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Concurrency limit must be a positive integer, got ${limit}`)
  }

  let active = 0
  const queue: Waiter[] = []

  function acquire(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason)
        return
      }
      if (active < limit) {
        active++
        resolve()
        return
      }

      const onAbort = () => {
        const idx = queue.indexOf(waiter)
        if (idx !== -1) queue.splice(idx, 1)
        reject(signal?.reason)
      }
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort)
          active++
          resolve()
        },
      }
      queue.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  function release(): void {
    active--
    const next = queue.shift()
    if (next) next.grant()
  }

  return {
    async run(fn, signal) {
      await acquire(signal)
      try {
        return await fn()
      } finally {
        release()
      }
    },

    limit,

    get active() {
      return active
    },

    get pending() {
      return queue.length
    },
  }
}
