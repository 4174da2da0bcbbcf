/**
 * Segment 08: Concurrency Limiter Tests
 */

import { describe, it, expect } from 'vitest'
import { ValidationError } from '../src/errors'
import { createLimiter } from '../src/limiter'
import { deferred, flushPromises } from './helpers/fake-cdn'

describe('createLimiter', () => {
  it.each([0, -1, 1.5, NaN])('rejects limit %s', limit => {
    expect(() => createLimiter(limit)).toThrow(ValidationError)
  })

  it('runs up to the limit at once and queues the rest', async () => {
    const limiter = createLimiter(2)
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()]
    const runs = gates.map(g => limiter.run(() => g.promise))

    await flushPromises()
    expect(limiter.active).toBe(2)
    expect(limiter.pending).toBe(1)

    gates[0]?.resolve(0)
    await flushPromises()
    expect(limiter.active).toBe(2)
    expect(limiter.pending).toBe(0)

    gates[1]?.resolve(1)
    gates[2]?.resolve(2)
    expect(await Promise.all(runs)).toEqual([0, 1, 2])
    expect(limiter.active).toBe(0)
  })

  it('serves waiters in arrival order', async () => {
    const limiter = createLimiter(1)
    const order: number[] = []
    const gate = deferred<void>()
    const first = limiter.run(() => gate.promise)
    const rest = [1, 2, 3].map(n => limiter.run(async () => { order.push(n) }))

    gate.resolve()
    await Promise.all([first, ...rest])
    expect(order).toEqual([1, 2, 3])
  })

  it('releases the slot when the task rejects', async () => {
    const limiter = createLimiter(1)
    await expect(limiter.run(async () => { throw new Error('boom') })).rejects.toThrow('boom')
    expect(limiter.active).toBe(0)
    expect(await limiter.run(async () => 'next')).toBe('next')
  })

  it('removes an aborted waiter without running it', async () => {
    const limiter = createLimiter(1)
    const gate = deferred<void>()
    const holder = limiter.run(() => gate.promise)
    const controller = new AbortController()
    let ran = false
    const waiter = limiter.run(async () => { ran = true }, controller.signal)

    await flushPromises()
    expect(limiter.pending).toBe(1)
    controller.abort(new Error('cancelled'))
    await expect(waiter).rejects.toThrow('cancelled')
    expect(limiter.pending).toBe(0)

    gate.resolve()
    await holder
    expect(ran).toBe(false)
    expect(limiter.active).toBe(0)
  })

  it('rejects immediately when the signal is already aborted', async () => {
    const limiter = createLimiter(1)
    const controller = new AbortController()
    controller.abort(new Error('early'))
    await expect(limiter.run(async () => 1, controller.signal)).rejects.toThrow('early')
    expect(limiter.active).toBe(0)
  })

  it('never exceeds the limit under load', async () => {
    const limiter = createLimiter(3)
    let running = 0
    let peak = 0
    await Promise.all(Array.from({ length: 25 }, async (_, i) =>
      limiter.run(async () => {
        running++
        peak = Math.max(peak, running)
        await new Promise<void>(resolve => setTimeout(resolve, i % 3))
        running--
      }),
    ))
    expect(peak).toBe(3)
  })
})
