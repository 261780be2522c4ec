/**
 * Tests for the delivery queue.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { DeliveryQueue } from '../../src/lib/queue.js'

describe('DeliveryQueue', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should pop items in push order', async () => {
    const queue = new DeliveryQueue<number>()
    queue.push(1)
    queue.push(2)
    queue.push(3)

    expect(queue.size).toBe(3)
    expect(await queue.pop()).toBe(1)
    expect(queue.tryPop()).toBe(2)
    expect(await queue.pop(0)).toBe(3)
    expect(queue.size).toBe(0)
  })

  it('should return null at once when polling an empty queue', async () => {
    const queue = new DeliveryQueue<string>()
    expect(await queue.pop(0)).toBeNull()
    expect(queue.tryPop()).toBeUndefined()
  })

  it('should return null when the timeout expires', async () => {
    vi.useFakeTimers()
    const queue = new DeliveryQueue<string>()
    const pending = queue.pop(50)

    await vi.advanceTimersByTimeAsync(50)
    expect(await pending).toBeNull()

    // The expired waiter must not swallow later items.
    queue.push('late')
    expect(queue.size).toBe(1)
  })

  it('should hand a pushed item to a waiting consumer', async () => {
    const queue = new DeliveryQueue<string>()
    const first = queue.pop()
    const second = queue.pop(1000)

    queue.push('a')
    queue.push('b')

    expect(await first).toBe('a')
    expect(await second).toBe('b')
    expect(queue.size).toBe(0)
  })

  it('should drop the oldest item when full by default', () => {
    const onOverflow = vi.fn()
    const queue = new DeliveryQueue<number>({ capacity: 2, onOverflow })

    expect(queue.push(1)).toBe(true)
    expect(queue.push(2)).toBe(true)
    expect(queue.push(3)).toBe(true)

    expect(onOverflow).toHaveBeenCalledWith(1)
    expect(queue.tryPop()).toBe(2)
    expect(queue.tryPop()).toBe(3)
  })

  it('should drop the new item under reject-newest', () => {
    const onOverflow = vi.fn()
    const queue = new DeliveryQueue<number>({ capacity: 1, overflow: 'reject-newest', onOverflow })

    expect(queue.push(1)).toBe(true)
    expect(queue.push(2)).toBe(false)

    expect(onOverflow).toHaveBeenCalledWith(2)
    expect(queue.size).toBe(1)
    expect(queue.tryPop()).toBe(1)
  })

  it('should grow without bound when capacity is null', () => {
    const queue = new DeliveryQueue<number>({ capacity: null })
    for (let i = 0; i < 5000; i++) {
      queue.push(i)
    }
    expect(queue.size).toBe(5000)
  })

  it('should reject an invalid capacity', () => {
    expect(() => new DeliveryQueue({ capacity: 0 })).toThrow(RangeError)
    expect(() => new DeliveryQueue({ capacity: 1.5 })).toThrow('Queue capacity must be a positive integer, got 1.5')
  })

  it('flush should drop everything and report the count', () => {
    const queue = new DeliveryQueue<number>()
    queue.push(1)
    queue.push(2)

    expect(queue.flush()).toBe(2)
    expect(queue.size).toBe(0)
    expect(queue.flush()).toBe(0)
  })

  it('close should release waiting consumers with null', async () => {
    const queue = new DeliveryQueue<number>()
    const waiting = queue.pop()

    queue.close()

    expect(await waiting).toBeNull()
    expect(queue.isClosed).toBe(true)
    expect(await queue.pop()).toBeNull()
  })

  it('should still hand out items queued before close', async () => {
    const queue = new DeliveryQueue<number>()
    queue.push(7)
    queue.close()

    expect(await queue.pop()).toBe(7)
    expect(await queue.pop()).toBeNull()
  })

  it('reopen should make consumers wait again', async () => {
    const queue = new DeliveryQueue<number>()
    queue.close()
    queue.reopen()

    const waiting = queue.pop()
    queue.push(4)

    expect(queue.isClosed).toBe(false)
    expect(await waiting).toBe(4)
  })
})
