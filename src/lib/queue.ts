/**
 * Consumer-facing FIFO of decoded packets.
 *
 * @module packet-link/queue
 */

/**
 * What happens to a push into a full queue.
 */
export type OverflowPolicy = 'drop-oldest' | 'reject-newest'

export interface DeliveryQueueOptions<T> {
  /** Maximum queued items; `null` for no bound */
  capacity?: number | null
  overflow?: OverflowPolicy
  /** Called with the item that was dropped */
  onOverflow?: (dropped: T) => void
}

interface Waiter<T> {
  resolve: (item: T | null) => void
  timer: ReturnType<typeof setTimeout> | null
}

/**
 * FIFO with non-blocking producers and consumers that may wait with a timeout.
 */
export class DeliveryQueue<T> {
  private readonly items: T[] = []
  private readonly waiters: Array<Waiter<T>> = []
  private readonly capacity: number | null
  private readonly overflow: OverflowPolicy
  private readonly onOverflow?: (dropped: T) => void
  private closed = false

  constructor (options: DeliveryQueueOptions<T> = {}) {
    this.capacity = options.capacity ?? null
    this.overflow = options.overflow ?? 'drop-oldest'
    this.onOverflow = options.onOverflow
    if (this.capacity !== null && (!Number.isInteger(this.capacity) || this.capacity < 1)) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${this.capacity}`)
    }
  }

  get size (): number {
    return this.items.length
  }

  get isClosed (): boolean {
    return this.closed
  }

  /**
   * Adds an item, handing it straight to a waiting consumer if there is one.
   * @returns false if the item itself was dropped by the overflow policy
   */
  push (item: T): boolean {
    const waiter = this.waiters.shift()
    if (waiter !== undefined) {
      this.settle(waiter, item)
      return true
    }

    if (this.capacity !== null && this.items.length >= this.capacity) {
      if (this.overflow === 'reject-newest') {
        this.onOverflow?.(item)
        return false
      }
      const oldest = this.items.shift()
      if (oldest !== undefined) {
        this.onOverflow?.(oldest)
      }
    }

    this.items.push(item)
    return true
  }

  /**
   * Removes the next item without waiting.
   */
  tryPop (): T | undefined {
    return this.items.shift()
  }

  /**
   * Removes the next item, waiting for one if the queue is empty.
   * @param timeoutMs - `0` polls, `undefined` waits until an item or `close()`
   * @returns The item, or null on timeout or once closed and empty
   */
  async pop (timeoutMs?: number): Promise<T | null> {
    const item = this.items.shift()
    if (item !== undefined) {
      return item
    }
    if (this.closed || timeoutMs === 0) {
      return null
    }

    return await new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null }
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) {
            this.waiters.splice(index, 1)
          }
          resolve(null)
        }, timeoutMs)
      }
      this.waiters.push(waiter)
    })
  }

  /**
   * Drops every queued item.
   * @returns How many items were dropped
   */
  flush (): number {
    const count = this.items.length
    this.items.length = 0
    return count
  }

  /**
   * Releases every waiting consumer with null. Queued items stay poppable.
   */
  close (): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      this.settle(waiter, null)
    }
  }

  /**
   * Accepts waiting consumers again after `close()`.
   */
  reopen (): void {
    this.closed = false
  }

  private settle (waiter: Waiter<T>, item: T | null): void {
    if (waiter.timer !== null) {
      clearTimeout(waiter.timer)
    }
    waiter.resolve(item)
  }
}
