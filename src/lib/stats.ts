/**
 * Link statistics counters.
 *
 * @module packet-link/stats
 */

/**
 * A point-in-time copy of the link counters.
 */
export interface StatisticsSnapshot {
  /** Frames written to the transport */
  readonly packetsSent: number
  /** Frames that passed validation */
  readonly packetsReceived: number
  /** Candidate frames dropped for a checksum mismatch */
  readonly crcErrors: number
  /** Candidate frames dropped for a bad STOP byte or LENGTH field */
  readonly frameErrors: number
  /** Raw bytes read from the transport */
  readonly bytesReceived: number
  /** Packets lost to the delivery queue's overflow policy */
  readonly queueOverflows: number
}

export type Counter = keyof StatisticsSnapshot

/**
 * Monotonic counters shared by the send path and the receive loop. Both run
 * on the same event loop, so plain increments never race.
 */
export class Statistics {
  private readonly counters: Record<Counter, number> = {
    packetsSent: 0,
    packetsReceived: 0,
    crcErrors: 0,
    frameErrors: 0,
    bytesReceived: 0,
    queueOverflows: 0
  }

  /**
   * Adds to a counter.
   * @param counter - The counter to bump
   * @param amount - A non-negative amount, 1 by default
   */
  increment (counter: Counter, amount: number = 1): void {
    if (amount < 0) {
      throw new RangeError(`Counters only grow, got ${amount}`)
    }
    this.counters[counter] += amount
  }

  get (counter: Counter): number {
    return this.counters[counter]
  }

  snapshot (): StatisticsSnapshot {
    return Object.freeze({ ...this.counters })
  }
}
