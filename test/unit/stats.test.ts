/**
 * Tests for the link statistics.
 */

import { describe, it, expect } from 'vitest'
import { Statistics } from '../../src/lib/stats.js'

describe('Statistics', () => {
  it('should start every counter at zero', () => {
    expect(new Statistics().snapshot()).toEqual({
      packetsSent: 0,
      packetsReceived: 0,
      crcErrors: 0,
      frameErrors: 0,
      bytesReceived: 0,
      queueOverflows: 0
    })
  })

  it('should increment by one or by an amount', () => {
    const stats = new Statistics()
    stats.increment('packetsSent')
    stats.increment('packetsSent')
    stats.increment('bytesReceived', 17)

    expect(stats.get('packetsSent')).toBe(2)
    expect(stats.get('bytesReceived')).toBe(17)
  })

  it('should refuse to decrease a counter', () => {
    const stats = new Statistics()
    expect(() => stats.increment('crcErrors', -1)).toThrow(RangeError)
    expect(stats.get('crcErrors')).toBe(0)
  })

  it('snapshot should be a frozen copy', () => {
    const stats = new Statistics()
    stats.increment('frameErrors')
    const snapshot = stats.snapshot()
    stats.increment('frameErrors')

    expect(snapshot.frameErrors).toBe(1)
    expect(stats.get('frameErrors')).toBe(2)
    expect(Object.isFrozen(snapshot)).toBe(true)
  })
})
