/**
 * Tests for CRC functions.
 */

import { describe, it, expect } from 'vitest'
import { crc8, Crc8 } from '../../src/lib/crc.js'

describe('CRC-8', () => {
  it('should return the initial value for empty data', () => {
    expect(crc8(new Uint8Array(0))).toBe(0xFF)
  })

  it('should compute correct CRC-8 for "123456789"', () => {
    const data = new TextEncoder().encode('123456789')
    expect(crc8(data)).toBe(0xFB)
  })

  it('should compute correct CRC-8 for single byte', () => {
    expect(crc8(new Uint8Array([0x00]))).toBe(0xF3)
  })

  it('should compute correct CRC-8 for a frame body', () => {
    // type 1, length 2, payload "AB"
    expect(crc8(new Uint8Array([0x01, 0x02, 0x41, 0x42]))).toBe(0x96)
  })

  it('should always return a single byte', () => {
    for (let i = 0; i < 256; i++) {
      const result = crc8(new Uint8Array([i, 255 - i]))
      expect(result).toBeGreaterThanOrEqual(0)
      expect(result).toBeLessThanOrEqual(0xFF)
    }
  })

  it('Crc8 class should produce same result as function', () => {
    const data = new TextEncoder().encode('Hello, World!')
    const crc = new Crc8()
    crc.update(data)
    expect(crc.finalize()).toBe(crc8(data))
  })

  it('Crc8 class should support incremental updates', () => {
    const crc = new Crc8()
    crc.update(new TextEncoder().encode('1234'))
    crc.updateByte(0x35)
    crc.update(new TextEncoder().encode('6789'))
    expect(crc.finalize()).toBe(0xFB)
  })

  it('Crc8 reset should work correctly', () => {
    const crc = new Crc8()
    crc.update(new TextEncoder().encode('test'))
    crc.reset()
    crc.update(new TextEncoder().encode('123456789'))
    expect(crc.finalize()).toBe(0xFB)
  })
})
