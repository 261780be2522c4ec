/**
 * Tests for the codec registry.
 */

import { describe, it, expect } from 'vitest'
import { CodecRegistry } from '../../src/lib/registry.js'
import { HandlerError, InvalidPacketTypeError, NoBuilderError } from '../../src/lib/error.js'

describe('CodecRegistry', () => {
  it('should build with the registered builder', () => {
    const registry = new CodecRegistry()
    registry.register<number>(3, undefined, (value) => new Uint8Array([value, value + 1]))

    expect(Array.from(registry.build(3, 7))).toEqual([7, 8])
  })

  it('should parse with the registered parser', () => {
    const registry = new CodecRegistry()
    registry.register(3, (payload) => payload.length)

    expect(registry.parse(3, new Uint8Array([1, 2, 3]))).toBe(3)
  })

  it('should return the payload unchanged without a parser', () => {
    const registry = new CodecRegistry()
    const payload = new Uint8Array([4, 5])
    registry.register<number>(1, undefined, () => new Uint8Array(0))

    expect(registry.parse(1, payload)).toBe(payload)
    expect(registry.parse(9, payload)).toBe(payload)
  })

  it('should throw NoBuilderError for a type without a builder', () => {
    const registry = new CodecRegistry()
    registry.register(2, (payload) => payload)

    expect(() => registry.build(2, 'x')).toThrow(NoBuilderError)
    expect(() => registry.build(5, 'x')).toThrow('No builder registered for packet type 5')
  })

  it('should wrap a failing builder in HandlerError', () => {
    const registry = new CodecRegistry()
    registry.register(4, undefined, () => {
      throw new Error('bad value')
    })

    expect(() => registry.build(4, null)).toThrow(HandlerError)
    expect(() => registry.build(4, null)).toThrow('builder for packet type 4 failed: bad value')
  })

  it('should wrap a failing parser in HandlerError', () => {
    const registry = new CodecRegistry()
    registry.register(4, () => {
      throw new Error('bad payload')
    })

    expect(() => registry.parse(4, new Uint8Array(0))).toThrow('parser for packet type 4 failed: bad payload')
  })

  it('should replace an earlier registration', () => {
    const registry = new CodecRegistry()
    registry.register(1, () => 'first')
    registry.register(1, () => 'second')

    expect(registry.parse(1, new Uint8Array(0))).toBe('second')
    expect(registry.types()).toEqual([1])
  })

  it('should register a codec object', () => {
    const registry = new CodecRegistry()
    registry.registerCodec<string>(8, {
      parser: (payload) => String(payload[0]),
      builder: (value) => new Uint8Array([Number(value)])
    })

    expect(Array.from(registry.build(8, '42'))).toEqual([42])
    expect(registry.parse(8, new Uint8Array([42]))).toBe('42')
  })

  it('should reject types outside a byte', () => {
    const registry = new CodecRegistry()
    expect(() => registry.register(256, () => null)).toThrow(InvalidPacketTypeError)
    expect(registry.has(256)).toBe(false)
  })

  it('should list, query and remove registrations', () => {
    const registry = new CodecRegistry()
    registry.register(9, () => null)
    registry.register(0, () => null)
    registry.register(4, () => null)

    expect(registry.types()).toEqual([0, 4, 9])
    expect(registry.has(4)).toBe(true)
    expect(registry.get(4)?.parser).toBeTypeOf('function')
    expect(registry.unregister(4)).toBe(true)
    expect(registry.unregister(4)).toBe(false)
    expect(registry.get(4)).toBeUndefined()
    expect(registry.types()).toEqual([0, 9])
  })
})
