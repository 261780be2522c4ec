/**
 * Tests for the in-memory and stream transports.
 */

import { describe, it, expect } from 'vitest'
import { PassThrough } from 'node:stream'
import { MemoryTransport, StreamTransport } from '../../src/lib/transport.js'
import { TransportClosedError } from '../../src/lib/error.js'

async function nextTick (): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve))
}

describe('MemoryTransport', () => {
  it('should deliver writes to the other end of a pair', () => {
    const [a, b] = MemoryTransport.pair()

    expect(a.write(new Uint8Array([1, 2, 3]))).toBe(3)
    a.write(new Uint8Array([4]))

    expect(b.available()).toBe(4)
    expect(a.available()).toBe(0)
    expect(a.bytesWritten).toBe(4)
  })

  it('should read no more than requested or available', () => {
    const [a, b] = MemoryTransport.pair()
    a.write(new Uint8Array([1, 2, 3, 4, 5]))

    expect(Array.from(b.read(2))).toEqual([1, 2])
    expect(Array.from(b.read(10))).toEqual([3, 4, 5])
    expect(b.read(4).length).toBe(0)
  })

  it('should read across chunk boundaries', () => {
    const transport = new MemoryTransport()
    transport.inject(new Uint8Array([1, 2]))
    transport.inject(new Uint8Array([3, 4, 5]))

    expect(Array.from(transport.read(3))).toEqual([1, 2, 3])
    expect(Array.from(transport.read(3))).toEqual([4, 5])
  })

  it('should copy injected bytes', () => {
    const transport = new MemoryTransport()
    const data = new Uint8Array([9])
    transport.inject(data)
    data[0] = 0

    expect(Array.from(transport.read(1))).toEqual([9])
  })

  it('should refuse reads and writes once closed', () => {
    const [a, b] = MemoryTransport.pair()
    b.inject(new Uint8Array([1]))
    b.close()

    expect(b.isOpen()).toBe(false)
    expect(b.available()).toBe(0)
    expect(() => b.read(1)).toThrow(TransportClosedError)
    expect(() => b.write(new Uint8Array([1]))).toThrow(TransportClosedError)

    // Writes towards a closed peer are accepted and discarded.
    expect(a.write(new Uint8Array([1, 2]))).toBe(2)
  })
})

describe('StreamTransport', () => {
  it('should buffer incoming data until read', async () => {
    const stream = new PassThrough()
    const transport = new StreamTransport(stream)

    stream.write(Buffer.from([0xAA, 0x00]))
    stream.write(Buffer.from([0x00]))
    await nextTick()

    expect(transport.available()).toBe(3)
    expect(Array.from(transport.read(3))).toEqual([0xAA, 0x00, 0x00])
  })

  it('should write to the stream', async () => {
    const remote = new PassThrough()
    const received: number[] = []
    const transport = new StreamTransport(remote)
    remote.on('data', (chunk: Buffer) => received.push(...chunk))

    expect(await transport.write(new Uint8Array([5, 6, 7]))).toBe(3)
    await nextTick()

    // A PassThrough loops writes back to its own readable side.
    expect(received).toEqual([5, 6, 7])
    expect(transport.available()).toBe(3)
  })

  it('should rethrow a stream error on the next read', async () => {
    const stream = new PassThrough()
    const transport = new StreamTransport(stream)

    stream.emit('error', new Error('line noise'))
    await nextTick()

    expect(() => transport.available()).toThrow('line noise')
    expect(transport.available()).toBe(0)
  })

  it('should close the stream', async () => {
    const stream = new PassThrough()
    const transport = new StreamTransport(stream)
    expect(transport.isOpen()).toBe(true)

    transport.close()

    expect(stream.destroyed).toBe(true)
    expect(transport.isOpen()).toBe(false)
    await expect(transport.write(new Uint8Array([1]))).rejects.toThrow(TransportClosedError)
  })

  it('should close a stream that never emits close', () => {
    const stream = new PassThrough({ emitClose: false })
    const transport = new StreamTransport(stream)

    transport.close()

    expect(stream.destroyed).toBe(true)
    expect(transport.isOpen()).toBe(false)
    expect(transport.available()).toBe(0)
  })

  it('should report closed when the stream goes away', async () => {
    const stream = new PassThrough()
    const transport = new StreamTransport(stream)

    stream.destroy()
    await nextTick()

    expect(transport.isOpen()).toBe(false)
  })
})
