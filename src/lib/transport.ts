/**
 * Byte transports the link runs over.
 *
 * The link needs only a handful of calls from its medium: how many bytes are
 * waiting, read them, write a frame, close. Real devices (serial ports,
 * sockets) are Node.js duplex streams and go through `StreamTransport`.
 *
 * @module packet-link/transport
 */

import type { Duplex } from 'node:stream'
import { TransportClosedError } from './error.js'

/**
 * The byte-stream medium under a link. Calls may complete synchronously or
 * return a promise.
 */
export interface Transport {
  isOpen(): boolean
  /** Bytes that can be read without waiting */
  available(): number | Promise<number>
  /** Reads up to `count` bytes; never waits for more than are available */
  read(count: number): Uint8Array | Promise<Uint8Array>
  /** Writes all bytes and returns how many were written */
  write(data: Uint8Array): number | Promise<number>
  close(): void | Promise<void>
}

/**
 * Opens a transport on a device address (a port path, a host:port).
 */
export type OpenTransport = (address: string, rate: number, timeoutMs: number) => Promise<Transport>

/**
 * Growable FIFO of bytes.
 */
class ByteFifo {
  private chunks: Uint8Array[] = []
  private total = 0

  get length (): number {
    return this.total
  }

  push (data: Uint8Array): void {
    if (data.length === 0) {
      return
    }
    this.chunks.push(new Uint8Array(data))
    this.total += data.length
  }

  take (count: number): Uint8Array {
    const size = Math.max(0, Math.min(count, this.total))
    const out = new Uint8Array(size)
    let offset = 0
    while (offset < size) {
      const chunk = this.chunks[0]
      const n = Math.min(chunk.length, size - offset)
      out.set(chunk.subarray(0, n), offset)
      offset += n
      if (n === chunk.length) {
        this.chunks.shift()
      } else {
        this.chunks[0] = chunk.subarray(n)
      }
    }
    this.total -= size
    return out
  }

  clear (): void {
    this.chunks = []
    this.total = 0
  }
}

/**
 * In-process transport. Ends created by `pair()` deliver to each other;
 * `inject()` places bytes straight into an end's own read buffer.
 */
export class MemoryTransport implements Transport {
  private readonly inbox = new ByteFifo()
  private peer: MemoryTransport | null = null
  private open = true
  private written = 0

  /**
   * Creates two connected ends.
   */
  static pair (): [MemoryTransport, MemoryTransport] {
    const a = new MemoryTransport()
    const b = new MemoryTransport()
    a.peer = b
    b.peer = a
    return [a, b]
  }

  /**
   * Total bytes written through this end.
   */
  get bytesWritten (): number {
    return this.written
  }

  isOpen (): boolean {
    return this.open
  }

  available (): number {
    return this.inbox.length
  }

  read (count: number): Uint8Array {
    if (!this.open) {
      throw new TransportClosedError()
    }
    return this.inbox.take(count)
  }

  write (data: Uint8Array): number {
    if (!this.open) {
      throw new TransportClosedError()
    }
    this.written += data.length
    if (this.peer?.open === true) {
      this.peer.inbox.push(data)
    }
    return data.length
  }

  inject (data: Uint8Array): void {
    this.inbox.push(data)
  }

  close (): void {
    this.open = false
    this.inbox.clear()
  }
}

/**
 * Adapts a Node.js duplex stream (a serial port, a socket) to `Transport`.
 * Incoming `data` events are buffered until the link reads them. A stream
 * error is rethrown by the next `available()` or `read()` call.
 */
export class StreamTransport implements Transport {
  private readonly inbox = new ByteFifo()
  private readonly encoder = new TextEncoder()
  private pendingError: Error | null = null
  private open: boolean

  constructor (private readonly stream: Duplex) {
    this.open = !stream.destroyed
    stream.on('data', (chunk: Uint8Array | string) => {
      this.inbox.push(typeof chunk === 'string' ? this.encoder.encode(chunk) : chunk)
    })
    stream.on('error', (err: Error) => {
      this.pendingError = err
    })
    stream.on('close', () => {
      this.open = false
    })
  }

  isOpen (): boolean {
    return this.open
  }

  available (): number {
    this.throwPending()
    return this.inbox.length
  }

  read (count: number): Uint8Array {
    this.throwPending()
    return this.inbox.take(count)
  }

  async write (data: Uint8Array): Promise<number> {
    if (!this.open) {
      throw new TransportClosedError()
    }
    return await new Promise<number>((resolve, reject) => {
      this.stream.write(data, (err) => {
        if (err != null) {
          reject(err)
        } else {
          resolve(data.length)
        }
      })
    })
  }

  /**
   * Destroys the stream. Does not wait for its `close` event, which streams
   * created with `emitClose: false` never emit.
   */
  close (): void {
    this.inbox.clear()
    this.open = false
    if (!this.stream.destroyed) {
      this.stream.destroy()
    }
  }

  private throwPending (): void {
    const err = this.pendingError
    if (err !== null) {
      this.pendingError = null
      throw err
    }
  }
}
