/**
 * Stateful stream decoder.
 *
 * Bytes arrive in arbitrary chunks. The decoder keeps whatever it cannot use
 * yet and extracts every complete, validated frame on each feed.
 *
 * Resynchronization: while the buffer does not begin with START the decoder
 * drops exactly one byte and looks again, so a run of noise costs as many
 * steps as it has bytes and the decoder always makes progress.
 *
 * @module packet-link/decoder
 */

import { LENGTH_OFFSET, MAX_PAYLOAD_SIZE, MIN_HEADER_SIZE, START_BYTE, STOP_BYTE } from './constants.js'
import { CrcError, FrameError } from './error.js'
import { Packet, frameChecksum, frameSize } from './frame.js'
import { Statistics } from './stats.js'

/**
 * Options for the stream decoder.
 */
export interface StreamDecoderOptions {
  /** Counters to update; a private instance is used if omitted */
  stats?: Statistics
  /** Called with the reason each candidate frame was discarded */
  onReject?: (error: FrameError | CrcError) => void
  /** Clock used to stamp packets */
  now?: () => Date
}

export class StreamDecoder {
  private buffer: Uint8Array = new Uint8Array(0)
  private readonly stats: Statistics
  private readonly onReject?: (error: FrameError | CrcError) => void
  private readonly now: () => Date

  constructor (options: StreamDecoderOptions = {}) {
    this.stats = options.stats ?? new Statistics()
    this.onReject = options.onReject
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Number of bytes held back waiting for the rest of a frame.
   */
  get bufferedLength (): number {
    return this.buffer.length
  }

  /**
   * Drops all buffered bytes.
   */
  reset (): void {
    this.buffer = new Uint8Array(0)
  }

  /**
   * Appends bytes and extracts every frame that is now complete.
   * @param input - Bytes read from the transport
   * @returns Validated packets, in stream order
   */
  feed (input: Uint8Array): Packet[] {
    this.append(input)
    const packets: Packet[] = []

    while (this.buffer.length > 0) {
      if (this.buffer[0] !== START_BYTE) {
        this.consume(1)
        continue
      }

      if (this.buffer.length < MIN_HEADER_SIZE) {
        break
      }

      const length = this.buffer[LENGTH_OFFSET]
      if (length > MAX_PAYLOAD_SIZE) {
        // No valid frame starts here; step past the START byte only.
        this.reject(new FrameError(this.buffer.slice(0, MIN_HEADER_SIZE), `length ${length} exceeds ${MAX_PAYLOAD_SIZE}`))
        this.consume(1)
        continue
      }

      const size = frameSize(length)
      if (this.buffer.length < size) {
        break
      }

      const candidate = this.buffer.slice(0, size)
      this.consume(size)

      const packet = this.validate(candidate)
      if (packet !== null) {
        packets.push(packet)
      }
    }

    return packets
  }

  private validate (candidate: Uint8Array): Packet | null {
    const stop = candidate[candidate.length - 1]
    if (stop !== STOP_BYTE) {
      this.reject(new FrameError(candidate, `stop byte 0x${stop.toString(16).padStart(2, '0')}`))
      return null
    }

    const expected = frameChecksum(candidate)
    const actual = candidate[candidate.length - 2]
    if (expected !== actual) {
      this.reject(new CrcError(expected, actual))
      return null
    }

    this.stats.increment('packetsReceived')
    const payload = candidate.subarray(MIN_HEADER_SIZE, candidate.length - 2)
    return new Packet(candidate[1], payload, candidate, this.now())
  }

  private reject (error: FrameError | CrcError): void {
    this.stats.increment(error instanceof CrcError ? 'crcErrors' : 'frameErrors')
    this.onReject?.(error)
  }

  private append (input: Uint8Array): void {
    if (input.length === 0) {
      return
    }
    const next = new Uint8Array(this.buffer.length + input.length)
    next.set(this.buffer, 0)
    next.set(input, this.buffer.length)
    this.buffer = next
  }

  private consume (count: number): void {
    this.buffer = this.buffer.subarray(count)
  }
}
