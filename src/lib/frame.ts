/**
 * Wire frame layout, packet types and the frame encoder.
 *
 * A frame is `START | TYPE | LENGTH | PAYLOAD | CRC8 | STOP`, where the
 * checksum covers `TYPE | LENGTH | PAYLOAD`.
 *
 * @module packet-link/frame
 */

import { FRAME_OVERHEAD, LENGTH_OFFSET, MAX_PAYLOAD_SIZE, MIN_HEADER_SIZE, START_BYTE, STOP_BYTE } from './constants.js'
import { InvalidPacketTypeError, PayloadTooLargeError } from './error.js'
import { crc8 } from './crc.js'

/**
 * Application packet types. Any single-byte code is valid on the wire;
 * these are the codes the protocol ships with.
 */
export enum PacketType {
  /** Acknowledgement (application-defined, not a protocol-level ack) */
  Ack = 0,
  /** Publish data */
  Publish = 1,
  /** Subscribe request */
  Subscribe = 2
}

/**
 * Returns true if the value is a single-byte packet type code.
 */
export function isPacketType (value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xFF
}

/**
 * Total frame size for a payload of the given length.
 */
export function frameSize (length: number): number {
  return length + FRAME_OVERHEAD
}

/**
 * Computes the checksum a frame should carry.
 * @param frame - A complete frame, or at least its header and payload
 * @returns The CRC-8 over TYPE, LENGTH and PAYLOAD
 */
export function frameChecksum (frame: Uint8Array): number {
  const length = frame[LENGTH_OFFSET]
  return crc8(frame.subarray(1, MIN_HEADER_SIZE + length))
}

/**
 * A decoded, validated packet.
 */
export class Packet {
  private readonly _type: number
  private readonly _payload: Uint8Array
  private readonly _timestamp: Date
  private readonly _rawFrame: Uint8Array

  /**
   * Creates a new Packet instance.
   * @param type - The packet type code
   * @param payload - The payload bytes
   * @param rawFrame - The frame the packet was decoded from
   * @param timestamp - Capture time
   */
  constructor (type: number, payload: Uint8Array, rawFrame: Uint8Array, timestamp: Date = new Date()) {
    this._type = type
    this._payload = new Uint8Array(payload)
    this._rawFrame = new Uint8Array(rawFrame)
    this._timestamp = new Date(timestamp.getTime())
  }

  get type (): number {
    return this._type
  }

  /**
   * A copy of the payload bytes.
   */
  get payload (): Uint8Array {
    return new Uint8Array(this._payload)
  }

  /**
   * Wall-clock time at which the frame was validated.
   */
  get timestamp (): Date {
    return new Date(this._timestamp.getTime())
  }

  /**
   * A copy of the original wire bytes, for debugging.
   */
  get rawFrame (): Uint8Array {
    return new Uint8Array(this._rawFrame)
  }
}

/**
 * Wraps a packet type and payload into a complete wire frame.
 * @param type - The packet type code (0-255)
 * @param payload - Up to 25 payload bytes
 * @returns The encoded frame
 * @throws InvalidPacketTypeError if the type is not a single byte
 * @throws PayloadTooLargeError if the payload does not fit
 */
export function encodeFrame (type: number, payload: Uint8Array): Uint8Array {
  if (!isPacketType(type)) {
    throw new InvalidPacketTypeError(type)
  }
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD_SIZE)
  }

  const frame = new Uint8Array(frameSize(payload.length))
  frame[0] = START_BYTE
  frame[1] = type
  frame[LENGTH_OFFSET] = payload.length
  frame.set(payload, MIN_HEADER_SIZE)
  frame[frame.length - 2] = frameChecksum(frame)
  frame[frame.length - 1] = STOP_BYTE

  return frame
}
