/**
 * Packet link error types.
 *
 * @module packet-link/error
 */

function hex (byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`
}

function describeCause (cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Top-level error type for packet link operations.
 */
export class PacketLinkError extends Error {
  constructor (message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PacketLinkError'
  }
}

/**
 * Payload does not fit in a single frame.
 */
export class PayloadTooLargeError extends PacketLinkError {
  public readonly size: number
  public readonly limit: number

  constructor (size: number, limit: number) {
    super(`Payload too large: ${size} > ${limit}`)
    this.name = 'PayloadTooLargeError'
    this.size = size
    this.limit = limit
  }
}

/**
 * Packet type outside the single-byte range.
 */
export class InvalidPacketTypeError extends PacketLinkError {
  public readonly value: number

  constructor (value: number) {
    super(`Invalid packet type: ${value}`)
    this.name = 'InvalidPacketTypeError'
    this.value = value
  }
}

/**
 * Which transport call failed.
 */
export type TransportOperation = 'available' | 'read' | 'write' | 'close'

/**
 * The underlying transport raised.
 */
export class TransportError extends PacketLinkError {
  public readonly operation: TransportOperation

  constructor (operation: TransportOperation, cause?: unknown) {
    super(`Transport ${operation} failed: ${cause === undefined ? 'unknown' : describeCause(cause)}`, { cause })
    this.name = 'TransportError'
    this.operation = operation
  }
}

/**
 * Transport is not open.
 */
export class TransportClosedError extends PacketLinkError {
  constructor () {
    super('Transport closed')
    this.name = 'TransportClosedError'
  }
}

/**
 * A receive loop from an earlier start has not exited yet.
 */
export class ReceiveLoopBusyError extends PacketLinkError {
  constructor () {
    super('Receive loop is still stopping')
    this.name = 'ReceiveLoopBusyError'
  }
}

/**
 * Candidate frame with a bad STOP byte or LENGTH field.
 */
export class FrameError extends PacketLinkError {
  public readonly frame: Uint8Array

  constructor (frame: Uint8Array, reason: string) {
    super(`Malformed frame: ${reason}`)
    this.name = 'FrameError'
    this.frame = frame
  }
}

/**
 * Checksum carried by a frame does not match its contents.
 */
export class CrcError extends PacketLinkError {
  public readonly expected: number
  public readonly actual: number

  constructor (expected: number, actual: number) {
    super(`Unexpected CRC-8: expected ${hex(expected)}, got ${hex(actual)}`)
    this.name = 'CrcError'
    this.expected = expected
    this.actual = actual
  }
}

/**
 * No builder is registered for a packet type.
 */
export class NoBuilderError extends PacketLinkError {
  public readonly type: number

  constructor (type: number) {
    super(`No builder registered for packet type ${type}`)
    this.name = 'NoBuilderError'
    this.type = type
  }
}

/**
 * The user-supplied function that raised.
 */
export type HandlerKind = 'parser' | 'builder' | 'callback'

/**
 * A user-supplied parser, builder or receive callback raised.
 */
export class HandlerError extends PacketLinkError {
  public readonly kind: HandlerKind
  public readonly type: number

  constructor (kind: HandlerKind, type: number, cause: unknown) {
    super(`${kind} for packet type ${type} failed: ${describeCause(cause)}`, { cause })
    this.name = 'HandlerError'
    this.kind = kind
    this.type = type
  }
}

/**
 * A built-in codec rejected its input.
 */
export class CodecError extends PacketLinkError {
  constructor (message: string) {
    super(message)
    this.name = 'CodecError'
  }
}

/**
 * Link options failed validation.
 */
export class InvalidOptionsError extends PacketLinkError {
  public readonly issues: string[]

  constructor (issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

/**
 * Union type of all packet link errors.
 */
export type PacketLinkErrorType =
  | PayloadTooLargeError
  | InvalidPacketTypeError
  | TransportError
  | TransportClosedError
  | ReceiveLoopBusyError
  | FrameError
  | CrcError
  | NoBuilderError
  | HandlerError
  | CodecError
  | InvalidOptionsError
