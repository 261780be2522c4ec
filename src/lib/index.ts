/**
 * Framed, CRC-checked packet exchange over a raw byte stream.
 *
 * Frames are `0xAA | type | length | payload | crc8 | 0xBC` with up to 25
 * payload bytes. A `PacketLink` writes frames for the caller and runs a
 * receive loop that decodes incoming bytes into packets.
 *
 * ## Usage
 *
 * 1. Wrap the device in a `Transport` (`StreamTransport` for a serial port or
 *    socket) and create a `PacketLink` around it.
 * 2. Register a parser and/or builder per packet type with
 *    `registerHandler()`.
 * 3. Call `start()`, then `send()` / `sendRaw()` and drain received packets
 *    with `getPacket()`; `processPacket()` turns a packet into its parsed value.
 * 4. Call `stop()` to end the receive loop and close the transport.
 *
 * @module packet-link
 */

// Constants
export { START_BYTE, STOP_BYTE, MAX_PAYLOAD_SIZE, FRAME_OVERHEAD, MAX_FRAME_SIZE } from './constants.js'

// Errors
export {
  PacketLinkError,
  PayloadTooLargeError,
  InvalidPacketTypeError,
  TransportError,
  TransportClosedError,
  ReceiveLoopBusyError,
  FrameError,
  CrcError,
  NoBuilderError,
  HandlerError,
  CodecError,
  InvalidOptionsError,
  type HandlerKind,
  type TransportOperation,
  type PacketLinkErrorType
} from './error.js'

// CRC
export { crc8, Crc8 } from './crc.js'

// Frames
export { PacketType, Packet, encodeFrame, frameChecksum, frameSize, isPacketType } from './frame.js'
export { StreamDecoder, type StreamDecoderOptions } from './decoder.js'

// Codecs
export { CodecRegistry, type Codec, type Parser, type Builder } from './registry.js'
export {
  createStringCodec,
  createStructCodec,
  structSize,
  type StructField,
  type NumericField,
  type BytesField,
  type StructValue
} from './codecs.js'

// Runtime
export { Statistics, type StatisticsSnapshot, type Counter } from './stats.js'
export { DeliveryQueue, type DeliveryQueueOptions, type OverflowPolicy } from './queue.js'
export { Mutex } from './mutex.js'
export { MemoryTransport, StreamTransport, type Transport, type OpenTransport } from './transport.js'
export { ReceiveLoop, type ReceiveContext, type ReceiveLoopOptions } from './receiver.js'
export {
  linkOptionsSchema,
  openOptionsSchema,
  resolveLinkOptions,
  resolveOpenOptions,
  type LinkOptions,
  type LinkSettings,
  type OpenOptions,
  type OpenSettings
} from './config.js'
export { LOG_CATEGORY, getLinkLogger, type LogComponent } from './logger.js'
export { PacketLink } from './link.js'
