/**
 * Packet link protocol constants.
 *
 * @module packet-link/constants
 */

/**
 * START byte - marks the beginning of a frame
 */
export const START_BYTE = 0xAA

/**
 * STOP byte - marks the end of a frame
 */
export const STOP_BYTE = 0xBC

/**
 * Maximum size of a frame payload.
 */
export const MAX_PAYLOAD_SIZE = 25

/**
 * Bytes a frame adds around its payload (START, TYPE, LENGTH, CRC, STOP)
 */
export const FRAME_OVERHEAD = 5

/**
 * Maximum size of a complete frame on the wire
 */
export const MAX_FRAME_SIZE = MAX_PAYLOAD_SIZE + FRAME_OVERHEAD

/**
 * Bytes needed before the LENGTH field can be read (START, TYPE, LENGTH)
 */
export const MIN_HEADER_SIZE = 3

/**
 * Offset of the LENGTH field inside a frame
 */
export const LENGTH_OFFSET = 2

/**
 * Initial CRC-8 register value
 */
export const CRC8_INIT = 0xFF

/**
 * CRC-8 polynomial (x^8 + x^2 + x + 1)
 */
export const CRC8_POLY = 0x07

/**
 * Idle delay of the receive loop when the transport has no bytes, in milliseconds
 */
export const DEFAULT_POLL_INTERVAL_MS = 1

/**
 * How long `stop()` waits for the receive loop before closing the transport
 */
export const DEFAULT_STOP_TIMEOUT_MS = 1000

/**
 * Back-off after the transport throws inside the receive loop
 */
export const DEFAULT_ERROR_BACKOFF_MS = 100

/**
 * Default delivery queue capacity
 */
export const DEFAULT_QUEUE_CAPACITY = 1024

/**
 * Default serial rate used by `PacketLink.open`
 */
export const DEFAULT_BAUD_RATE = 115200

/**
 * Default transport read timeout used by `PacketLink.open`
 */
export const DEFAULT_TRANSPORT_TIMEOUT_MS = 100
