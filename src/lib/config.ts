/**
 * Link configuration.
 *
 * Numeric and policy options are validated with zod; callbacks are passed
 * alongside them and are not part of the schema.
 *
 * @module packet-link/config
 */

import { z } from 'zod'
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_STOP_TIMEOUT_MS,
  DEFAULT_TRANSPORT_TIMEOUT_MS
} from './constants.js'
import { InvalidOptionsError } from './error.js'
import type { PacketLinkError } from './error.js'
import type { Packet } from './frame.js'

export const linkOptionsSchema = z.object({
  /** Idle delay of the receive loop when no bytes are available */
  pollIntervalMs: z.number().int().nonnegative().default(DEFAULT_POLL_INTERVAL_MS),
  /** Longest `stop()` waits for the receive loop to finish */
  stopTimeoutMs: z.number().int().nonnegative().default(DEFAULT_STOP_TIMEOUT_MS),
  /** Delay after the transport throws inside the receive loop */
  errorBackoffMs: z.number().int().nonnegative().default(DEFAULT_ERROR_BACKOFF_MS),
  /** Delivery queue bound; `null` leaves it unbounded */
  queueCapacity: z.number().int().positive().nullable().default(DEFAULT_QUEUE_CAPACITY),
  overflowPolicy: z.enum(['drop-oldest', 'reject-newest']).default('drop-oldest')
})

export type LinkSettings = z.output<typeof linkOptionsSchema>

/**
 * Options accepted by `PacketLink`.
 */
export type LinkOptions = z.input<typeof linkOptionsSchema> & {
  /**
   * Called on the receive loop for every packet, after it is queued. Keep it
   * short: ingestion waits until it returns.
   */
  onPacket?: (packet: Packet) => void
  /** Error channel for every non-fatal failure */
  onError?: (error: PacketLinkError) => void
}

export const openOptionsSchema = z.object({
  address: z.string().min(1),
  rate: z.number().int().positive().default(DEFAULT_BAUD_RATE),
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TRANSPORT_TIMEOUT_MS)
})

export type OpenOptions = z.input<typeof openOptionsSchema>

export type OpenSettings = z.output<typeof openOptionsSchema>

function toOptionsError (error: z.ZodError): InvalidOptionsError {
  return new InvalidOptionsError(
    error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  )
}

/**
 * Applies defaults and validates link options.
 * @throws InvalidOptionsError if any option is out of range
 */
export function resolveLinkOptions (input: LinkOptions = {}): LinkSettings {
  // Unknown keys, the callbacks included, are stripped by the schema.
  const result = linkOptionsSchema.safeParse(input)
  if (!result.success) {
    throw toOptionsError(result.error)
  }
  return result.data
}

/**
 * Applies defaults and validates transport open options.
 * @throws InvalidOptionsError if any option is out of range
 */
export function resolveOpenOptions (input: OpenOptions): OpenSettings {
  const result = openOptionsSchema.safeParse(input)
  if (!result.success) {
    throw toOptionsError(result.error)
  }
  return result.data
}
