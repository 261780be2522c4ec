/**
 * The packet link: sends framed packets over a transport and delivers
 * decoded packets to the caller.
 *
 * One `PacketLink` owns the shared state (transport, lock, counters, queue,
 * codecs, decoder) used by both the caller's operations and the receive loop.
 *
 * @module packet-link/link
 */

import { MAX_PAYLOAD_SIZE } from './constants.js'
import { resolveLinkOptions, resolveOpenOptions } from './config.js'
import type { LinkOptions, LinkSettings, OpenOptions } from './config.js'
import { StreamDecoder } from './decoder.js'
import { PacketLinkError, PayloadTooLargeError, TransportClosedError, TransportError } from './error.js'
import { Packet, encodeFrame } from './frame.js'
import { getLinkLogger } from './logger.js'
import { Mutex } from './mutex.js'
import { DeliveryQueue } from './queue.js'
import { ReceiveLoop } from './receiver.js'
import { CodecRegistry } from './registry.js'
import type { Builder, Codec, Parser } from './registry.js'
import { Statistics } from './stats.js'
import type { StatisticsSnapshot } from './stats.js'
import type { OpenTransport, Transport } from './transport.js'

const logger = getLinkLogger('link')
const decoderLogger = getLinkLogger('decoder')

export class PacketLink {
  readonly settings: LinkSettings

  private readonly transport: Transport
  private readonly mutex = new Mutex()
  private readonly stats = new Statistics()
  private readonly registry = new CodecRegistry()
  private readonly queue: DeliveryQueue<Packet>
  private readonly decoder: StreamDecoder
  private readonly receiver: ReceiveLoop
  private readonly onError?: (error: PacketLinkError) => void

  /**
   * Creates a link over an already open transport. Nothing is read until
   * `start()`.
   * @throws InvalidOptionsError if an option is out of range
   */
  constructor (transport: Transport, options: LinkOptions = {}) {
    this.settings = resolveLinkOptions(options)
    this.transport = transport
    this.onError = options.onError

    this.queue = new DeliveryQueue<Packet>({
      capacity: this.settings.queueCapacity,
      overflow: this.settings.overflowPolicy,
      onOverflow: (dropped) => {
        this.stats.increment('queueOverflows')
        logger.warn('Delivery queue full, dropped packet type {type}', { type: dropped.type })
      }
    })

    this.decoder = new StreamDecoder({
      stats: this.stats,
      onReject: (error) => {
        decoderLogger.debug('Discarded frame: {message}', { message: error.message })
      }
    })

    this.receiver = new ReceiveLoop(
      {
        transport,
        mutex: this.mutex,
        decoder: this.decoder,
        queue: this.queue,
        stats: this.stats,
        report: (error) => this.report(error)
      },
      {
        pollIntervalMs: this.settings.pollIntervalMs,
        errorBackoffMs: this.settings.errorBackoffMs,
        onPacket: options.onPacket
      }
    )
  }

  /**
   * Opens a transport through the given collaborator and wraps it in a link.
   * @throws InvalidOptionsError if an option is out of range
   */
  static async open (openTransport: OpenTransport, openOptions: OpenOptions, options: LinkOptions = {}): Promise<PacketLink> {
    const { address, rate, timeoutMs } = resolveOpenOptions(openOptions)
    const transport = await openTransport(address, rate, timeoutMs)
    logger.info('Opened {address} at {rate}', { address, rate })
    return new PacketLink(transport, options)
  }

  get isRunning (): boolean {
    return this.receiver.isRunning
  }

  /**
   * Starts the receive loop.
   * @throws TransportClosedError if the transport is not open
   * @throws ReceiveLoopBusyError if the loop of an earlier run has not exited
   */
  start (): void {
    if (this.receiver.isRunning) {
      return
    }
    if (!this.transport.isOpen()) {
      throw new TransportClosedError()
    }
    this.receiver.start()
    this.queue.reopen()
    logger.info('Packet link started')
  }

  /**
   * Stops the receive loop, waiting at most `stopTimeoutMs`, then closes the
   * transport and releases consumers blocked in `getPacket()`.
   */
  async stop (): Promise<void> {
    const finished = await this.receiver.stop(this.settings.stopTimeoutMs)
    this.queue.close()

    if (this.transport.isOpen()) {
      const close = async (): Promise<void> => await this.transport.close()
      try {
        // A loop stuck in a read still holds the lock.
        await (finished ? this.mutex.runExclusive(close) : close())
      } catch (err) {
        this.report(new TransportError('close', err))
      }
    }
    logger.info('Packet link stopped')
  }

  /**
   * Registers a parser and/or builder for a packet type, replacing any
   * earlier registration for that type.
   */
  registerHandler<T>(type: number, parser?: Parser<T>, builder?: Builder<T>): void {
    this.registry.register(type, parser, builder)
  }

  registerCodec<T>(type: number, codec: Codec<T>): void {
    this.registry.registerCodec(type, codec)
  }

  /**
   * Builds a payload with the type's builder and sends it.
   * @returns false if there is no builder, the builder raised, or the send failed
   */
  async send (type: number, value: unknown): Promise<boolean> {
    let payload: Uint8Array
    try {
      payload = this.registry.build(type, value)
    } catch (err) {
      this.report(toLinkError(err))
      return false
    }
    return await this.sendRaw(type, payload)
  }

  /**
   * Frames a payload and writes it to the transport.
   * @returns false if the payload is too large or the transport failed
   */
  async sendRaw (type: number, payload: Uint8Array): Promise<boolean> {
    if (payload.length > MAX_PAYLOAD_SIZE) {
      this.report(new PayloadTooLargeError(payload.length, MAX_PAYLOAD_SIZE))
      return false
    }

    let frame: Uint8Array
    try {
      frame = encodeFrame(type, payload)
    } catch (err) {
      this.report(toLinkError(err))
      return false
    }

    try {
      await this.mutex.runExclusive(async () => await this.transport.write(frame))
    } catch (err) {
      this.report(new TransportError('write', err))
      return false
    }
    this.stats.increment('packetsSent')
    return true
  }

  /**
   * Takes the next received packet.
   * @param timeoutMs - `0` polls, omitted waits until a packet or `stop()`
   * @returns The packet, or null on timeout
   */
  async getPacket (timeoutMs?: number): Promise<Packet | null> {
    return await this.queue.pop(timeoutMs)
  }

  /**
   * Runs a packet's payload through its type's parser. Falls back to the raw
   * payload when there is no parser or the parser raised.
   */
  processPacket (packet: Packet): unknown {
    try {
      return this.registry.parse(packet.type, packet.payload)
    } catch (err) {
      this.report(toLinkError(err))
      return packet.payload
    }
  }

  /**
   * Drops every queued packet.
   * @returns How many packets were dropped
   */
  flush (): number {
    return this.queue.flush()
  }

  getStats (): StatisticsSnapshot {
    return this.stats.snapshot()
  }

  private report (error: PacketLinkError): void {
    logger.error('{name}: {message}', { name: error.name, message: error.message })
    if (this.onError === undefined) {
      return
    }
    try {
      this.onError(error)
    } catch (err) {
      logger.warn('Error handler raised: {err}', { err })
    }
  }
}

function toLinkError (err: unknown): PacketLinkError {
  if (err instanceof PacketLinkError) {
    return err
  }
  return new PacketLinkError(err instanceof Error ? err.message : String(err), { cause: err })
}
