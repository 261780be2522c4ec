/**
 * The receive loop: an async task that polls the transport, feeds the stream
 * decoder and publishes packets.
 *
 * @module packet-link/receiver
 */

import type { StreamDecoder } from './decoder.js'
import { HandlerError, ReceiveLoopBusyError, TransportError } from './error.js'
import type { PacketLinkError } from './error.js'
import type { Packet } from './frame.js'
import { getLinkLogger } from './logger.js'
import type { Mutex } from './mutex.js'
import type { DeliveryQueue } from './queue.js'
import type { Statistics } from './stats.js'
import type { Transport } from './transport.js'

const logger = getLinkLogger('receiver')

/**
 * State the loop shares with the caller-facing side of the link.
 */
export interface ReceiveContext {
  transport: Transport
  /** Guards every transport call that moves bytes */
  mutex: Mutex
  decoder: StreamDecoder
  queue: DeliveryQueue<Packet>
  stats: Statistics
  /** Error channel */
  report: (error: PacketLinkError) => void
}

export interface ReceiveLoopOptions {
  pollIntervalMs: number
  errorBackoffMs: number
  onPacket?: (packet: Packet) => void
}

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
async function sleep (ms: number, signal: AbortSignal): Promise<void> {
  await new Promise<void>((resolve) => {
    const done = (): void => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}

/**
 * Waits for a task for at most `ms`.
 * @returns true if the task settled in time
 */
async function settleWithin (task: Promise<void>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms)
  })
  try {
    return await Promise.race([task.then(() => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Poll outcome: bytes were read, nothing was waiting, or the transport threw.
 */
type PollResult = 'data' | 'idle' | 'failed'

export class ReceiveLoop {
  private controller: AbortController | null = null
  private task: Promise<void> | null = null

  constructor (
    private readonly context: ReceiveContext,
    private readonly options: ReceiveLoopOptions
  ) {}

  get isRunning (): boolean {
    return this.controller !== null
  }

  /**
   * True after a `stop()` that timed out, until the old task finally exits.
   */
  get isStopping (): boolean {
    return this.controller === null && this.task !== null
  }

  /**
   * Starts the loop. Does nothing if it is already running.
   * @throws ReceiveLoopBusyError if an earlier loop has not exited yet
   */
  start (): void {
    if (this.controller !== null) {
      return
    }
    if (this.task !== null) {
      throw new ReceiveLoopBusyError()
    }
    const controller = new AbortController()
    this.controller = controller
    const task: Promise<void> = this.run(controller.signal).finally(() => {
      if (this.task === task) {
        this.task = null
      }
    })
    this.task = task
  }

  /**
   * Signals the loop to stop and waits for the current iteration to finish.
   * A loop that outlives the wait is kept until it exits, and blocks `start()`
   * until then.
   * @param timeoutMs - Longest wait before giving up on the task
   * @returns false if the loop was still busy when the wait ran out
   */
  async stop (timeoutMs: number): Promise<boolean> {
    const task = this.task
    if (task === null) {
      return true
    }
    this.controller?.abort()
    this.controller = null

    const finished = await settleWithin(task, timeoutMs)
    if (!finished) {
      logger.warn('Receive loop did not stop within {timeoutMs} ms', { timeoutMs })
    }
    return finished
  }

  private async run (signal: AbortSignal): Promise<void> {
    logger.debug('Receive loop started')
    while (!signal.aborted) {
      const result = await this.poll(signal)
      if (signal.aborted) {
        break
      }
      if (result === 'idle') {
        await sleep(this.options.pollIntervalMs, signal)
      } else if (result === 'failed') {
        await sleep(this.options.errorBackoffMs, signal)
      }
    }
    logger.debug('Receive loop stopped')
  }

  private async poll (signal: AbortSignal): Promise<PollResult> {
    const { transport, mutex, stats, report } = this.context

    let count: number
    try {
      count = await transport.available()
    } catch (err) {
      if (signal.aborted) {
        return 'idle'
      }
      report(new TransportError('available', err))
      return 'failed'
    }
    if (count <= 0 || signal.aborted) {
      return 'idle'
    }

    let data: Uint8Array
    try {
      data = await mutex.runExclusive(async () => await transport.read(count))
    } catch (err) {
      if (signal.aborted) {
        return 'idle'
      }
      report(new TransportError('read', err))
      return 'failed'
    }
    // Bytes read after stop() belong to nobody.
    if (signal.aborted) {
      return 'idle'
    }

    stats.increment('bytesReceived', data.length)
    for (const packet of this.context.decoder.feed(data)) {
      this.publish(packet)
    }
    return data.length > 0 ? 'data' : 'idle'
  }

  private publish (packet: Packet): void {
    logger.trace('Received packet type {type} with {length} payload bytes', {
      type: packet.type,
      length: packet.payload.length
    })
    this.context.queue.push(packet)

    const onPacket = this.options.onPacket
    if (onPacket === undefined) {
      return
    }
    try {
      onPacket(packet)
    } catch (err) {
      this.context.report(new HandlerError('callback', packet.type, err))
    }
  }
}
