/**
 * Per-type payload codecs.
 *
 * @module packet-link/registry
 */

import { HandlerError, InvalidPacketTypeError, NoBuilderError } from './error.js'
import { isPacketType } from './frame.js'

/**
 * Converts a received payload into an application value.
 */
export type Parser<T> = (payload: Uint8Array) => T

/**
 * Converts an application value into a payload.
 */
export type Builder<T> = (value: T) => Uint8Array

/**
 * The parser/builder pair for one packet type. Either half may be absent.
 */
export interface Codec<T> {
  parser?(payload: Uint8Array): T
  builder?(value: T): Uint8Array
}

/**
 * Maps packet types to codecs. At most one codec per type; registering again
 * replaces the previous entry.
 */
export class CodecRegistry {
  private readonly codecs = new Map<number, Codec<unknown>>()

  /**
   * Registers a parser and/or builder for a packet type.
   * @param type - The packet type code
   * @param parser - Optional payload parser
   * @param builder - Optional payload builder
   */
  register<T>(type: number, parser?: Parser<T>, builder?: Builder<T>): void {
    this.registerCodec(type, { parser, builder })
  }

  registerCodec<T>(type: number, codec: Codec<T>): void {
    if (!isPacketType(type)) {
      throw new InvalidPacketTypeError(type)
    }
    this.codecs.set(type, codec)
  }

  unregister (type: number): boolean {
    return this.codecs.delete(type)
  }

  has (type: number): boolean {
    return this.codecs.has(type)
  }

  get (type: number): Codec<unknown> | undefined {
    return this.codecs.get(type)
  }

  /**
   * Returns the registered types in ascending order.
   */
  types (): number[] {
    return [...this.codecs.keys()].sort((a, b) => a - b)
  }

  /**
   * Builds a payload with the type's builder.
   * @throws NoBuilderError if the type has no builder
   * @throws HandlerError if the builder raises
   */
  build (type: number, value: unknown): Uint8Array {
    const codec = this.codecs.get(type)
    if (codec?.builder === undefined) {
      throw new NoBuilderError(type)
    }
    try {
      return codec.builder(value)
    } catch (err) {
      throw new HandlerError('builder', type, err)
    }
  }

  /**
   * Parses a payload with the type's parser. Without a parser the payload
   * is returned unchanged.
   * @throws HandlerError if the parser raises
   */
  parse (type: number, payload: Uint8Array): unknown {
    const codec = this.codecs.get(type)
    if (codec?.parser === undefined) {
      return payload
    }
    try {
      return codec.parser(payload)
    } catch (err) {
      throw new HandlerError('parser', type, err)
    }
  }
}

