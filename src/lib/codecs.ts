/**
 * Ready-made codecs for common payload shapes.
 *
 * @module packet-link/codecs
 */

import { CodecError } from './error.js'
import type { Codec } from './registry.js'

/**
 * Creates a codec for UTF-8 text payloads. Each invalid sequence decodes to
 * U+FFFD rather than being dropped.
 */
export function createStringCodec (): Codec<string> {
  const decoder = new TextDecoder('utf-8')
  const encoder = new TextEncoder()
  return {
    parser: (payload) => decoder.decode(payload),
    builder: (value) => encoder.encode(value)
  }
}

/**
 * Numeric field kinds. The suffix gives the byte order; single bytes have none.
 */
export type NumericField =
  | 'u8' | 'i8'
  | 'u16le' | 'u16be' | 'i16le' | 'i16be'
  | 'u32le' | 'u32be' | 'i32le' | 'i32be'
  | 'f32le' | 'f32be' | 'f64le' | 'f64be'

/**
 * A fixed-width run of raw bytes.
 */
export interface BytesField {
  bytes: number
}

export type StructField = NumericField | BytesField

export type StructValue = number | Uint8Array

const NUMERIC_SIZES: Record<NumericField, number> = {
  u8: 1,
  i8: 1,
  u16le: 2,
  u16be: 2,
  i16le: 2,
  i16be: 2,
  u32le: 4,
  u32be: 4,
  i32le: 4,
  i32be: 4,
  f32le: 4,
  f32be: 4,
  f64le: 8,
  f64be: 8
}

type IntegerField = Exclude<NumericField, 'f32le' | 'f32be' | 'f64le' | 'f64be'>

const INTEGER_RANGES: Record<IntegerField, readonly [number, number]> = {
  u8: [0, 0xFF],
  i8: [-0x80, 0x7F],
  u16le: [0, 0xFFFF],
  u16be: [0, 0xFFFF],
  i16le: [-0x8000, 0x7FFF],
  i16be: [-0x8000, 0x7FFF],
  u32le: [0, 0xFFFFFFFF],
  u32be: [0, 0xFFFFFFFF],
  i32le: [-0x80000000, 0x7FFFFFFF],
  i32be: [-0x80000000, 0x7FFFFFFF]
}

const FLOAT32_MAX = 3.4028234663852886e38

function isIntegerField (field: NumericField): field is IntegerField {
  return field in INTEGER_RANGES
}

/**
 * Throws unless the value fits the field without wrapping or rounding to
 * infinity.
 */
function checkRange (index: number, field: NumericField, value: number): void {
  if (isIntegerField(field)) {
    const [min, max] = INTEGER_RANGES[field]
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new CodecError(`Field ${index} (${field}) expects an integer in [${min}, ${max}], got ${value}`)
    }
  } else if ((field === 'f32le' || field === 'f32be') && Number.isFinite(value) && Math.abs(value) > FLOAT32_MAX) {
    throw new CodecError(`Field ${index} (${field}) is out of range: ${value}`)
  }
}

function fieldSize (field: StructField): number {
  return typeof field === 'string' ? NUMERIC_SIZES[field] : field.bytes
}

/**
 * Returns the payload size of a struct layout.
 */
export function structSize (fields: readonly StructField[]): number {
  return fields.reduce((sum, field) => sum + fieldSize(field), 0)
}

function readNumber (view: DataView, offset: number, field: NumericField): number {
  switch (field) {
    case 'u8': return view.getUint8(offset)
    case 'i8': return view.getInt8(offset)
    case 'u16le': return view.getUint16(offset, true)
    case 'u16be': return view.getUint16(offset, false)
    case 'i16le': return view.getInt16(offset, true)
    case 'i16be': return view.getInt16(offset, false)
    case 'u32le': return view.getUint32(offset, true)
    case 'u32be': return view.getUint32(offset, false)
    case 'i32le': return view.getInt32(offset, true)
    case 'i32be': return view.getInt32(offset, false)
    case 'f32le': return view.getFloat32(offset, true)
    case 'f32be': return view.getFloat32(offset, false)
    case 'f64le': return view.getFloat64(offset, true)
    case 'f64be': return view.getFloat64(offset, false)
  }
}

function writeNumber (view: DataView, offset: number, field: NumericField, value: number): void {
  switch (field) {
    case 'u8': view.setUint8(offset, value); break
    case 'i8': view.setInt8(offset, value); break
    case 'u16le': view.setUint16(offset, value, true); break
    case 'u16be': view.setUint16(offset, value, false); break
    case 'i16le': view.setInt16(offset, value, true); break
    case 'i16be': view.setInt16(offset, value, false); break
    case 'u32le': view.setUint32(offset, value, true); break
    case 'u32be': view.setUint32(offset, value, false); break
    case 'i32le': view.setInt32(offset, value, true); break
    case 'i32be': view.setInt32(offset, value, false); break
    case 'f32le': view.setFloat32(offset, value, true); break
    case 'f32be': view.setFloat32(offset, value, false); break
    case 'f64le': view.setFloat64(offset, value, true); break
    case 'f64be': view.setFloat64(offset, value, false); break
  }
}

/**
 * Creates a codec for a fixed binary layout. Values are an array with one
 * entry per field: a number for numeric fields, bytes for byte fields.
 * Integers must fit their field exactly; nothing is wrapped or truncated.
 *
 * ```ts
 * const telemetry = createStructCodec([{ bytes: 4 }, 'i32le', 'f32le'])
 * telemetry.builder?.([new TextEncoder().encode('temp'), 42, 21.5])
 * ```
 */
export function createStructCodec (fields: readonly StructField[]): Codec<StructValue[]> {
  const size = structSize(fields)

  return {
    parser: (payload) => {
      if (payload.length !== size) {
        throw new CodecError(`Struct payload must be ${size} bytes, got ${payload.length}`)
      }
      const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
      const values: StructValue[] = []
      let offset = 0
      for (const field of fields) {
        if (typeof field === 'string') {
          values.push(readNumber(view, offset, field))
        } else {
          values.push(payload.slice(offset, offset + field.bytes))
        }
        offset += fieldSize(field)
      }
      return values
    },
    builder: (values) => {
      if (values.length !== fields.length) {
        throw new CodecError(`Struct expects ${fields.length} values, got ${values.length}`)
      }
      const out = new Uint8Array(size)
      const view = new DataView(out.buffer)
      let offset = 0
      fields.forEach((field, i) => {
        const value = values[i]
        if (typeof field === 'string') {
          if (typeof value !== 'number') {
            throw new CodecError(`Field ${i} (${field}) expects a number`)
          }
          checkRange(i, field, value)
          writeNumber(view, offset, field, value)
        } else {
          if (!(value instanceof Uint8Array)) {
            throw new CodecError(`Field ${i} expects ${field.bytes} bytes`)
          }
          // Shorter input is zero-padded, longer input truncated.
          out.set(value.subarray(0, field.bytes), offset)
        }
        offset += fieldSize(field)
      })
      return out
    }
  }
}
