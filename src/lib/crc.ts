/**
 * CRC-8 checksum (polynomial 0x07, initial value 0xFF, no reflection,
 * no final XOR).
 *
 * @module packet-link/crc
 */

import { CRC8_INIT, CRC8_POLY } from './constants.js'

/**
 * Performs a single byte update for CRC-8.
 */
function crc8Update (crc: number, byte: number): number {
  crc ^= byte & 0xFF
  for (let i = 0; i < 8; i++) {
    if ((crc & 0x80) !== 0) {
      crc = ((crc << 1) ^ CRC8_POLY) & 0xFF
    } else {
      crc = (crc << 1) & 0xFF
    }
  }
  return crc
}

/**
 * Computes the CRC-8 checksum.
 * @param data - The data to compute the checksum for
 * @returns The checksum byte
 */
export function crc8 (data: Uint8Array): number {
  let crc = CRC8_INIT
  for (const byte of data) {
    crc = crc8Update(crc, byte)
  }
  return crc
}

/**
 * A stateful, iterative CRC-8 calculator.
 */
export class Crc8 {
  private crc: number = CRC8_INIT

  /**
   * Resets the CRC state.
   */
  reset (): void {
    this.crc = CRC8_INIT
  }

  /**
   * Updates the CRC state with a slice of bytes.
   */
  update (data: Uint8Array): void {
    for (const byte of data) {
      this.updateByte(byte)
    }
  }

  updateByte (byte: number): void {
    this.crc = crc8Update(this.crc, byte)
  }

  /**
   * Returns the checksum of everything fed since the last reset.
   */
  finalize (): number {
    return this.crc
  }
}
