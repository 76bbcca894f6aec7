import type { Cell } from '@ton/core'
import { bytesToHex, type Hex, hexToBytes, isHex } from 'viem'

export { bytesToHex, hexToBytes, type Hex }

/**
 * 0x-prefixed lowercase hex of a 256-bit hash or any byte buffer
 */
export function hashToHex(hash: Uint8Array): Hex {
  return bytesToHex(hash)
}

/**
 * Parse a 0x-prefixed 32-byte hex string into a Buffer.
 * Returns null for anything that is not exactly 32 bytes of hex.
 */
export function hashFromHex(value: string): Buffer | null {
  if (!isHex(value, { strict: true })) {
    return null
  }
  const bytes = hexToBytes(value)
  return bytes.length === 32 ? Buffer.from(bytes) : null
}

/**
 * Map key identifying a cell by its representation hash
 */
export function cellHashKey(cell: Cell): string {
  return cell.hash().toString('hex')
}
