import { beginCell } from '@ton/core'
import { describe, expect, it } from 'vitest'
import { cellHashKey, hashFromHex, hashToHex } from '../utils/hex'

describe('hash hex helpers', () => {
  it('round-trips a 32 byte hash', () => {
    const hash = Buffer.alloc(32, 0xab)
    const hex = hashToHex(hash)
    expect(hex).toBe(`0x${'ab'.repeat(32)}`)
    expect(hashFromHex(hex)?.equals(hash)).toBe(true)
  })

  it('rejects anything but 32 bytes of hex', () => {
    expect(hashFromHex('0xabcd')).toBeNull()
    expect(hashFromHex('ab'.repeat(32))).toBeNull()
    expect(hashFromHex(`0x${'zz'.repeat(32)}`)).toBeNull()
  })

  it('keys cells by content', () => {
    const a = beginCell().storeUint(1, 8).endCell()
    const b = beginCell().storeUint(1, 8).endCell()
    expect(cellHashKey(a)).toBe(cellHashKey(b))
    expect(cellHashKey(a)).toHaveLength(64)
  })
})
