/**
 * Hashmap edge labels
 *
 * hml_short$0 {m:#} {n:#} len:(Unary ~n) {n <= m} s:(n * Bit) = HmLabel ~n m;
 * hml_long$10 {m:#} n:(#<= m) s:(n * Bit) = HmLabel ~n m;
 * hml_same$11 {m:#} v:Bit n:(#<= m) = HmLabel ~n m;
 *
 * Labels are handled as strings of '0' and '1'. The writer picks the
 * shortest encoding; the reader accepts all three.
 */

import { CODEC_ERRORS, DecodeError, EncodeError } from '@shard-ledger/types'
import type { Builder, Slice } from '@ton/core'

/**
 * Width of a `#<= max` field
 */
export function labelLengthBits(max: number): number {
  return max === 0 ? 0 : max.toString(2).length
}

function isSameBit(label: string): boolean {
  return label.length > 0 && !label.includes(label[0] === '0' ? '1' : '0')
}

function storeBitString(builder: Builder, label: string) {
  for (const bit of label) {
    builder.storeBit(bit === '1')
  }
}

function loadBitString(slice: Slice, length: number): string {
  let out = ''
  for (let i = 0; i < length; i++) {
    out += slice.loadBit() ? '1' : '0'
  }
  return out
}

/**
 * Size in bits of each label form for a label of `length` bits under `max`
 */
export function labelSizes(length: number, max: number) {
  const k = labelLengthBits(max)
  return {
    short: 2 * length + 2,
    long: 2 + k + length,
    same: 3 + k,
  }
}

export function storeHashmapLabel(label: string, max: number) {
  return (builder: Builder) => {
    if (label.length > max) {
      throw new EncodeError(
        `label of ${label.length} bits exceeds ${max} remaining key bits`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    const k = labelLengthBits(max)
    const sizes = labelSizes(label.length, max)

    if (isSameBit(label) && sizes.same < sizes.short && sizes.same < sizes.long) {
      builder.storeUint(0b11, 2)
      builder.storeBit(label[0] === '1')
      if (k > 0) {
        builder.storeUint(label.length, k)
      }
      return
    }
    if (sizes.long < sizes.short) {
      builder.storeUint(0b10, 2)
      if (k > 0) {
        builder.storeUint(label.length, k)
      }
      storeBitString(builder, label)
      return
    }
    builder.storeBit(false)
    for (let i = 0; i < label.length; i++) {
      builder.storeBit(true)
    }
    builder.storeBit(false)
    storeBitString(builder, label)
  }
}

export function loadHashmapLabel(slice: Slice, max: number): string {
  const checked = (length: number) => {
    if (length > max) {
      throw new DecodeError(
        `label of ${length} bits exceeds ${max} remaining key bits`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    return length
  }

  if (!slice.loadBit()) {
    let length = 0
    while (slice.loadBit()) {
      length++
    }
    return loadBitString(slice, checked(length))
  }

  const k = labelLengthBits(max)
  if (!slice.loadBit()) {
    const length = checked(k > 0 ? slice.loadUint(k) : 0)
    return loadBitString(slice, length)
  }

  const bit = slice.loadBit() ? '1' : '0'
  const length = checked(k > 0 ? slice.loadUint(k) : 0)
  return bit.repeat(length)
}
