/**
 * VarUInteger n
 *
 * var_uint$_ {n:#} len:(#< n) value:(uint (len * 8)) = VarUInteger n;
 *
 * The length prefix occupies ceil(log2(n)) bits and counts whole bytes, so a
 * VarUInteger 7 carries at most 6 bytes. Writers reject values that need
 * more; readers reject length prefixes of n or above.
 */

import { CODEC_ERRORS, DecodeError, EncodeError } from '@shard-ledger/types'
import type { Builder, Slice } from '@ton/core'

/**
 * Width of the length prefix for VarUInteger n
 */
export function varUintLengthBits(n: number): number {
  return Math.ceil(Math.log2(n))
}

/**
 * Largest value representable as VarUInteger n
 */
export function maxVarUint(n: number): bigint {
  return (1n << BigInt((n - 1) * 8)) - 1n
}

/** cells:(VarUInteger 7) bits:(VarUInteger 7) */
export const MAX_VAR_UINT7 = maxVarUint(7)

export function storeVarUInteger(value: bigint, n: number) {
  return (builder: Builder) => {
    if (value < 0n || value > maxVarUint(n)) {
      throw new EncodeError(
        `value ${value} does not fit into VarUInteger ${n}`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    builder.storeVarUint(value, varUintLengthBits(n))
  }
}

export function loadVarUInteger(slice: Slice, n: number): bigint {
  const lengthBits = varUintLengthBits(n)
  const bytes = slice.preloadUint(lengthBits)
  if (bytes >= n) {
    throw new DecodeError(
      `length ${bytes} is out of range for VarUInteger ${n}`,
      CODEC_ERRORS.VAR_UINT_LENGTH,
    )
  }
  return slice.loadVarUintBig(lengthBits)
}
