/**
 * Shard identification and membership
 *
 * shard_ident$00 shard_pfx_bits:(#<= 60) workchain_id:int32
 *   shard_prefix:uint64 = ShardIdent;
 *
 * In memory a shard is its 64-bit id with the tag bit set right after the
 * prefix; on the wire the prefix length is explicit and the tag bit dropped.
 */

import {
  CODEC_ERRORS,
  DecodeError,
  EncodeError,
  type ShardIdent,
} from '@shard-ledger/types'
import type { Address, Builder, Slice } from '@ton/core'

export const FULL_SHARD = 0x8000000000000000n
const UINT64_MASK = (1n << 64n) - 1n
const MAX_SHARD_PREFIX_BITS = 60

function lowestBit(shard: bigint): bigint {
  return shard & -shard
}

/**
 * Number of prefix bits of a shard id (0 for the full workchain)
 */
export function shardPrefixBits(shard: bigint): number {
  let bits = 63
  for (let low = lowestBit(shard); low > 1n; low >>= 1n) {
    bits--
  }
  return bits
}

export function isValidShard(shard: bigint): boolean {
  return (
    shard > 0n &&
    shard <= UINT64_MASK &&
    shardPrefixBits(shard) <= MAX_SHARD_PREFIX_BITS
  )
}

export function fullShard(workchainId: number): ShardIdent {
  return { workchainId, shard: FULL_SHARD }
}

/**
 * Top 64 bits of a 256-bit account id
 */
export function accountIdPrefix(accountId: Buffer): bigint {
  return accountId.readBigUInt64BE(0)
}

export function shardContainsAccountId(
  shard: bigint,
  accountId: Buffer,
): boolean {
  const low = lowestBit(shard)
  const mask = (~(low - 1n) << 1n) & UINT64_MASK
  return ((accountIdPrefix(accountId) ^ shard) & mask) === 0n
}

export function shardContainsAddress(
  shard: ShardIdent,
  address: Address,
): boolean {
  return (
    address.workChain === shard.workchainId &&
    shardContainsAccountId(shard.shard, address.hash)
  )
}

export function storeShardIdent(ident: ShardIdent) {
  return (builder: Builder) => {
    if (!isValidShard(ident.shard)) {
      throw new EncodeError(
        `invalid shard id ${ident.shard.toString(16)}`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    builder.storeUint(0b00, 2)
    builder.storeUint(shardPrefixBits(ident.shard), 6)
    builder.storeInt(ident.workchainId, 32)
    builder.storeUint(ident.shard ^ lowestBit(ident.shard), 64)
  }
}

export function loadShardIdent(slice: Slice): ShardIdent {
  const tag = slice.loadUint(2)
  if (tag !== 0b00) {
    throw new DecodeError(
      `wrong tag ${tag.toString(2).padStart(2, '0')} deserializing ShardIdent`,
      CODEC_ERRORS.WRONG_SHARD_IDENT_TAG,
    )
  }
  const prefixBits = slice.loadUint(6)
  if (prefixBits > MAX_SHARD_PREFIX_BITS) {
    throw new DecodeError(
      `shard prefix of ${prefixBits} bits is out of range`,
      CODEC_ERRORS.VALUE_OUT_OF_RANGE,
    )
  }
  const workchainId = slice.loadInt(32)
  const prefix = slice.loadUintBig(64)
  const tagBit = 1n << BigInt(63 - prefixBits)
  // prefix bits past the tag must be zero
  if ((prefix & ((tagBit << 1n) - 1n)) !== 0n) {
    throw new DecodeError(
      `shard prefix ${prefix.toString(16)} has bits beyond its length`,
      CODEC_ERRORS.VALUE_OUT_OF_RANGE,
    )
  }
  return { workchainId, shard: prefix | tagBit }
}
