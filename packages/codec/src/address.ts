/**
 * MsgAddressInt
 *
 * addr_std$10 anycast:(Maybe Anycast) workchain_id:int8 address:bits256 = MsgAddressInt;
 * anycast_info$_ depth:(#<= 30) { depth >= 1 } rewrite_pfx:(bits depth) = Anycast;
 *
 * Only the standard form is accepted; addr_var$11 and external forms are
 * rejected as malformed input.
 */

import {
  type AnycastInfo,
  CODEC_ERRORS,
  DecodeError,
  EncodeError,
  type MsgAddressInt,
} from '@shard-ledger/types'
import { Address, type Builder, type Slice } from '@ton/core'
import { loadMaybe, storeMaybe } from './core/maybe'

const ANYCAST_DEPTH_BITS = 5
const MAX_ANYCAST_DEPTH = 30

export function storeAnycast(anycast: AnycastInfo) {
  return (builder: Builder) => {
    if (
      anycast.depth < 1 ||
      anycast.depth > MAX_ANYCAST_DEPTH ||
      anycast.rewritePrefix.length !== anycast.depth
    ) {
      throw new EncodeError(
        `invalid anycast depth ${anycast.depth} for prefix of ${anycast.rewritePrefix.length} bits`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    builder.storeUint(anycast.depth, ANYCAST_DEPTH_BITS)
    builder.storeBits(anycast.rewritePrefix)
  }
}

export function loadAnycast(slice: Slice): AnycastInfo {
  const depth = slice.loadUint(ANYCAST_DEPTH_BITS)
  if (depth < 1 || depth > MAX_ANYCAST_DEPTH) {
    throw new DecodeError(
      `anycast depth ${depth} is out of range`,
      CODEC_ERRORS.VALUE_OUT_OF_RANGE,
    )
  }
  return { depth, rewritePrefix: slice.loadBits(depth) }
}

export function storeMsgAddressInt(value: MsgAddressInt) {
  return (builder: Builder) => {
    builder.storeUint(0b10, 2)
    builder.store(storeMaybe(value.anycast, storeAnycast))
    builder.storeInt(value.address.workChain, 8)
    builder.storeBuffer(value.address.hash, 32)
  }
}

export function loadMsgAddressInt(slice: Slice): MsgAddressInt {
  const tag = slice.loadUint(2)
  if (tag !== 0b10) {
    throw new DecodeError(
      `wrong tag ${tag.toString(2).padStart(2, '0')} deserializing MsgAddressInt`,
      CODEC_ERRORS.WRONG_ADDRESS_TAG,
    )
  }
  const anycast = loadMaybe(slice, loadAnycast)
  const workchain = slice.loadInt(8)
  const hash = slice.loadBuffer(32)
  return { address: new Address(workchain, hash), anycast }
}

/**
 * Plain address without anycast rewrite
 */
export function msgAddressInt(address: Address): MsgAddressInt {
  return { address, anycast: null }
}

export function msgAddressEquals(a: MsgAddressInt, b: MsgAddressInt): boolean {
  if (!a.address.equals(b.address)) {
    return false
  }
  if (a.anycast === null || b.anycast === null) {
    return a.anycast === b.anycast
  }
  return (
    a.anycast.depth === b.anycast.depth &&
    a.anycast.rewritePrefix.equals(b.anycast.rewritePrefix)
  )
}

export function formatMsgAddressInt(value: MsgAddressInt): string {
  const raw = value.address.toRawString()
  return value.anycast
    ? `${raw} (anycast ${value.anycast.depth}:${value.anycast.rewritePrefix.toString()})`
    : raw
}
