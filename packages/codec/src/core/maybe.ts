/**
 * Maybe fields
 *
 * nothing$0 {X:Type} = Maybe X;
 * just$1 {X:Type} value:X = Maybe X;
 */

import type { Builder, Slice } from '@ton/core'

export function storeMaybe<T>(
  value: T | null | undefined,
  writer: (value: T) => (builder: Builder) => void,
) {
  return (builder: Builder) => {
    if (value === null || value === undefined) {
      builder.storeBit(false)
      return
    }
    builder.storeBit(true)
    builder.store(writer(value))
  }
}

export function loadMaybe<T>(
  slice: Slice,
  reader: (slice: Slice) => T,
): T | null {
  return slice.loadBit() ? reader(slice) : null
}

export function storeHash256(hash: Buffer) {
  return (builder: Builder) => {
    builder.storeBuffer(hash, 32)
  }
}

export function loadHash256(slice: Slice): Buffer {
  return slice.loadBuffer(32)
}
