/**
 * Storage profile of an account
 *
 * storage_used$_ cells:(VarUInteger 7) bits:(VarUInteger 7) extra:StorageExtra = StorageUsed;
 * storage_extra_none$000 = StorageExtra;
 * storage_extra_info$001 dict_hash:uint256 = StorageExtra;
 *
 * storage_used_short$_ cells:(VarUInteger 7) bits:(VarUInteger 7) = StorageUsedShort;
 *
 * storage_info$_ used:StorageUsed last_paid:uint32 due_payment:(Maybe Grams) = StorageInfo;
 *
 * Extra tags other than 000 and 001 are reserved for future accounting modes
 * and rejected on decode.
 */

import {
  CODEC_ERRORS,
  DecodeError,
  type Safe,
  type StorageExtra,
  type StorageInfo,
  type StorageUsed,
  type StorageUsedShort,
} from '@shard-ledger/types'
import type { Builder, Cell, Slice } from '@ton/core'
import { decodeFromSlice, encodeToCell } from './core/boundary'
import { loadHash256, storeHash256 } from './core/maybe'
import { loadVarUInteger, storeVarUInteger } from './core/var-uinteger'

const STORAGE_EXTRA_NONE = 0b000
const STORAGE_EXTRA_DICT = 0b001

export function emptyStorageUsed(): StorageUsed {
  return { cells: 0n, bits: 0n, extra: { type: 'none' } }
}

export function emptyStorageInfo(): StorageInfo {
  return { used: emptyStorageUsed(), lastPaid: 0, duePayment: null }
}

export function storeStorageExtra(extra: StorageExtra) {
  return (builder: Builder) => {
    switch (extra.type) {
      case 'none':
        builder.storeUint(STORAGE_EXTRA_NONE, 3)
        break
      case 'dict':
        builder.storeUint(STORAGE_EXTRA_DICT, 3)
        builder.store(storeHash256(extra.dictHash))
        break
    }
  }
}

export function loadStorageExtra(slice: Slice): StorageExtra {
  const tag = slice.loadUint(3)
  switch (tag) {
    case STORAGE_EXTRA_NONE:
      return { type: 'none' }
    case STORAGE_EXTRA_DICT:
      return { type: 'dict', dictHash: loadHash256(slice) }
    default:
      throw new DecodeError(
        `wrong tag ${tag.toString(2).padStart(3, '0')} deserializing StorageUsed`,
        CODEC_ERRORS.WRONG_STORAGE_EXTRA_TAG,
        { tag },
      )
  }
}

export function storeStorageUsedShort(value: StorageUsedShort) {
  return (builder: Builder) => {
    builder.store(storeVarUInteger(value.cells, 7))
    builder.store(storeVarUInteger(value.bits, 7))
  }
}

export function loadStorageUsedShort(slice: Slice): StorageUsedShort {
  const cells = loadVarUInteger(slice, 7)
  const bits = loadVarUInteger(slice, 7)
  return { cells, bits }
}

export function storeStorageUsed(value: StorageUsed) {
  return (builder: Builder) => {
    builder.store(storeStorageUsedShort(value))
    builder.store(storeStorageExtra(value.extra))
  }
}

export function loadStorageUsed(slice: Slice): StorageUsed {
  const { cells, bits } = loadStorageUsedShort(slice)
  const extra = loadStorageExtra(slice)
  return { cells, bits, extra }
}

export function storeStorageInfo(value: StorageInfo) {
  return (builder: Builder) => {
    builder.store(storeStorageUsed(value.used))
    builder.storeUint(value.lastPaid, 32)
    builder.storeMaybeCoins(value.duePayment)
  }
}

export function loadStorageInfo(slice: Slice): StorageInfo {
  const used = loadStorageUsed(slice)
  const lastPaid = slice.loadUint(32)
  const duePayment = slice.loadMaybeCoins()
  return { used, lastPaid, duePayment }
}

export function encodeStorageUsed(value: StorageUsed): Safe<Cell> {
  return encodeToCell('StorageUsed', storeStorageUsed(value))
}

export function decodeStorageUsed(slice: Slice): Safe<StorageUsed> {
  return decodeFromSlice('StorageUsed', slice, loadStorageUsed)
}

export function encodeStorageUsedShort(value: StorageUsedShort): Safe<Cell> {
  return encodeToCell('StorageUsedShort', storeStorageUsedShort(value))
}

export function decodeStorageUsedShort(slice: Slice): Safe<StorageUsedShort> {
  return decodeFromSlice('StorageUsedShort', slice, loadStorageUsedShort)
}

export function encodeStorageInfo(value: StorageInfo): Safe<Cell> {
  return encodeToCell('StorageInfo', storeStorageInfo(value))
}

export function decodeStorageInfo(slice: Slice): Safe<StorageInfo> {
  return decodeFromSlice('StorageInfo', slice, loadStorageInfo)
}
