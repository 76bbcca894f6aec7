/**
 * account_descr$_ account:^Account last_trans_hash:bits256
 *   last_trans_lt:uint64 = ShardAccount;
 *
 * The account root is kept as a child reference so an index slot stays small
 * and fixed-size; it is only parsed when the account is read.
 */

import type { Safe, ShardAccountRecord } from '@shard-ledger/types'
import type { Builder, Cell, Slice } from '@ton/core'
import { decodeFromSlice, encodeToCell } from './core/boundary'
import { loadHash256, storeHash256 } from './core/maybe'

export function storeShardAccountRecord(record: ShardAccountRecord) {
  return (builder: Builder) => {
    builder.storeRef(record.accountCell)
    builder.store(storeHash256(record.lastTransHash))
    builder.storeUint(record.lastTransLt, 64)
  }
}

export function loadShardAccountRecord(slice: Slice): ShardAccountRecord {
  const accountCell = slice.loadRef()
  const lastTransHash = loadHash256(slice)
  const lastTransLt = slice.loadUintBig(64)
  return { accountCell, lastTransHash, lastTransLt }
}

export function encodeShardAccountRecord(record: ShardAccountRecord): Safe<Cell> {
  return encodeToCell('ShardAccount', storeShardAccountRecord(record))
}

export function decodeShardAccountRecord(slice: Slice): Safe<ShardAccountRecord> {
  return decodeFromSlice('ShardAccount', slice, loadShardAccountRecord)
}
