/**
 * Minimal shard state
 *
 * shard_state#9023afe2 global_id:int32 shard_id:ShardIdent seq_no:uint32
 *   gen_utime:uint32 gen_lt:uint64 accounts:^ShardAccounts
 *   ^[ total_balance:CurrencyCollection ] = ShardStateUnsplit;
 *
 * Decoding keeps both child references unopened so a proof only reveals
 * the parts a lookup actually reads.
 */

import {
  CODEC_ERRORS,
  type CellLoader,
  DecodeError,
  type Safe,
  type ShardAccountRecord,
  type ShardIdent,
  safeError,
} from '@shard-ledger/types'
import {
  decodeFromCell,
  encodeToCell,
  loadCurrencyCollectionWith,
  loadShardIdent,
  storeShardIdent,
} from '@shard-ledger/codec'
import { directLoader } from '@shard-ledger/core'
import {
  beginCell,
  type Builder,
  type Cell,
  type CurrencyCollection,
  type Slice,
  storeCurrencyCollection,
} from '@ton/core'
import { lookupShardAccount } from './shard-accounts'

export const SHARD_STATE_TAG = 0x9023afe2

export interface ShardStateHeader {
  globalId: number
  shardId: ShardIdent
  seqNo: number
  genUtime: number
  genLt: bigint
}

export interface ShardStateInput extends ShardStateHeader {
  accounts: Cell
  totalBalance: CurrencyCollection
}

export interface ShardState extends ShardStateHeader {
  /** ShardAccounts root, not yet opened */
  accounts: Cell
  /** Cell holding total_balance, not yet opened */
  extra: Cell
}

export function storeShardState(state: ShardStateInput) {
  return (builder: Builder) => {
    builder.storeUint(SHARD_STATE_TAG, 32)
    builder.storeInt(state.globalId, 32)
    builder.store(storeShardIdent(state.shardId))
    builder.storeUint(state.seqNo, 32)
    builder.storeUint(state.genUtime, 32)
    builder.storeUint(state.genLt, 64)
    builder.storeRef(state.accounts)
    builder.storeRef(
      beginCell().store(storeCurrencyCollection(state.totalBalance)).endCell(),
    )
  }
}

export function loadShardState(slice: Slice): ShardState {
  const tag = slice.loadUint(32)
  if (tag !== SHARD_STATE_TAG) {
    throw new DecodeError(
      `wrong tag ${tag.toString(16)} deserializing ShardStateUnsplit`,
      CODEC_ERRORS.WRONG_SHARD_STATE_TAG,
      { tag },
    )
  }
  return {
    globalId: slice.loadInt(32),
    shardId: loadShardIdent(slice),
    seqNo: slice.loadUint(32),
    genUtime: slice.loadUint(32),
    genLt: slice.loadUintBig(64),
    accounts: slice.loadRef(),
    extra: slice.loadRef(),
  }
}

export function encodeShardState(state: ShardStateInput): Safe<Cell> {
  return encodeToCell('ShardStateUnsplit', storeShardState(state))
}

export function decodeShardState(
  root: Cell,
  loader: CellLoader = directLoader,
): Safe<ShardState> {
  return decodeFromCell('ShardStateUnsplit', root, loadShardState, loader)
}

export function readTotalBalance(
  state: ShardState,
  loader: CellLoader = directLoader,
): Safe<CurrencyCollection> {
  return decodeFromCell(
    'ShardStateUnsplit',
    state.extra,
    (slice) => loadCurrencyCollectionWith(slice, loader),
    loader,
  )
}

/**
 * Resolve the index entry for `accountId` under a shard state root
 * @returns null when the state has no entry for it
 */
export function getShardAccount(
  root: Cell,
  accountId: Buffer,
  loader: CellLoader = directLoader,
): Safe<ShardAccountRecord | null> {
  const [error, state] = decodeShardState(root, loader)
  if (error) {
    return safeError(error)
  }
  return lookupShardAccount(state.accounts, accountId, loader)
}
