/**
 * Account
 *
 * Original format:
 *   account_none$0 = Account;
 *   account$1 addr:MsgAddressInt storage_stat:StorageInfo
 *     last_trans_lt:uint64 balance:CurrencyCollection state:AccountState = Account;
 *
 * Extended format:
 *   account_none#0 = Account;                      (0 000)
 *   account#1 stuff:AccountStuff = Account;        (0 001)
 *   addr:MsgAddressInt storage_stat:StorageInfo storage:AccountStorage = AccountStuff;
 *   account_storage$_ last_trans_lt:uint64 balance:CurrencyCollection
 *     state:AccountState init_code_hash:(Maybe uint256) = AccountStorage;
 *
 * The extended layout is only written when init_code_hash is present so
 * every other account stays readable by original-format consumers. A lone
 * zero bit and a zero bit followed by tag 000 both read as no account; any
 * other tag is an unknown future format and is rejected.
 */

import {
  type AccountData,
  type AccountStorage,
  type AccountStuff,
  CODEC_ERRORS,
  type CellLoader,
  DecodeError,
  type Safe,
} from '@shard-ledger/types'
import {
  type Builder,
  type Cell,
  type Slice,
  storeCurrencyCollection,
} from '@ton/core'
import { directLoader } from '@shard-ledger/core'
import { loadMsgAddressInt, storeMsgAddressInt } from './address'
import { loadAccountState, storeAccountState } from './account-state'
import { decodeFromCell, encodeToCell } from './core/boundary'
import { loadCurrencyCollectionWith } from './currency'
import { loadHash256, loadMaybe, storeHash256 } from './core/maybe'
import { loadStorageInfo, storeStorageInfo } from './storage'

const ACCOUNT_TAG_NONE = 0b000
const ACCOUNT_TAG_EXTENDED = 0b001

/**
 * AccountStorage as it is hashed for storage statistics. init_code_hash is
 * written as `1 hash` when present and omitted otherwise.
 */
export function storeAccountStorage(storage: AccountStorage) {
  return (builder: Builder) => {
    builder.storeUint(storage.lastTransLt, 64)
    builder.store(storeCurrencyCollection(storage.balance))
    builder.store(storeAccountState(storage.state))
    if (storage.initCodeHash) {
      builder.storeBit(true)
      builder.store(storeHash256(storage.initCodeHash))
    }
  }
}

export function storeAccountStuff(stuff: AccountStuff) {
  return (builder: Builder) => {
    builder.store(storeMsgAddressInt(stuff.address))
    builder.store(storeStorageInfo(stuff.storageStat))
    builder.store(storeAccountStorage(stuff.storage))
  }
}

/**
 * Original layout; cannot represent init_code_hash.
 */
export function storeAccountOriginal(account: AccountData) {
  return (builder: Builder) => {
    if (account.type === 'none') {
      builder.storeBit(false)
      return
    }
    const { stuff } = account
    builder.storeBit(true)
    builder.store(storeMsgAddressInt(stuff.address))
    builder.store(storeStorageInfo(stuff.storageStat))
    builder.storeUint(stuff.storage.lastTransLt, 64)
    builder.store(storeCurrencyCollection(stuff.storage.balance))
    builder.store(storeAccountState(stuff.storage.state))
  }
}

export function storeAccount(account: AccountData) {
  return (builder: Builder) => {
    if (account.type === 'account' && account.stuff.storage.initCodeHash) {
      builder.storeUint(ACCOUNT_TAG_EXTENDED, 4)
      builder.store(storeAccountStuff(account.stuff))
      return
    }
    builder.store(storeAccountOriginal(account))
  }
}

function loadOriginalFormat(slice: Slice, loader: CellLoader): AccountData {
  const address = loadMsgAddressInt(slice)
  const storageStat = loadStorageInfo(slice)
  const lastTransLt = slice.loadUintBig(64)
  const balance = loadCurrencyCollectionWith(slice, loader)
  const state = loadAccountState(slice, loader)
  return {
    type: 'account',
    stuff: {
      address,
      storageStat,
      storage: { lastTransLt, balance, state, initCodeHash: null },
    },
  }
}

function loadExtendedFormat(slice: Slice, loader: CellLoader): AccountData {
  const address = loadMsgAddressInt(slice)
  const storageStat = loadStorageInfo(slice)
  const lastTransLt = slice.loadUintBig(64)
  const balance = loadCurrencyCollectionWith(slice, loader)
  const state = loadAccountState(slice, loader)
  const initCodeHash = loadMaybe(slice, loadHash256)
  return {
    type: 'account',
    stuff: {
      address,
      storageStat,
      storage: { lastTransLt, balance, state, initCodeHash },
    },
  }
}

/**
 * @param loader - Opens the dictionaries held by the balance and StateInit
 */
export function loadAccount(
  slice: Slice,
  loader: CellLoader = directLoader,
): AccountData {
  if (slice.loadBit()) {
    return loadOriginalFormat(slice, loader)
  }
  if (slice.remainingBits === 0) {
    return { type: 'none' }
  }
  const tag = slice.loadUint(3)
  switch (tag) {
    case ACCOUNT_TAG_NONE:
      return { type: 'none' }
    case ACCOUNT_TAG_EXTENDED:
      return loadExtendedFormat(slice, loader)
    default:
      throw new DecodeError(
        `wrong tag ${tag.toString(2).padStart(3, '0')} deserializing Account`,
        CODEC_ERRORS.WRONG_ACCOUNT_TAG,
        { tag },
      )
  }
}

export function encodeAccountStorage(storage: AccountStorage): Safe<Cell> {
  return encodeToCell('AccountStorage', storeAccountStorage(storage))
}

export function encodeAccount(account: AccountData): Safe<Cell> {
  return encodeToCell('Account', storeAccount(account))
}

/**
 * Decode an account from its root cell.
 * @param loader - Loader used to open the root, e.g. a usage tree
 */
export function decodeAccount(
  cell: Cell,
  loader: CellLoader = directLoader,
): Safe<AccountData> {
  return decodeFromCell(
    'Account',
    cell,
    (slice) => loadAccount(slice, loader),
    loader,
  )
}
