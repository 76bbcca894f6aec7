/**
 * Account Data Model
 *
 * Persistent representation of a single ledger account inside a shard state.
 * Absence and lifecycle position are both tagged unions so every consumer
 * matches them exhaustively.
 *
 * TL-B reference:
 *
 *   account_none$0 = Account;
 *   account$1 addr:MsgAddressInt storage_stat:StorageInfo storage:AccountStorage = Account;
 *   account_storage$_ last_trans_lt:uint64 balance:CurrencyCollection state:AccountState
 *     init_code_hash:(Maybe uint256) = AccountStorage;
 *   account_uninit$00 = AccountState;
 *   account_active$1 _:StateInit = AccountState;
 *   account_frozen$01 state_hash:uint256 = AccountState;
 */

import type {
  Address,
  BitString,
  Cell,
  CurrencyCollection,
  StateInit,
} from '@ton/core'

/**
 * anycast_info$_ depth:(#<= 30) { depth >= 1 } rewrite_pfx:(bits depth)
 */
export interface AnycastInfo {
  depth: number
  rewritePrefix: BitString
}

/**
 * Internal message address: workchain + 256-bit account id, optional anycast.
 */
export interface MsgAddressInt {
  address: Address
  anycast: AnycastInfo | null
}

/**
 * Reserved extension tag carried by StorageUsed.
 */
export type StorageExtra =
  | { type: 'none' }
  | { type: 'dict'; dictHash: Buffer }

/**
 * Footprint summary: distinct cells and their total bit length.
 */
export interface StorageUsedShort {
  cells: bigint
  bits: bigint
}

export interface StorageUsed extends StorageUsedShort {
  extra: StorageExtra
}

/**
 * Rent bookkeeping maintained by the fee engine.
 */
export interface StorageInfo {
  used: StorageUsed
  /** unix time of the last storage payment (uint32) */
  lastPaid: number
  duePayment: bigint | null
}

export type AccountState =
  | { type: 'uninit' }
  | { type: 'active'; stateInit: StateInit }
  | { type: 'frozen'; stateInitHash: Buffer }

export type AccountStateType = AccountState['type']

export interface AccountStorage {
  lastTransLt: bigint
  balance: CurrencyCollection
  state: AccountState
  /** Hash of the code used at activation, pinned independently of later code changes */
  initCodeHash: Buffer | null
}

export interface AccountStuff {
  address: MsgAddressInt
  storageStat: StorageInfo
  storage: AccountStorage
}

export type AccountData =
  | { type: 'none' }
  | { type: 'account'; stuff: AccountStuff }

/**
 * Reporting enumeration, wire-encoded as a standalone 2-bit value.
 */
export enum AccountStatus {
  Uninit = 'uninit',
  Frozen = 'frozen',
  Active = 'active',
  NonExist = 'nonexist',
}

/**
 * Library entry stored in StateInit.library: simple_lib$_ public:Bool root:^Cell
 */
export interface LibraryEntry {
  public: boolean
  root: Cell
}

/**
 * account_descr$_ account:^Account last_trans_hash:bits256 last_trans_lt:uint64 = ShardAccount;
 */
export interface ShardAccountRecord {
  accountCell: Cell
  lastTransHash: Buffer
  lastTransLt: bigint
}

/**
 * depth_balance$_ split_depth:(#<= 30) balance:CurrencyCollection = DepthBalanceInfo;
 */
export interface DepthBalanceInfo {
  splitDepth: number
  balance: CurrencyCollection
}

/**
 * Shard identifier. `shard` is the 64-bit shard id including its tag bit,
 * 0x8000000000000000 covers the whole workchain.
 */
export interface ShardIdent {
  workchainId: number
  shard: bigint
}

/**
 * Storage statistics recomputation policy.
 *
 * - exact: hash-deduplicated walk over the distinct cell set
 * - fast: tree-wide count that counts shared subtrees once per reference
 */
export type StorageStatMode = 'exact' | 'fast'
