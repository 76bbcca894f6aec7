/**
 * Account State Model
 *
 * Lifecycle of a single ledger account:
 *
 *   None     absence marker, most mutators are no-ops on it
 *   Uninit   --activate (hash(StateInit) == address)-->   Active
 *   Frozen   --activate (hash(StateInit) == frozen hash)--> Active
 *   Active   --freeze--> Frozen     (StateInit replaced by its hash)
 *   Active   --uninit--> Uninit     (program discarded entirely)
 *
 * A mismatched StateInit during activation is a hard failure because it
 * would hand the address to unauthorized code. Activation of an already
 * active account and freeze/uninit of a non-active one succeed without
 * changing anything.
 *
 * Every mutation of a persisted AccountStorage field refreshes the storage
 * statistics with the configured footprint mode.
 */

import {
  ACCOUNT_ERRORS,
  type AccountData,
  type AccountState,
  AccountStatus,
  type AccountStorage,
  type AccountStuff,
  ActivationError,
  type CellLoader,
  type DepthBalanceInfo,
  type LibraryEntry,
  type MsgAddressInt,
  PreconditionError,
  type Safe,
  type ShardIdent,
  type StorageInfo,
  type StorageStatMode,
  type StorageUsed,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import {
  decodeAccount,
  emptyStorageInfo,
  encodeAccount,
  encodeAccountStorage,
  hashStateInit,
  msgAddressInt,
  shardContainsAddress,
} from '@shard-ledger/codec'
import {
  directLoader,
  getLedgerEnv,
  hashToHex,
  logger,
} from '@shard-ledger/core'
import {
  Address,
  type Cell,
  type CurrencyCollection,
  type Dictionary,
  type Message,
  type StateInit,
  type TickTock,
} from '@ton/core'
import {
  addCurrencies,
  copyCurrencies,
  currenciesEqual,
  isZeroCurrencies,
  subCurrencies,
  zeroCurrencies,
} from './balance'
import {
  copyAccountData,
  copyAccountState,
  copyAccountStorage,
  copyAccountStuff,
  copyLibraries,
  copyMsgAddressInt,
  copyStateInit,
  copyStorageInfo,
} from './copy'
import { accountDataEquals, cellEquals } from './equality'
import {
  calculateStorageUsedFor,
  calculateTreeStorageUsed,
} from './storage-used'

export interface AccountOptions {
  /** Footprint mode used when storage statistics are refreshed */
  storageStatMode?: StorageStatMode
}

type AddressInput = MsgAddressInt | Address

function toMsgAddress(address: AddressInput): MsgAddressInt {
  return address instanceof Address
    ? msgAddressInt(address)
    : copyMsgAddressInt(address)
}

function libraryKey(hash: Buffer): bigint {
  return BigInt(`0x${hash.toString('hex')}`)
}

function measureExact(storage: AccountStorage): Safe<StorageUsed> {
  return calculateStorageUsedFor(storage, encodeAccountStorage)
}

function measureFast(storage: AccountStorage): Safe<StorageUsed> {
  const [encodeError, root] = encodeAccountStorage(storage)
  if (encodeError) {
    return safeError(encodeError)
  }
  const [error, used] = calculateTreeStorageUsed(root)
  if (error) {
    return safeError(error)
  }
  const result: StorageUsed = { ...used, extra: { type: 'none' } }
  return safeResult(result)
}

function measure(
  storage: AccountStorage,
  mode: StorageStatMode,
): Safe<StorageUsed> {
  return mode === 'fast' ? measureFast(storage) : measureExact(storage)
}

export class Account {
  private inner: AccountData
  private readonly storageStatMode: StorageStatMode

  private constructor(data: AccountData, options: AccountOptions = {}) {
    this.inner = data
    this.storageStatMode =
      options.storageStatMode ?? getLedgerEnv().STORAGE_STAT_MODE
  }

  /**
   * Absent account
   */
  static none(options?: AccountOptions): Account {
    return new Account({ type: 'none' }, options)
  }

  /**
   * Wrap an already materialized account value as is
   */
  static fromData(data: AccountData, options?: AccountOptions): Account {
    return new Account(copyAccountData(data), options)
  }

  /**
   * Uninitialized account with zero balance. Storage statistics start empty.
   */
  static withAddress(address: AddressInput, options?: AccountOptions): Account {
    return Account.withAddressAndBalance(address, zeroCurrencies(), options)
  }

  /**
   * Uninitialized account holding `balance`. Storage statistics start empty.
   */
  static withAddressAndBalance(
    address: AddressInput,
    balance: CurrencyCollection,
    options?: AccountOptions,
  ): Account {
    return new Account(
      {
        type: 'account',
        stuff: {
          address: toMsgAddress(address),
          storageStat: emptyStorageInfo(),
          storage: {
            lastTransLt: 0n,
            balance: copyCurrencies(balance),
            state: { type: 'uninit' },
            initCodeHash: null,
          },
        },
      },
      options,
    )
  }

  /**
   * Uninitialized account with statistics for its single storage cell
   */
  static uninit(
    address: AddressInput,
    lastTransLt: bigint,
    lastPaid: number,
    balance: CurrencyCollection,
    options?: AccountOptions,
  ): Safe<Account> {
    const storage: AccountStorage = {
      lastTransLt,
      balance,
      state: { type: 'uninit' },
      initCodeHash: null,
    }
    return Account.withMeasuredStorage(
      address,
      storage,
      { lastPaid, duePayment: null },
      options,
    )
  }

  static frozen(
    address: AddressInput,
    lastTransLt: bigint,
    lastPaid: number,
    stateInitHash: Buffer,
    duePayment: bigint | null,
    balance: CurrencyCollection,
    options?: AccountOptions,
  ): Safe<Account> {
    const storage: AccountStorage = {
      lastTransLt,
      balance,
      state: { type: 'frozen', stateInitHash },
      initCodeHash: null,
    }
    return Account.withMeasuredStorage(
      address,
      storage,
      { lastPaid, duePayment },
      options,
    )
  }

  /**
   * Active account built directly from a StateInit
   * @param deriveInitCodeHash - Pin the hash of `stateInit.code`
   */
  static activeByInitCodeHash(
    address: AddressInput,
    balance: CurrencyCollection,
    lastPaid: number,
    stateInit: StateInit,
    deriveInitCodeHash: boolean,
    options?: AccountOptions,
  ): Safe<Account> {
    const storage: AccountStorage = {
      lastTransLt: 0n,
      balance,
      state: { type: 'active', stateInit: copyStateInit(stateInit) },
      initCodeHash:
        deriveInitCodeHash && stateInit.code ? stateInit.code.hash(0) : null,
    }
    return Account.withMeasuredStorage(
      address,
      storage,
      { lastPaid, duePayment: null },
      options,
    )
  }

  /**
   * Account assembled from parts; statistics are taken as given
   */
  static withStorage(
    address: AddressInput,
    storageStat: StorageInfo,
    storage: AccountStorage,
    options?: AccountOptions,
  ): Account {
    return new Account(
      {
        type: 'account',
        stuff: {
          address: toMsgAddress(address),
          storageStat: copyStorageInfo(storageStat),
          storage: copyAccountStorage(storage),
        },
      },
      options,
    )
  }

  /**
   * Materialize the account an inbound internal message would create.
   *
   * Returns null when no account results: the message is not internal, it
   * carries no coins, or it bounces without a StateInit. With a StateInit the
   * code must be present and the account starts active.
   */
  static fromMessage(
    message: Message,
    deriveInitCodeHash: boolean,
    options?: AccountOptions,
  ): Safe<Account | null> {
    const { info } = message
    if (info.type !== 'internal' || info.value.coins === 0n) {
      return safeResult(null)
    }

    let state: AccountState = { type: 'uninit' }
    let initCodeHash: Buffer | null = null
    if (message.init) {
      const { code } = message.init
      if (!code) {
        return safeResult(null)
      }
      state = { type: 'active', stateInit: copyStateInit(message.init) }
      initCodeHash = deriveInitCodeHash ? code.hash(0) : null
    } else if (info.bounce) {
      return safeResult(null)
    }

    const account = new Account(
      {
        type: 'account',
        stuff: {
          address: msgAddressInt(info.dest),
          storageStat: emptyStorageInfo(),
          storage: {
            lastTransLt: 0n,
            balance: copyCurrencies(info.value),
            state,
            initCodeHash,
          },
        },
      },
      options,
    )
    const [error] = account.updateStorageStat()
    if (error) {
      return safeError(error)
    }
    logger.debug('Account created from message', {
      address: info.dest.toRawString(),
      status: account.status(),
    })
    return safeResult(account)
  }

  /**
   * Parse an account from its root cell
   * @param loader - Loader used to open the root
   */
  static decode(
    cell: Cell,
    options?: AccountOptions,
    loader: CellLoader = directLoader,
  ): Safe<Account> {
    const [error, data] = decodeAccount(cell, loader)
    if (error) {
      return safeError(error)
    }
    return safeResult(new Account(data, options))
  }

  private static withMeasuredStorage(
    address: AddressInput,
    storage: AccountStorage,
    rent: Pick<StorageInfo, 'lastPaid' | 'duePayment'>,
    options?: AccountOptions,
  ): Safe<Account> {
    const account = Account.withStorage(
      address,
      { ...emptyStorageInfo(), ...rent },
      storage,
      options,
    )
    const [error] = account.updateStorageStat()
    if (error) {
      return safeError(error)
    }
    return safeResult(account)
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  /** Copy of the account value */
  get value(): AccountData {
    return copyAccountData(this.inner)
  }

  get stuff(): AccountStuff | null {
    const stuff = this.live
    return stuff ? copyAccountStuff(stuff) : null
  }

  /** The stored value itself, for mutators */
  private get live(): AccountStuff | null {
    return this.inner.type === 'account' ? this.inner.stuff : null
  }

  isNone(): boolean {
    return this.inner.type === 'none'
  }

  get address(): MsgAddressInt | null {
    const stuff = this.live
    return stuff ? copyMsgAddressInt(stuff.address) : null
  }

  /** 256-bit account id */
  get id(): Buffer | null {
    const hash = this.live?.address.address.hash
    return hash ? Buffer.from(hash) : null
  }

  get storageInfo(): StorageInfo | null {
    const stuff = this.live
    return stuff ? copyStorageInfo(stuff.storageStat) : null
  }

  get state(): AccountState | null {
    const stuff = this.live
    return stuff ? copyAccountState(stuff.storage.state) : null
  }

  private get liveStateInit(): StateInit | null {
    const state = this.live?.storage.state
    return state?.type === 'active' ? state.stateInit : null
  }

  get stateInit(): StateInit | null {
    const stateInit = this.liveStateInit
    return stateInit ? copyStateInit(stateInit) : null
  }

  get frozenHash(): Buffer | null {
    const state = this.live?.storage.state
    return state?.type === 'frozen' ? Buffer.from(state.stateInitHash) : null
  }

  get initCodeHash(): Buffer | null {
    const hash = this.live?.storage.initCodeHash
    return hash ? Buffer.from(hash) : null
  }

  get code(): Cell | null {
    return this.liveStateInit?.code ?? null
  }

  get codeHash(): Buffer | null {
    return this.code?.hash(0) ?? null
  }

  get data(): Cell | null {
    return this.liveStateInit?.data ?? null
  }

  get dataHash(): Buffer | null {
    return this.data?.hash(0) ?? null
  }

  get libraries(): Dictionary<bigint, LibraryEntry> {
    return copyLibraries(this.liveStateInit?.libraries)
  }

  get tickTock(): TickTock | null {
    const special = this.liveStateInit?.special
    return special ? { ...special } : null
  }

  get splitDepth(): number | null {
    return this.liveStateInit?.splitDepth ?? null
  }

  get lastPaid(): number {
    return this.live?.storageStat.lastPaid ?? 0
  }

  get duePayment(): bigint | null {
    return this.live?.storageStat.duePayment ?? null
  }

  get balance(): CurrencyCollection | null {
    const stuff = this.live
    return stuff ? copyCurrencies(stuff.storage.balance) : null
  }

  /** Balance, or zero for an absent account */
  get balanceChecked(): CurrencyCollection {
    return this.balance ?? zeroCurrencies()
  }

  get lastTransLt(): bigint | null {
    return this.live?.storage.lastTransLt ?? null
  }

  status(): AccountStatus {
    const state = this.live?.storage.state
    if (!state) {
      return AccountStatus.NonExist
    }
    switch (state.type) {
      case 'uninit':
        return AccountStatus.Uninit
      case 'frozen':
        return AccountStatus.Frozen
      case 'active':
        return AccountStatus.Active
    }
  }

  /**
   * Augmentation stored next to this account in the shard index
   */
  depthBalanceInfo(): DepthBalanceInfo {
    return {
      splitDepth: this.splitDepth ?? 0,
      balance: this.balanceChecked,
    }
  }

  belongsToShard(shard: ShardIdent): Safe<boolean> {
    const address = this.live?.address
    if (!address) {
      return safeError(
        new PreconditionError(
          'account is None',
          ACCOUNT_ERRORS.ACCOUNT_NONE,
        ),
      )
    }
    return safeResult(shardContainsAddress(shard, address.address))
  }

  // ---------------------------------------------------------------------------
  // Storage statistics
  // ---------------------------------------------------------------------------

  /**
   * Recompute the exact, hash-deduplicated footprint of the account storage
   */
  updateStorageStat(): Safe<void> {
    return this.refreshStorageStat('exact')
  }

  /**
   * Recompute the footprint with tree-wide counts; shared cells are counted
   * once per reference
   */
  updateStorageStatFast(): Safe<void> {
    return this.refreshStorageStat('fast')
  }

  private refreshStorageStat(mode: StorageStatMode): Safe<void> {
    const stuff = this.live
    if (!stuff) {
      return safeResult(undefined)
    }
    const [error, used] = measure(stuff.storage, mode)
    if (error) {
      return safeError(error)
    }
    stuff.storageStat.used = used
    return safeResult(undefined)
  }

  /**
   * Replace the persisted storage and refresh statistics. Nothing changes if
   * the footprint cannot be measured.
   */
  private commitStorage(stuff: AccountStuff, storage: AccountStorage): Safe<void> {
    const [error, used] = measure(storage, this.storageStatMode)
    if (error) {
      return safeError(error)
    }
    stuff.storage = storage
    stuff.storageStat.used = used
    return safeResult(undefined)
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Activate an uninitialized or frozen account
   * @param deriveInitCodeHash - Pin the hash of the activating code
   */
  tryActivate(stateInit: StateInit, deriveInitCodeHash: boolean): Safe<void> {
    const stuff = this.live
    if (!stuff) {
      return safeError(
        new PreconditionError(
          'cannot activate an account that does not exist',
          ACCOUNT_ERRORS.ACCOUNT_NONE,
        ),
      )
    }
    const { state } = stuff.storage
    if (state.type === 'active') {
      return safeResult(undefined)
    }

    const [hashError, hash] = hashStateInit(stateInit)
    if (hashError) {
      return safeError(hashError)
    }

    const expected =
      state.type === 'uninit' ? stuff.address.address.hash : state.stateInitHash
    if (!hash.equals(expected)) {
      const error =
        state.type === 'uninit'
          ? new ActivationError(
              "StateInit doesn't correspond to uninit account address",
              ACCOUNT_ERRORS.STATE_INIT_ADDRESS_MISMATCH,
              { expected: hashToHex(expected), actual: hashToHex(hash) },
            )
          : new ActivationError(
              "StateInit doesn't correspond to frozen hash",
              ACCOUNT_ERRORS.STATE_INIT_FROZEN_HASH_MISMATCH,
              { expected: hashToHex(expected), actual: hashToHex(hash) },
            )
      logger.warn('Activation rejected', {
        address: stuff.address.address.toRawString(),
        from: state.type,
        reason: error.code,
      })
      return safeError(error)
    }

    const [error] = this.commitStorage(stuff, {
      ...stuff.storage,
      state: { type: 'active', stateInit: copyStateInit(stateInit) },
      initCodeHash:
        deriveInitCodeHash && stateInit.code ? stateInit.code.hash(0) : null,
    })
    if (error) {
      return safeError(error)
    }
    logger.debug('Account activated', {
      address: stuff.address.address.toRawString(),
      from: state.type,
    })
    return safeResult(undefined)
  }

  /**
   * Freeze an active account, keeping only the hash of its StateInit
   */
  tryFreeze(): Safe<void> {
    const stuff = this.live
    if (!stuff || stuff.storage.state.type !== 'active') {
      return safeResult(undefined)
    }
    const [hashError, stateInitHash] = hashStateInit(
      stuff.storage.state.stateInit,
    )
    if (hashError) {
      return safeError(hashError)
    }
    const [error] = this.commitStorage(stuff, {
      ...stuff.storage,
      state: { type: 'frozen', stateInitHash },
    })
    if (error) {
      return safeError(error)
    }
    logger.debug('Account frozen', {
      address: stuff.address.address.toRawString(),
      stateInitHash: hashToHex(stateInitHash),
    })
    return safeResult(undefined)
  }

  /**
   * Drop the program of an active account entirely
   */
  uninit(): Safe<void> {
    const stuff = this.live
    if (!stuff || stuff.storage.state.type !== 'active') {
      return safeResult(undefined)
    }
    const [error] = this.commitStorage(stuff, {
      ...stuff.storage,
      state: { type: 'uninit' },
    })
    if (error) {
      return safeError(error)
    }
    logger.debug('Account reset to uninit', {
      address: stuff.address.address.toRawString(),
    })
    return safeResult(undefined)
  }

  // ---------------------------------------------------------------------------
  // Balance
  // ---------------------------------------------------------------------------

  addFunds(funds: CurrencyCollection): Safe<void> {
    const stuff = this.live
    if (!stuff || isZeroCurrencies(funds)) {
      return safeResult(undefined)
    }
    return this.commitStorage(stuff, {
      ...stuff.storage,
      balance: addCurrencies(stuff.storage.balance, funds),
    })
  }

  /**
   * @returns false, leaving the balance untouched, when funds are short
   */
  subFunds(funds: CurrencyCollection): Safe<boolean> {
    const stuff = this.live
    if (!stuff) {
      return safeResult(false)
    }
    const balance = subCurrencies(stuff.storage.balance, funds)
    if (!balance) {
      return safeResult(false)
    }
    if (isZeroCurrencies(funds)) {
      return safeResult(true)
    }
    const [error] = this.commitStorage(stuff, { ...stuff.storage, balance })
    if (error) {
      return safeError(error)
    }
    return safeResult(true)
  }

  setBalance(balance: CurrencyCollection): Safe<void> {
    const stuff = this.live
    if (!stuff || currenciesEqual(stuff.storage.balance, balance)) {
      return safeResult(undefined)
    }
    return this.commitStorage(stuff, {
      ...stuff.storage,
      balance: copyCurrencies(balance),
    })
  }

  setLastTransLt(lastTransLt: bigint): Safe<void> {
    const stuff = this.live
    if (!stuff || stuff.storage.lastTransLt === lastTransLt) {
      return safeResult(undefined)
    }
    return this.commitStorage(stuff, { ...stuff.storage, lastTransLt })
  }

  // Rent bookkeeping lives in StorageInfo and does not affect the footprint

  setLastPaid(lastPaid: number): void {
    const stuff = this.live
    if (stuff) {
      stuff.storageStat.lastPaid = lastPaid
    }
  }

  setDuePayment(duePayment: bigint | null): void {
    const stuff = this.live
    if (stuff) {
      stuff.storageStat.duePayment = duePayment
    }
  }

  // ---------------------------------------------------------------------------
  // Program
  // ---------------------------------------------------------------------------

  /**
   * Apply `update` to the StateInit of an active account.
   * @returns false when the account is not active
   */
  private updateStateInit(
    update: (stateInit: StateInit) => StateInit | null,
  ): Safe<boolean> {
    const stuff = this.live
    if (!stuff || stuff.storage.state.type !== 'active') {
      return safeResult(false)
    }
    const next = update(stuff.storage.state.stateInit)
    if (!next) {
      return safeResult(true)
    }
    const [error] = this.commitStorage(stuff, {
      ...stuff.storage,
      state: { type: 'active', stateInit: next },
    })
    if (error) {
      return safeError(error)
    }
    return safeResult(true)
  }

  setCode(code: Cell): Safe<boolean> {
    return this.updateStateInit((stateInit) =>
      stateInit.code && cellEquals(stateInit.code, code)
        ? null
        : { ...stateInit, code },
    )
  }

  setData(data: Cell): Safe<boolean> {
    return this.updateStateInit((stateInit) =>
      stateInit.data && cellEquals(stateInit.data, data)
        ? null
        : { ...stateInit, data },
    )
  }

  /**
   * Add or replace a library keyed by the hash of its root
   */
  setLibrary(root: Cell, isPublic: boolean): Safe<boolean> {
    const key = libraryKey(root.hash())
    return this.updateStateInit((stateInit) => {
      const existing = stateInit.libraries?.get(key)
      if (existing && existing.public === isPublic) {
        return null
      }
      const libraries = copyLibraries(stateInit.libraries)
      libraries.set(key, { public: isPublic, root })
      return { ...stateInit, libraries }
    })
  }

  /**
   * @returns false when no library with this hash exists
   */
  setLibraryFlag(hash: Buffer, isPublic: boolean): Safe<boolean> {
    const key = libraryKey(hash)
    const existing = this.liveStateInit?.libraries?.get(key)
    if (!existing) {
      return safeResult(false)
    }
    return this.updateStateInit((stateInit) => {
      if (existing.public === isPublic) {
        return null
      }
      const libraries = copyLibraries(stateInit.libraries)
      libraries.set(key, { public: isPublic, root: existing.root })
      return { ...stateInit, libraries }
    })
  }

  deleteLibrary(hash: Buffer): Safe<boolean> {
    const key = libraryKey(hash)
    return this.updateStateInit((stateInit) => {
      if (!stateInit.libraries?.has(key)) {
        return null
      }
      const libraries = copyLibraries(stateInit.libraries)
      libraries.delete(key)
      return { ...stateInit, libraries }
    })
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  encode(): Safe<Cell> {
    return encodeAccount(this.inner)
  }

  equals(other: Account): boolean {
    return accountDataEquals(this.inner, other.inner)
  }
}
