/**
 * Structural equality for the account model.
 *
 * Cells compare by their level-0 hash, so two values are equal exactly when
 * they would serialize to the same bits and references, and a pruned branch
 * equals the subtree it stands for.
 */

import type {
  AccountData,
  AccountState,
  AccountStorage,
  StorageExtra,
  StorageInfo,
} from '@shard-ledger/types'
import { msgAddressEquals } from '@shard-ledger/codec'
import type { Cell, Dictionary, StateInit } from '@ton/core'
import { currenciesEqual } from './balance'

type Maybe<T> = T | null | undefined

function optionalEquals<T>(
  a: Maybe<T>,
  b: Maybe<T>,
  equals: (a: T, b: T) => boolean,
): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return (a ?? null) === (b ?? null)
  }
  return equals(a, b)
}

export function cellEquals(a: Cell, b: Cell): boolean {
  return a.hash(0).equals(b.hash(0))
}

function librariesEqual(
  a: Maybe<Dictionary<bigint, { public: boolean; root: Cell }>>,
  b: Maybe<Dictionary<bigint, { public: boolean; root: Cell }>>,
): boolean {
  const left = a?.size ? a : null
  const right = b?.size ? b : null
  return optionalEquals(left, right, (x, y) => {
    if (x.size !== y.size) {
      return false
    }
    for (const key of x.keys()) {
      const l = x.get(key)
      const r = y.get(key)
      if (!l || !r || l.public !== r.public || !cellEquals(l.root, r.root)) {
        return false
      }
    }
    return true
  })
}

export function stateInitEquals(a: StateInit, b: StateInit): boolean {
  return (
    (a.splitDepth ?? null) === (b.splitDepth ?? null) &&
    optionalEquals(
      a.special,
      b.special,
      (x, y) => x.tick === y.tick && x.tock === y.tock,
    ) &&
    optionalEquals(a.code, b.code, cellEquals) &&
    optionalEquals(a.data, b.data, cellEquals) &&
    librariesEqual(a.libraries, b.libraries)
  )
}

export function accountStateEquals(a: AccountState, b: AccountState): boolean {
  switch (a.type) {
    case 'uninit':
      return b.type === 'uninit'
    case 'frozen':
      return b.type === 'frozen' && a.stateInitHash.equals(b.stateInitHash)
    case 'active':
      return b.type === 'active' && stateInitEquals(a.stateInit, b.stateInit)
  }
}

function storageExtraEquals(a: StorageExtra, b: StorageExtra): boolean {
  if (a.type === 'dict' && b.type === 'dict') {
    return a.dictHash.equals(b.dictHash)
  }
  return a.type === b.type
}

export function storageInfoEquals(a: StorageInfo, b: StorageInfo): boolean {
  return (
    a.used.cells === b.used.cells &&
    a.used.bits === b.used.bits &&
    storageExtraEquals(a.used.extra, b.used.extra) &&
    a.lastPaid === b.lastPaid &&
    a.duePayment === b.duePayment
  )
}

export function accountStorageEquals(
  a: AccountStorage,
  b: AccountStorage,
): boolean {
  return (
    a.lastTransLt === b.lastTransLt &&
    currenciesEqual(a.balance, b.balance) &&
    accountStateEquals(a.state, b.state) &&
    optionalEquals(a.initCodeHash, b.initCodeHash, (x, y) => x.equals(y))
  )
}

export function accountDataEquals(a: AccountData, b: AccountData): boolean {
  if (a.type === 'none' || b.type === 'none') {
    return a.type === b.type
  }
  return (
    msgAddressEquals(a.stuff.address, b.stuff.address) &&
    storageInfoEquals(a.stuff.storageStat, b.stuff.storageStat) &&
    accountStorageEquals(a.stuff.storage, b.stuff.storage)
  )
}
