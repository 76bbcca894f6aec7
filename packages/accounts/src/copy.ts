/**
 * Deep copies of account values.
 *
 * An Account never shares mutable state with its callers: values passed in
 * are copied before they are stored, and values handed out are copies. Cells,
 * addresses and bit strings are immutable and shared as is.
 */

import type {
  AccountData,
  AccountState,
  AccountStorage,
  AccountStuff,
  LibraryEntry,
  MsgAddressInt,
  StorageInfo,
} from '@shard-ledger/types'
import { emptyLibraries } from '@shard-ledger/codec'
import type { Dictionary, StateInit } from '@ton/core'
import { copyCurrencies } from './balance'

export function copyLibraries(
  source: StateInit['libraries'],
): Dictionary<bigint, LibraryEntry> {
  const copy = emptyLibraries()
  if (source) {
    for (const key of source.keys()) {
      const entry = source.get(key)
      if (entry) {
        copy.set(key, { public: entry.public, root: entry.root })
      }
    }
  }
  return copy
}

export function copyStateInit(stateInit: StateInit): StateInit {
  return {
    splitDepth: stateInit.splitDepth,
    special: stateInit.special ? { ...stateInit.special } : stateInit.special,
    code: stateInit.code,
    data: stateInit.data,
    libraries: stateInit.libraries
      ? copyLibraries(stateInit.libraries)
      : stateInit.libraries,
  }
}

export function copyAccountState(state: AccountState): AccountState {
  switch (state.type) {
    case 'uninit':
      return { type: 'uninit' }
    case 'frozen':
      return { type: 'frozen', stateInitHash: Buffer.from(state.stateInitHash) }
    case 'active':
      return { type: 'active', stateInit: copyStateInit(state.stateInit) }
  }
}

export function copyMsgAddressInt(address: MsgAddressInt): MsgAddressInt {
  return {
    address: address.address,
    anycast: address.anycast ? { ...address.anycast } : null,
  }
}

export function copyStorageInfo(info: StorageInfo): StorageInfo {
  const { extra } = info.used
  return {
    used: {
      cells: info.used.cells,
      bits: info.used.bits,
      extra:
        extra.type === 'dict'
          ? { type: 'dict', dictHash: Buffer.from(extra.dictHash) }
          : { type: 'none' },
    },
    lastPaid: info.lastPaid,
    duePayment: info.duePayment,
  }
}

export function copyAccountStorage(storage: AccountStorage): AccountStorage {
  return {
    lastTransLt: storage.lastTransLt,
    balance: copyCurrencies(storage.balance),
    state: copyAccountState(storage.state),
    initCodeHash: storage.initCodeHash ? Buffer.from(storage.initCodeHash) : null,
  }
}

export function copyAccountStuff(stuff: AccountStuff): AccountStuff {
  return {
    address: copyMsgAddressInt(stuff.address),
    storageStat: copyStorageInfo(stuff.storageStat),
    storage: copyAccountStorage(stuff.storage),
  }
}

export function copyAccountData(data: AccountData): AccountData {
  return data.type === 'none'
    ? { type: 'none' }
    : { type: 'account', stuff: copyAccountStuff(data.stuff) }
}
