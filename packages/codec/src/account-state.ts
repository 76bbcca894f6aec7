/**
 * AccountState
 *
 * account_uninit$00 = AccountState;
 * account_active$1 _:StateInit = AccountState;
 * account_frozen$01 state_hash:uint256 = AccountState;
 *
 * Prefix-free code: the common active case costs a single bit.
 */

import type { AccountState, CellLoader, Safe } from '@shard-ledger/types'
import { directLoader } from '@shard-ledger/core'
import { type Builder, type Cell, type Slice, storeStateInit } from '@ton/core'
import { decodeFromSlice, encodeToCell } from './core/boundary'
import { loadHash256, storeHash256 } from './core/maybe'
import { loadStateInitWith } from './state-init'

export function storeAccountState(state: AccountState) {
  return (builder: Builder) => {
    switch (state.type) {
      case 'uninit':
        builder.storeUint(0b00, 2)
        break
      case 'frozen':
        builder.storeUint(0b01, 2)
        builder.store(storeHash256(state.stateInitHash))
        break
      case 'active':
        builder.storeBit(true)
        builder.store(storeStateInit(state.stateInit))
        break
    }
  }
}

export function loadAccountState(
  slice: Slice,
  loader: CellLoader = directLoader,
): AccountState {
  if (slice.loadBit()) {
    return { type: 'active', stateInit: loadStateInitWith(slice, loader) }
  }
  if (slice.loadBit()) {
    return { type: 'frozen', stateInitHash: loadHash256(slice) }
  }
  return { type: 'uninit' }
}

export function encodeAccountState(state: AccountState): Safe<Cell> {
  return encodeToCell('AccountState', storeAccountState(state))
}

export function decodeAccountState(slice: Slice): Safe<AccountState> {
  return decodeFromSlice('AccountState', slice, (s) => loadAccountState(s))
}
