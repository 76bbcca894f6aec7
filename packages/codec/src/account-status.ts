/**
 * AccountStatus
 *
 * acc_state_uninit$00 = AccountStatus;
 * acc_state_frozen$01 = AccountStatus;
 * acc_state_active$10 = AccountStatus;
 * acc_state_nonexist$11 = AccountStatus;
 *
 * Fixed two-bit encoding used for reporting, independent of the prefix code
 * that AccountState uses inside account storage.
 */

import { AccountStatus, type Safe } from '@shard-ledger/types'
import type { Builder, Cell, Slice } from '@ton/core'
import { decodeFromSlice, encodeToCell } from './core/boundary'

const STATUS_BITS: Record<AccountStatus, number> = {
  [AccountStatus.Uninit]: 0b00,
  [AccountStatus.Frozen]: 0b01,
  [AccountStatus.Active]: 0b10,
  [AccountStatus.NonExist]: 0b11,
}

const STATUS_BY_BITS: readonly AccountStatus[] = [
  AccountStatus.Uninit,
  AccountStatus.Frozen,
  AccountStatus.Active,
  AccountStatus.NonExist,
]

export function storeAccountStatus(status: AccountStatus) {
  return (builder: Builder) => {
    builder.storeUint(STATUS_BITS[status], 2)
  }
}

export function loadAccountStatus(slice: Slice): AccountStatus {
  // every 2-bit value is a valid status
  return STATUS_BY_BITS[slice.loadUint(2)]
}

export function encodeAccountStatus(status: AccountStatus): Safe<Cell> {
  return encodeToCell('AccountStatus', storeAccountStatus(status))
}

export function decodeAccountStatus(slice: Slice): Safe<AccountStatus> {
  return decodeFromSlice('AccountStatus', slice, loadAccountStatus)
}
