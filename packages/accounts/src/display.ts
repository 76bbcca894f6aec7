/**
 * Human-readable renderings used in logs and diagnostics
 */

import type {
  AccountData,
  AccountState,
  AccountStorage,
  StorageExtra,
  StorageInfo,
  StorageUsed,
  StorageUsedShort,
} from '@shard-ledger/types'
import { formatMsgAddressInt } from '@shard-ledger/codec'
import { hashToHex } from '@shard-ledger/core'
import type { Cell } from '@ton/core'
import { formatCurrencies } from './balance'
import type { ShardAccount } from './shard-account'

function formatCell(cell: Cell | null | undefined): string {
  return cell ? hashToHex(cell.hash()) : 'none'
}

export function formatStorageExtra(extra: StorageExtra): string {
  switch (extra.type) {
    case 'none':
      return 'none'
    case 'dict':
      return `dict(${hashToHex(extra.dictHash)})`
  }
}

export function formatStorageUsedShort(used: StorageUsedShort): string {
  return `cells: ${used.cells}, bits: ${used.bits}`
}

export function formatStorageUsed(used: StorageUsed): string {
  return `${formatStorageUsedShort(used)}, extra: ${formatStorageExtra(used.extra)}`
}

export function formatStorageInfo(info: StorageInfo): string {
  const due = info.duePayment === null ? 'none' : info.duePayment.toString()
  return `used: (${formatStorageUsed(info.used)}), last_paid: ${info.lastPaid}, due_payment: ${due}`
}

export function formatAccountState(state: AccountState): string {
  switch (state.type) {
    case 'uninit':
      return 'uninit'
    case 'frozen':
      return `frozen(${hashToHex(state.stateInitHash)})`
    case 'active': {
      const { code, data, libraries } = state.stateInit
      return `active(code: ${formatCell(code)}, data: ${formatCell(data)}, libraries: ${libraries?.size ?? 0})`
    }
  }
}

export function formatAccountStorage(storage: AccountStorage): string {
  const parts = [
    `last_trans_lt: ${storage.lastTransLt}`,
    `balance: ${formatCurrencies(storage.balance)}`,
    `state: ${formatAccountState(storage.state)}`,
  ]
  if (storage.initCodeHash) {
    parts.push(`init_code_hash: ${hashToHex(storage.initCodeHash)}`)
  }
  return parts.join(', ')
}

export function formatAccount(account: AccountData): string {
  if (account.type === 'none') {
    return 'Account(none)'
  }
  const { address, storageStat, storage } = account.stuff
  return `Account(${formatMsgAddressInt(address)}; ${formatStorageInfo(storageStat)}; ${formatAccountStorage(storage)})`
}

export function formatShardAccount(shardAccount: ShardAccount): string {
  return `ShardAccount(account: ${formatCell(shardAccount.accountCell)}, last_trans_hash: ${hashToHex(shardAccount.lastTransHash)}, last_trans_lt: ${shardAccount.lastTransLt})`
}
