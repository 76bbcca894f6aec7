/**
 * ShardAccount: lazy reference to an account inside the shard index.
 *
 * Holds the account root cell plus last-transaction bookkeeping. The account
 * is only parsed by `readAccount`; equality and hashing work on the root hash.
 */

import {
  type CellLoader,
  type Safe,
  type ShardAccountRecord,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import {
  decodeShardAccountRecord,
  encodeShardAccountRecord,
} from '@shard-ledger/codec'
import { directLoader } from '@shard-ledger/core'
import type { Cell, Slice } from '@ton/core'
import { Account, type AccountOptions } from './account'
import { cellEquals } from './equality'

export class ShardAccount {
  private constructor(private record: ShardAccountRecord) {}

  static withAccountRoot(
    accountRoot: Cell,
    lastTransHash: Buffer,
    lastTransLt: bigint,
  ): ShardAccount {
    return new ShardAccount({
      accountCell: accountRoot,
      lastTransHash,
      lastTransLt,
    })
  }

  static withParams(
    account: Account,
    lastTransHash: Buffer,
    lastTransLt: bigint,
  ): Safe<ShardAccount> {
    const [error, accountRoot] = account.encode()
    if (error) {
      return safeError(error)
    }
    return safeResult(
      ShardAccount.withAccountRoot(accountRoot, lastTransHash, lastTransLt),
    )
  }

  static fromRecord(record: ShardAccountRecord): ShardAccount {
    return new ShardAccount({ ...record })
  }

  static decode(slice: Slice): Safe<ShardAccount> {
    const [error, record] = decodeShardAccountRecord(slice)
    if (error) {
      return safeError(error)
    }
    return safeResult(new ShardAccount(record))
  }

  /**
   * Parse the referenced account
   * @param loader - Loader used to open the account root
   */
  readAccount(
    options?: AccountOptions,
    loader: CellLoader = directLoader,
  ): Safe<Account> {
    return Account.decode(this.record.accountCell, options, loader)
  }

  /**
   * Serialize `account` and replace the held root. The reference is left
   * untouched if serialization fails.
   */
  writeAccount(account: Account): Safe<void> {
    const [error, accountRoot] = account.encode()
    if (error) {
      return safeError(error)
    }
    this.record.accountCell = accountRoot
    return safeResult(undefined)
  }

  get accountCell(): Cell {
    return this.record.accountCell
  }

  setAccountCell(cell: Cell): void {
    this.record.accountCell = cell
  }

  get lastTransHash(): Buffer {
    return this.record.lastTransHash
  }

  setLastTransHash(hash: Buffer): void {
    this.record.lastTransHash = hash
  }

  get lastTransLt(): bigint {
    return this.record.lastTransLt
  }

  setLastTransLt(lt: bigint): void {
    this.record.lastTransLt = lt
  }

  toRecord(): ShardAccountRecord {
    return { ...this.record }
  }

  encode(): Safe<Cell> {
    return encodeShardAccountRecord(this.record)
  }

  /**
   * Representation hash of the serialized record
   */
  hash(): Safe<Buffer> {
    const [error, cell] = this.encode()
    if (error) {
      return safeError(error)
    }
    return safeResult(cell.hash())
  }

  equals(other: ShardAccount): boolean {
    return (
      cellEquals(this.record.accountCell, other.record.accountCell) &&
      this.record.lastTransHash.equals(other.record.lastTransHash) &&
      this.record.lastTransLt === other.record.lastTransLt
    )
  }
}
