/**
 * Shard account index
 *
 * _ (HashmapAugE 256 ShardAccount DepthBalanceInfo) = ShardAccounts;
 *
 * ahm_edge#_ label:(HmLabel ~l n) node:(HashmapAugNode m X Y) = HashmapAug n X Y;
 * ahmn_leaf#_ extra:Y value:X = HashmapAugNode 0 X Y;
 * ahmn_fork#_ left:^(HashmapAug n X Y) right:^(HashmapAug n X Y) extra:Y
 *   = HashmapAugNode (n + 1) X Y;
 * ahme_empty$0 extra:Y = HashmapAugE n X Y;
 * ahme_root$1 root:^(HashmapAug n X Y) extra:Y = HashmapAugE n X Y;
 *
 * Keys are 256-bit account ids. Every fork carries the sum of the balances
 * below it, so the root extra is the total balance of the shard.
 */

import {
  CODEC_ERRORS,
  type CellLoader,
  type DepthBalanceInfo,
  EncodeError,
  type Safe,
  type ShardAccountRecord,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import { addCurrencies, type Account, ShardAccount } from '@shard-ledger/accounts'
import {
  decodeFromCell,
  encodeToCell,
  loadDepthBalanceInfo,
  loadHashmapLabel,
  loadShardAccountRecord,
  storeDepthBalanceInfo,
  storeHashmapLabel,
  storeShardAccountRecord,
} from '@shard-ledger/codec'
import { directLoader } from '@shard-ledger/core'
import { beginCell, type Builder, type Cell, type Slice } from '@ton/core'

const KEY_BITS = 256

export interface ShardAccountEntry {
  accountId: Buffer
  record: ShardAccountRecord
  extra: DepthBalanceInfo
}

export interface ShardAccountsIndex {
  cell: Cell
  /** Augmentation of the whole index */
  extra: DepthBalanceInfo
}

interface KeyedEntry {
  key: string
  entry: ShardAccountEntry
}

interface Subtree {
  cell: Cell
  extra: DepthBalanceInfo
}

export function emptyDepthBalanceInfo(): DepthBalanceInfo {
  return { splitDepth: 0, balance: { coins: 0n } }
}

/**
 * Fork augmentation: balances add up, split depth follows the left branch
 */
export function mergeDepthBalanceInfo(
  left: DepthBalanceInfo,
  right: DepthBalanceInfo,
): DepthBalanceInfo {
  return {
    splitDepth: left.splitDepth,
    balance: addCurrencies(left.balance, right.balance),
  }
}

function keyBits(accountId: Buffer): string {
  let out = ''
  for (const byte of accountId) {
    out += byte.toString(2).padStart(8, '0')
  }
  return out
}

function commonPrefixLength(keys: string[]): number {
  const first = keys[0]
  const last = keys[keys.length - 1]
  let length = 0
  while (length < first.length && first[length] === last[length]) {
    length++
  }
  return length
}

/**
 * Build one edge over entries sorted by key, all sharing `n` remaining bits
 */
function buildEdge(entries: KeyedEntry[], n: number): Subtree {
  if (entries.length === 1) {
    const [{ key, entry }] = entries
    const cell = beginCell()
      .store(storeHashmapLabel(key, n))
      .store(storeDepthBalanceInfo(entry.extra))
      .store(storeShardAccountRecord(entry.record))
      .endCell()
    return { cell, extra: entry.extra }
  }

  // sorted keys: the common prefix of all is that of the first and last
  const prefix = commonPrefixLength(entries.map((e) => e.key))
  const label = entries[0].key.slice(0, prefix)
  const rest = (bit: string) =>
    entries
      .filter((e) => e.key[prefix] === bit)
      .map((e) => ({ key: e.key.slice(prefix + 1), entry: e.entry }))

  const childBits = n - prefix - 1
  const left = buildEdge(rest('0'), childBits)
  const right = buildEdge(rest('1'), childBits)
  const extra = mergeDepthBalanceInfo(left.extra, right.extra)

  const cell = beginCell()
    .store(storeHashmapLabel(label, n))
    .storeRef(left.cell)
    .storeRef(right.cell)
    .store(storeDepthBalanceInfo(extra))
    .endCell()
  return { cell, extra }
}

function storeIndexRoot(root: Subtree | null) {
  return (builder: Builder) => {
    if (!root) {
      builder.storeBit(false)
      builder.store(storeDepthBalanceInfo(emptyDepthBalanceInfo()))
      return
    }
    builder.storeBit(true)
    builder.storeRef(root.cell)
    builder.store(storeDepthBalanceInfo(root.extra))
  }
}

/**
 * Serialize an index over the given entries
 */
export function buildShardAccounts(
  entries: ShardAccountEntry[],
): Safe<ShardAccountsIndex> {
  const keyed = entries
    .map((entry) => ({ key: keyBits(entry.accountId), entry }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))

  for (let i = 0; i < keyed.length; i++) {
    if (keyed[i].key.length !== KEY_BITS) {
      return safeError(
        new EncodeError(
          `account id must be ${KEY_BITS / 8} bytes`,
          CODEC_ERRORS.VALUE_OUT_OF_RANGE,
        ),
      )
    }
    if (i > 0 && keyed[i - 1].key === keyed[i].key) {
      return safeError(
        new EncodeError(
          `duplicate account id ${keyed[i].entry.accountId.toString('hex')}`,
          CODEC_ERRORS.VALUE_OUT_OF_RANGE,
        ),
      )
    }
  }

  let root: Subtree | null = null
  if (keyed.length > 0) {
    const [error, built] = encodeRoot(keyed)
    if (error) {
      return safeError(error)
    }
    root = built
  }

  const [error, cell] = encodeToCell('ShardAccounts', storeIndexRoot(root))
  if (error) {
    return safeError(error)
  }
  return safeResult({ cell, extra: root?.extra ?? emptyDepthBalanceInfo() })
}

function encodeRoot(keyed: KeyedEntry[]): Safe<Subtree> {
  try {
    return safeResult(buildEdge(keyed, KEY_BITS))
  } catch (error) {
    if (error instanceof EncodeError) {
      return safeError(error)
    }
    const message = error instanceof Error ? error.message : String(error)
    return safeError(
      new EncodeError(
        `cannot serialize ShardAccounts: ${message}`,
        CODEC_ERRORS.ENCODE_FAILED,
      ),
    )
  }
}

/**
 * Index entry for an account, keyed by its id and augmented with its
 * balance. Absent accounts have no id and cannot be indexed.
 */
export function shardAccountEntry(
  account: Account,
  lastTransHash: Buffer,
  lastTransLt: bigint,
): Safe<ShardAccountEntry> {
  const accountId = account.id
  if (!accountId) {
    return safeError(
      new EncodeError(
        'an absent account has no index key',
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      ),
    )
  }
  const [error, shardAccount] = ShardAccount.withParams(
    account,
    lastTransHash,
    lastTransLt,
  )
  if (error) {
    return safeError(error)
  }
  return safeResult({
    accountId,
    record: shardAccount.toRecord(),
    extra: account.depthBalanceInfo(),
  })
}

function lookup(
  slice: Slice,
  accountId: Buffer,
  loader: CellLoader,
): ShardAccountRecord | null {
  if (!slice.loadBit()) {
    return null
  }
  let key = keyBits(accountId)
  let remaining = KEY_BITS
  let edge = slice.loadRef()

  for (;;) {
    const node = loader.load(edge)
    const label = loadHashmapLabel(node, remaining)
    if (!key.startsWith(label)) {
      return null
    }
    key = key.slice(label.length)
    remaining -= label.length
    if (remaining === 0) {
      loadDepthBalanceInfo(node, loader)
      return loadShardAccountRecord(node)
    }
    const left = node.loadRef()
    const right = node.loadRef()
    edge = key[0] === '0' ? left : right
    key = key.slice(1)
    remaining -= 1
  }
}

/**
 * Find the entry for `accountId`. Only the cells on the path to it are
 * opened through `loader`.
 * @returns null when the id is not in the index
 */
export function lookupShardAccount(
  accountsCell: Cell,
  accountId: Buffer,
  loader: CellLoader = directLoader,
): Safe<ShardAccountRecord | null> {
  if (accountId.length !== KEY_BITS / 8) {
    return safeResult(null)
  }
  return decodeFromCell(
    'ShardAccounts',
    accountsCell,
    (slice) => lookup(slice, accountId, loader),
    loader,
  )
}

function collect(
  edge: Cell,
  prefix: string,
  remaining: number,
  loader: CellLoader,
  out: ShardAccountEntry[],
) {
  const node = loader.load(edge)
  const label = loadHashmapLabel(node, remaining)
  const key = prefix + label
  const left = remaining - label.length
  if (left === 0) {
    const extra = loadDepthBalanceInfo(node, loader)
    const record = loadShardAccountRecord(node)
    const accountId = Buffer.alloc(KEY_BITS / 8)
    for (let i = 0; i < accountId.length; i++) {
      accountId[i] = Number.parseInt(key.slice(i * 8, i * 8 + 8), 2)
    }
    out.push({ accountId, record, extra })
    return
  }
  const leftEdge = node.loadRef()
  const rightEdge = node.loadRef()
  collect(leftEdge, `${key}0`, left - 1, loader, out)
  collect(rightEdge, `${key}1`, left - 1, loader, out)
}

/**
 * All entries of the index in ascending key order, with the root extra
 */
export function readShardAccounts(
  accountsCell: Cell,
  loader: CellLoader = directLoader,
): Safe<{ entries: ShardAccountEntry[]; extra: DepthBalanceInfo }> {
  return decodeFromCell(
    'ShardAccounts',
    accountsCell,
    (slice) => {
      const entries: ShardAccountEntry[] = []
      if (slice.loadBit()) {
        collect(slice.loadRef(), '', KEY_BITS, loader, entries)
      }
      return { entries, extra: loadDepthBalanceInfo(slice, loader) }
    },
    loader,
  )
}
