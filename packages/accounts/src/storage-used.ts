/**
 * Storage footprint engine
 *
 * Measures the rent-relevant size of a cell DAG: the number of distinct cells
 * reachable from a root and the sum of their own bit lengths. Cells are
 * distinct by representation hash, so a subtree referenced from several
 * places is counted once.
 *
 * The fast variant counts the tree instead of the DAG. It is cheaper for
 * repeated measurements of structures that share large subtrees with
 * themselves, but overcounts such sharing and therefore never agrees with the
 * exact count on a DAG with repeated cells.
 */

import {
  type Safe,
  safeError,
  safeResult,
  StorageOverflowError,
  type StorageUsed,
  type StorageUsedShort,
} from '@shard-ledger/types'
import { MAX_VAR_UINT7 } from '@shard-ledger/codec'
import { cellHashKey } from '@shard-ledger/core'
import type { Cell } from '@ton/core'

/** Largest value of a VarUInteger 7 counter */
export const MAX_STORAGE_COUNTER = MAX_VAR_UINT7

function overflow(cells: bigint, bits: bigint): StorageOverflowError {
  return new StorageOverflowError(
    `storage counters overflow: ${cells} cells, ${bits} bits`,
    cells,
    bits,
  )
}

function withinLimits(cells: bigint, bits: bigint): boolean {
  return cells <= MAX_STORAGE_COUNTER && bits <= MAX_STORAGE_COUNTER
}

/**
 * Validated constructor for footprint counters
 */
export function storageUsedShort(
  cells: bigint,
  bits: bigint,
): Safe<StorageUsedShort> {
  if (cells < 0n || bits < 0n || !withinLimits(cells, bits)) {
    return safeError(overflow(cells, bits))
  }
  return safeResult({ cells, bits })
}

/**
 * Running footprint over any number of roots with one shared visited set.
 *
 * Each `append` adds only the cells not seen by earlier calls. A failed
 * append leaves the counter as it was.
 */
export class StorageUsedShortCounter {
  private readonly visited = new Set<string>()
  private cells = 0n
  private bits = 0n

  get value(): StorageUsedShort {
    return { cells: this.cells, bits: this.bits }
  }

  append(root: Cell): Safe<StorageUsedShort> {
    const pending = new Set<string>()
    let cells = this.cells
    let bits = this.bits
    const stack: Cell[] = [root]

    while (stack.length > 0) {
      const cell = stack.pop()
      if (!cell) {
        break
      }
      const key = cellHashKey(cell)
      if (this.visited.has(key) || pending.has(key)) {
        continue
      }
      pending.add(key)
      cells += 1n
      bits += BigInt(cell.bits.length)
      if (!withinLimits(cells, bits)) {
        return safeError(overflow(cells, bits))
      }
      for (const ref of cell.refs) {
        stack.push(ref)
      }
    }

    for (const key of pending) {
      this.visited.add(key)
    }
    this.cells = cells
    this.bits = bits
    return safeResult(this.value)
  }
}

export function calculateStorageUsedShort(root: Cell): Safe<StorageUsedShort> {
  return new StorageUsedShortCounter().append(root)
}

export function calculateStorageUsed(root: Cell): Safe<StorageUsed> {
  const [error, used] = calculateStorageUsedShort(root)
  if (error) {
    return safeError(error)
  }
  const result: StorageUsed = { ...used, extra: { type: 'none' } }
  return safeResult(result)
}

/**
 * Serialize a value and measure the resulting cell
 * @param encode - Encoder producing the root cell
 */
export function calculateStorageUsedFor<T>(
  value: T,
  encode: (value: T) => Safe<Cell>,
): Safe<StorageUsed> {
  const [error, root] = encode(value)
  if (error) {
    return safeError(error)
  }
  return calculateStorageUsed(root)
}

const treeStats = new WeakMap<Cell, StorageUsedShort>()

function treeCount(cell: Cell): StorageUsedShort {
  const cached = treeStats.get(cell)
  if (cached) {
    return cached
  }
  let cells = 1n
  let bits = BigInt(cell.bits.length)
  for (const ref of cell.refs) {
    const child = treeCount(ref)
    cells += child.cells
    bits += child.bits
  }
  const stats = { cells, bits }
  treeStats.set(cell, stats)
  return stats
}

/**
 * Tree-wide count: every reference edge counts its target subtree again.
 * Results are memoised per cell object.
 */
export function calculateTreeStorageUsed(root: Cell): Safe<StorageUsedShort> {
  const { cells, bits } = treeCount(root)
  return storageUsedShort(cells, bits)
}
