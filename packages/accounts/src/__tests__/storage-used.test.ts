/**
 * Storage footprint tests
 */

import { encodeStorageUsed } from '@shard-ledger/codec'
import { StorageOverflowError } from '@shard-ledger/types'
import { beginCell } from '@ton/core'
import { describe, expect, it } from 'vitest'
import {
  calculateStorageUsed,
  calculateStorageUsedFor,
  calculateStorageUsedShort,
  calculateTreeStorageUsed,
  MAX_STORAGE_COUNTER,
  StorageUsedShortCounter,
  storageUsedShort,
} from '../index'
import { unwrap } from './fixtures'

// root(0 bits) -> a(4), b(4); a -> leaf(8); b -> leaf(8)
const leaf = beginCell().storeUint(0xff, 8).endCell()
const a = beginCell().storeUint(1, 4).storeRef(leaf).endCell()
const b = beginCell().storeUint(2, 4).storeRef(leaf).endCell()
const diamond = beginCell().storeRef(a).storeRef(b).endCell()

describe('exact footprint', () => {
  it('counts a shared subtree once', () => {
    expect(unwrap(calculateStorageUsedShort(diamond))).toEqual({
      cells: 4n,
      bits: 16n,
    })
  })

  it('deduplicates equal cells built separately', () => {
    const first = beginCell().storeUint(5, 8).endCell()
    const second = beginCell().storeUint(5, 8).endCell()
    const root = beginCell().storeRef(first).storeRef(second).endCell()
    expect(unwrap(calculateStorageUsedShort(root))).toEqual({
      cells: 2n,
      bits: 8n,
    })
  })

  it('reports StorageUsed with no extra', () => {
    expect(unwrap(calculateStorageUsed(leaf))).toEqual({
      cells: 1n,
      bits: 8n,
      extra: { type: 'none' },
    })
  })

  it('measures a serialized value', () => {
    const used = unwrap(
      calculateStorageUsedFor(
        { cells: 1n, bits: 2n, extra: { type: 'none' } },
        encodeStorageUsed,
      ),
    )
    expect(used.cells).toBe(1n)
    expect(used.bits).toBe(25n)
  })
})

describe('StorageUsedShortCounter', () => {
  it('accumulates across roots with one visited set', () => {
    const counter = new StorageUsedShortCounter()
    expect(unwrap(counter.append(a))).toEqual({ cells: 2n, bits: 12n })
    expect(unwrap(counter.append(b))).toEqual({ cells: 3n, bits: 16n })
    expect(counter.value).toEqual({ cells: 3n, bits: 16n })
  })

  it('is strictly smaller than independent sums when roots share a cell', () => {
    const counter = new StorageUsedShortCounter()
    unwrap(counter.append(a))
    const combined = unwrap(counter.append(b))

    const first = unwrap(calculateStorageUsedShort(a))
    const second = unwrap(calculateStorageUsedShort(b))
    expect(first.cells + second.cells).toBe(4n)
    expect(first.bits + second.bits).toBe(24n)
    expect(combined.cells).toBeLessThan(first.cells + second.cells)
    expect(combined.bits).toBeLessThan(first.bits + second.bits)
  })

  it('adds nothing for a root it has already seen', () => {
    const counter = new StorageUsedShortCounter()
    unwrap(counter.append(diamond))
    expect(unwrap(counter.append(a))).toEqual({ cells: 4n, bits: 16n })
  })
})

describe('fast footprint', () => {
  it('counts a shared subtree once per reference', () => {
    expect(unwrap(calculateTreeStorageUsed(diamond))).toEqual({
      cells: 5n,
      bits: 24n,
    })
  })

  it('agrees with the exact count on a tree', () => {
    expect(unwrap(calculateTreeStorageUsed(a))).toEqual(
      unwrap(calculateStorageUsedShort(a)),
    )
  })
})

describe('counter limits', () => {
  it('accepts the largest VarUInteger 7 value', () => {
    expect(MAX_STORAGE_COUNTER).toBe(2n ** 48n - 1n)
    expect(unwrap(storageUsedShort(MAX_STORAGE_COUNTER, 0n)).cells).toBe(
      MAX_STORAGE_COUNTER,
    )
  })

  it('fails instead of wrapping', () => {
    const [error, value] = storageUsedShort(0n, MAX_STORAGE_COUNTER + 1n)
    expect(value).toBeUndefined()
    expect(error).toBeInstanceOf(StorageOverflowError)
    expect(error).toMatchObject({ bits: MAX_STORAGE_COUNTER + 1n })
  })
})
