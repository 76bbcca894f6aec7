import { type CellLoader, DecodeError } from '@shard-ledger/types'
import { beginCell, type Cell, Dictionary, type Slice } from '@ton/core'
import { describe, expect, it } from 'vitest'
import {
  decodeFromSlice,
  loadCurrencyCollectionWith,
  loadDictionaryWith,
  loadStateInitWith,
} from '../index'

class RecordingLoader implements CellLoader {
  readonly opened: Cell[] = []

  load(cell: Cell): Slice {
    this.opened.push(cell)
    return cell.beginParse()
  }
}

function extraCurrencies(entries: Array<[number, bigint]>) {
  const dict = Dictionary.empty(
    Dictionary.Keys.Uint(32),
    Dictionary.Values.BigVarUint(5),
  )
  for (const [id, amount] of entries) {
    dict.set(id, amount)
  }
  return dict
}

function prunedBranch(cell: Cell): Cell {
  return beginCell()
    .storeUint(1, 8)
    .storeUint(1, 8)
    .storeBuffer(cell.hash(0), 32)
    .storeUint(cell.depth(0), 16)
    .endCell({ exotic: true })
}

describe('dictionaries read through a loader', () => {
  it('opens every edge of the dictionary', () => {
    const dict = extraCurrencies([
      [1, 10n],
      [2, 20n],
      [3, 30n],
    ])
    const slice = beginCell().storeDict(dict).endCell().beginParse()
    const loader = new RecordingLoader()
    const read = loadDictionaryWith(
      slice,
      Dictionary.Keys.Uint(32),
      Dictionary.Values.BigVarUint(5),
      loader,
    )
    expect(read.get(2)).toBe(20n)
    // two forks and three leaves
    expect(loader.opened).toHaveLength(5)
  })

  it('opens nothing for an empty dictionary', () => {
    const slice = beginCell().storeBit(false).endCell().beginParse()
    const loader = new RecordingLoader()
    const read = loadDictionaryWith(
      slice,
      Dictionary.Keys.Uint(32),
      Dictionary.Values.BigVarUint(5),
      loader,
    )
    expect(read.size).toBe(0)
    expect(loader.opened).toHaveLength(0)
  })

  it('reads extra currencies of a balance', () => {
    const slice = beginCell()
      .storeCoins(5n)
      .storeDict(extraCurrencies([[7, 500n]]))
      .endCell()
      .beginParse()
    const balance = loadCurrencyCollectionWith(slice)
    expect(balance.coins).toBe(5n)
    expect(balance.other?.get(7)).toBe(500n)
  })

  it('rejects a pruned extra currency dictionary', () => {
    const dictCell = beginCell()
      .storeDictDirect(extraCurrencies([[7, 500n]]))
      .endCell()
    const slice = beginCell()
      .storeCoins(5n)
      .storeBit(true)
      .storeRef(prunedBranch(dictCell))
      .endCell()
      .beginParse()
    const [error] = decodeFromSlice('CurrencyCollection', slice, (s) =>
      loadCurrencyCollectionWith(s),
    )
    expect(error).toBeInstanceOf(DecodeError)
  })

  it('rejects a pruned library dictionary in a StateInit', () => {
    const libraries = Dictionary.empty(
      Dictionary.Keys.BigUint(256),
      Dictionary.Values.Cell(),
    )
    libraries.set(1n, beginCell().storeUint(1, 8).endCell())
    const libraryRoot = beginCell().storeDictDirect(libraries).endCell()
    // split_depth, special, code, data absent; library present but pruned
    const slice = beginCell()
      .storeUint(0, 4)
      .storeBit(true)
      .storeRef(prunedBranch(libraryRoot))
      .endCell()
      .beginParse()
    const [error] = decodeFromSlice('StateInit', slice, (s) =>
      loadStateInitWith(s),
    )
    expect(error).toBeInstanceOf(DecodeError)
  })
})
