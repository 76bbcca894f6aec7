/**
 * StateInit helpers
 *
 * _ split_depth:(Maybe (## 5)) special:(Maybe TickTock)
 *   code:(Maybe ^Cell) data:(Maybe ^Cell)
 *   library:(HashmapE 256 SimpleLib) = StateInit;
 *
 * Writing uses @ton/core's layout. Reading goes through a CellLoader so the
 * library dictionary is opened like every other cell of an account.
 */

import type { CellLoader, LibraryEntry, Safe } from '@shard-ledger/types'
import { safeError, safeResult } from '@shard-ledger/types'
import { directLoader } from '@shard-ledger/core'
import {
  type Cell,
  Dictionary,
  type DictionaryValue,
  type Slice,
  type StateInit,
  storeStateInit,
} from '@ton/core'
import { encodeToCell } from './core/boundary'
import { loadDictionaryWith } from './dictionary'

/**
 * simple_lib$_ public:Bool root:^Cell = SimpleLib;
 */
export const libraryEntryValue: DictionaryValue<LibraryEntry> = {
  serialize: (src, builder) => {
    builder.storeBit(src.public)
    builder.storeRef(src.root)
  },
  parse: (slice) => ({ public: slice.loadBit(), root: slice.loadRef() }),
}

export function emptyLibraries(): Dictionary<bigint, LibraryEntry> {
  return Dictionary.empty(Dictionary.Keys.BigUint(256), libraryEntryValue)
}

export function loadStateInitWith(
  slice: Slice,
  loader: CellLoader = directLoader,
): StateInit {
  const splitDepth = slice.loadBit() ? slice.loadUint(5) : null
  const special = slice.loadBit()
    ? { tick: slice.loadBit(), tock: slice.loadBit() }
    : null
  const code = slice.loadMaybeRef()
  const data = slice.loadMaybeRef()
  const libraries = loadDictionaryWith(
    slice,
    Dictionary.Keys.BigUint(256),
    libraryEntryValue,
    loader,
  )
  return {
    splitDepth,
    special,
    code,
    data,
    libraries: libraries.size > 0 ? libraries : null,
  }
}

export function encodeStateInit(stateInit: StateInit): Safe<Cell> {
  return encodeToCell('StateInit', storeStateInit(stateInit))
}

/**
 * Representation hash of the serialized StateInit. For an uninitialized
 * account this must equal the 256-bit account id.
 */
export function hashStateInit(stateInit: StateInit): Safe<Buffer> {
  const [error, cell] = encodeStateInit(stateInit)
  if (error) {
    return safeError(error)
  }
  return safeResult(cell.hash())
}
