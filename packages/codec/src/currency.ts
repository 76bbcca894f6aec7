/**
 * currencies$_ grams:Grams other:ExtraCurrencyCollection = CurrencyCollection;
 * extra_currencies$_ dict:(HashmapE 32 (VarUInteger 32)) = ExtraCurrencyCollection;
 */

import type { CellLoader } from '@shard-ledger/types'
import { directLoader } from '@shard-ledger/core'
import { type CurrencyCollection, Dictionary, type Slice } from '@ton/core'
import { loadDictionaryWith } from './dictionary'

export function loadCurrencyCollectionWith(
  slice: Slice,
  loader: CellLoader = directLoader,
): CurrencyCollection {
  const coins = slice.loadCoins()
  const other = loadDictionaryWith(
    slice,
    Dictionary.Keys.Uint(32),
    Dictionary.Values.BigVarUint(5),
    loader,
  )
  return other.size > 0 ? { coins, other } : { coins }
}
