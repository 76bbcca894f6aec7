/**
 * HashmapE fields read through a CellLoader
 *
 * @ton/core parses a dictionary by opening its edge cells directly, and reads
 * an exotic root as an empty map. Here every edge is opened through the
 * loader first: a usage tree records the whole dictionary, and a pruned edge
 * fails the read instead of dropping entries. References held by leaf values
 * are not opened.
 */

import type { CellLoader } from '@shard-ledger/types'
import { directLoader } from '@shard-ledger/core'
import {
  type Cell,
  Dictionary,
  type DictionaryKey,
  type DictionaryKeyTypes,
  type DictionaryValue,
  type Slice,
} from '@ton/core'
import { loadHashmapLabel } from './hashmap-label'

/**
 * Open every edge of the Hashmap rooted at `root` through `loader`
 */
export function openHashmapEdges(
  root: Cell,
  keyBits: number,
  loader: CellLoader,
): void {
  const pending: Array<[Cell, number]> = [[root, keyBits]]
  for (let next = pending.pop(); next; next = pending.pop()) {
    const [edge, remaining] = next
    const node = loader.load(edge)
    const label = loadHashmapLabel(node, remaining)
    const left = remaining - label.length
    if (left > 0) {
      const leftEdge = node.loadRef()
      const rightEdge = node.loadRef()
      pending.push([leftEdge, left - 1], [rightEdge, left - 1])
    }
  }
}

/**
 * HashmapE n X: a Maybe reference to the root edge
 */
export function loadDictionaryWith<K extends DictionaryKeyTypes, V>(
  slice: Slice,
  key: DictionaryKey<K>,
  value: DictionaryValue<V>,
  loader: CellLoader = directLoader,
): Dictionary<K, V> {
  const root = slice.loadMaybeRef()
  if (!root) {
    return Dictionary.empty(key, value)
  }
  openHashmapEdges(root, key.bits, loader)
  return Dictionary.loadDirect(key, value, root)
}
