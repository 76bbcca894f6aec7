import type { CellLoader } from '@shard-ledger/types'
import { cellHashKey } from '@shard-ledger/core'
import type { Cell, Slice } from '@ton/core'

/**
 * Cell loader that records every cell it opens.
 *
 * Decoders descend through child references via `load`, so after a lookup the
 * visited set is exactly the path the lookup needed. Cells are identified by
 * hash; a subtree that occurs twice counts as visited in both places.
 */
export class UsageTree implements CellLoader {
  private readonly visited = new Set<string>()

  /** @param root - Root of the tree a proof will be cut from */
  constructor(readonly root: Cell) {}

  load(cell: Cell): Slice {
    this.visited.add(cellHashKey(cell))
    return cell.beginParse()
  }

  isVisited(cell: Cell): boolean {
    return this.visited.has(cellHashKey(cell))
  }

  get size(): number {
    return this.visited.size
  }
}
