import type { CellLoader } from '@shard-ledger/types'

/**
 * Loader that parses cells without recording anything.
 */
export const directLoader: CellLoader = {
  load: (cell) => cell.beginParse(),
}
