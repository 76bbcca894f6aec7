import type { Cell, Slice } from '@ton/core'

/**
 * Opens a cell for parsing.
 *
 * Decoders that descend into child references go through a loader so a
 * usage-tracking implementation can record which cells were actually read.
 */
export interface CellLoader {
  load(cell: Cell): Slice
}
