/**
 * Safe boundary around @ton/core builders and slices.
 *
 * Builders and slices throw on overflow and underflow. Codec internals keep
 * that style (`storeX` writers, `loadX` readers) and the public encode/decode
 * functions convert every throw into a Safe error tuple here.
 */

import {
  CODEC_ERRORS,
  type CellLoader,
  DecodeError,
  EncodeError,
  LedgerError,
  type Safe,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import { beginCell, type Builder, type Cell, type Slice } from '@ton/core'
import * as _ from 'radash'

export type Writer = (builder: Builder) => void
export type Reader<T> = (slice: Slice) => T

/**
 * Serialize a value into a fresh cell
 * @param what - Type name used in the error message
 * @param writer - Writer storing the value
 */
export function encodeToCell(what: string, writer: Writer): Safe<Cell> {
  const [error, cell] = _.try(() => beginCell().store(writer).endCell())()
  if (error) {
    if (error instanceof LedgerError) {
      return safeError(error)
    }
    return safeError(
      new EncodeError(
        `cannot serialize ${what}: ${error.message}`,
        CODEC_ERRORS.ENCODE_FAILED,
      ),
    )
  }
  return safeResult(cell)
}

function guardDecode<T>(what: string, read: () => T): Safe<T> {
  try {
    return safeResult(read())
  } catch (error) {
    if (error instanceof LedgerError) {
      return safeError(error)
    }
    const message = error instanceof Error ? error.message : String(error)
    return safeError(
      new DecodeError(
        `cannot deserialize ${what}: ${message}`,
        CODEC_ERRORS.TRUNCATED,
      ),
    )
  }
}

/**
 * Parse a value from a slice, normalising slice underflows into DecodeError.
 * No partially constructed value is ever returned.
 */
export function decodeFromSlice<T>(
  what: string,
  slice: Slice,
  reader: Reader<T>,
): Safe<T> {
  return guardDecode(what, () => reader(slice))
}

/**
 * Parse a value from the root of a cell through a loader. A cell that cannot
 * be opened (e.g. a pruned branch) is reported like any other bad input.
 */
export function decodeFromCell<T>(
  what: string,
  cell: Cell,
  reader: Reader<T>,
  loader: CellLoader,
): Safe<T> {
  return guardDecode(what, () => reader(loader.load(cell)))
}
