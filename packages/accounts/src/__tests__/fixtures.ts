import { hashStateInit } from '@shard-ledger/codec'
import type { Safe } from '@shard-ledger/types'
import { Address, beginCell, type StateInit } from '@ton/core'

export function unwrap<T>(result: Safe<T>): T {
  const [error, value] = result
  if (error) {
    throw error
  }
  return value
}

/** 16-bit code cell */
export const code = beginCell().storeUint(0xbeef, 16).endCell()
/** 8-bit data cell */
export const data = beginCell().storeUint(0x2a, 8).endCell()

export const stateInit: StateInit = { code, data }

export const otherStateInit: StateInit = {
  code: beginCell().storeUint(0xdead, 16).endCell(),
  data,
}

/** Address derived from `stateInit`, as required for activation */
export const address = new Address(0, unwrap(hashStateInit(stateInit)))

export const sender = new Address(0, Buffer.alloc(32, 0x77))
