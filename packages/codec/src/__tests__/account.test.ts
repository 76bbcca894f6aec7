/**
 * Account codec tests
 *
 * Covers both top-level layouts, the two encodings of an absent account and
 * rejection of unknown tags.
 */

import {
  type AccountData,
  type AccountState,
  AccountStatus,
  CODEC_ERRORS,
  DecodeError,
} from '@shard-ledger/types'
import { Address, beginCell, type Cell } from '@ton/core'
import { describe, expect, it } from 'vitest'
import {
  decodeAccount,
  decodeAccountState,
  decodeAccountStatus,
  emptyLibraries,
  emptyStorageInfo,
  encodeAccount,
  encodeAccountState,
  encodeAccountStatus,
  msgAddressInt,
} from '../index'

const address = new Address(0, Buffer.alloc(32, 0x11))
const code = beginCell().storeUint(0xbeef, 16).endCell()
const data = beginCell().storeUint(0x2a, 8).endCell()

function accountWith(
  state: AccountState,
  initCodeHash: Buffer | null = null,
): AccountData {
  return {
    type: 'account',
    stuff: {
      address: msgAddressInt(address),
      storageStat: emptyStorageInfo(),
      storage: {
        lastTransLt: 7n,
        balance: { coins: 100n },
        state,
        initCodeHash,
      },
    },
  }
}

function encoded(account: AccountData): Cell {
  const [error, cell] = encodeAccount(account)
  if (error) throw error
  return cell
}

function decoded(cell: Cell): AccountData {
  const [error, account] = decodeAccount(cell)
  if (error) throw error
  return account
}

function stuffOf(account: AccountData) {
  if (account.type !== 'account') throw new Error('expected an account')
  return account.stuff
}

describe('Account codec', () => {
  describe('absent account', () => {
    it('encodes None as a single zero bit', () => {
      const cell = encoded({ type: 'none' })
      expect(cell.bits.length).toBe(1)
      expect(cell.beginParse().loadBit()).toBe(false)
      expect(decoded(cell)).toEqual({ type: 'none' })
    })

    it('reads tag 000 after the leading zero as None', () => {
      const cell = beginCell().storeUint(0b0000, 4).endCell()
      expect(decoded(cell)).toEqual({ type: 'none' })
    })

    it('rejects top-level tag 010', () => {
      const cell = beginCell().storeBit(false).storeUint(0b010, 3).endCell()
      const [error, account] = decodeAccount(cell)
      expect(account).toBeUndefined()
      expect(error).toBeInstanceOf(DecodeError)
      expect(error?.message).toBe('wrong tag 010 deserializing Account')
      expect(error).toMatchObject({ code: CODEC_ERRORS.WRONG_ACCOUNT_TAG })
    })

    it('rejects a truncated account', () => {
      const cell = beginCell().storeBit(true).endCell()
      const [error] = decodeAccount(cell)
      expect(error).toBeInstanceOf(DecodeError)
      expect(error?.message).toMatch(/^cannot deserialize Account/)
    })
  })

  describe('original layout', () => {
    it('round-trips an uninitialized account', () => {
      const cell = encoded(accountWith({ type: 'uninit' }))
      // 1 + 267 address + 42 storage info + 64 lt + 13 balance + 2 state
      expect(cell.bits.length).toBe(389)
      expect(cell.beginParse().loadBit()).toBe(true)

      const stuff = stuffOf(decoded(cell))
      expect(stuff.address.address.equals(address)).toBe(true)
      expect(stuff.address.anycast).toBeNull()
      expect(stuff.storage.lastTransLt).toBe(7n)
      expect(stuff.storage.balance.coins).toBe(100n)
      expect(stuff.storage.state).toEqual({ type: 'uninit' })
      expect(stuff.storage.initCodeHash).toBeNull()
    })

    it('round-trips a frozen account', () => {
      const stateInitHash = Buffer.alloc(32, 0x5a)
      const cell = encoded(accountWith({ type: 'frozen', stateInitHash }))
      expect(cell.bits.length).toBe(389 + 256)
      expect(stuffOf(decoded(cell)).storage.state).toEqual({
        type: 'frozen',
        stateInitHash,
      })
    })

    it('round-trips an active account with code, data and libraries', () => {
      const libraries = emptyLibraries()
      const libraryRoot = beginCell().storeUint(1, 1).endCell()
      libraries.set(BigInt(`0x${libraryRoot.hash().toString('hex')}`), {
        public: true,
        root: libraryRoot,
      })
      const cell = encoded(
        accountWith({ type: 'active', stateInit: { code, data, libraries } }),
      )
      expect(cell.beginParse().loadBit()).toBe(true)

      const { state } = stuffOf(decoded(cell)).storage
      if (state.type !== 'active') throw new Error('expected an active state')
      expect(state.stateInit.code?.hash().equals(code.hash())).toBe(true)
      expect(state.stateInit.data?.hash().equals(data.hash())).toBe(true)
      const entries = [...(state.stateInit.libraries?.values() ?? [])]
      expect(entries).toHaveLength(1)
      expect(entries[0].public).toBe(true)
      expect(entries[0].root.hash().equals(libraryRoot.hash())).toBe(true)
    })
  })

  describe('extended layout', () => {
    it('is written only when init_code_hash is present', () => {
      const initCodeHash = code.hash()
      const cell = encoded(
        accountWith({ type: 'active', stateInit: { code, data } }, initCodeHash),
      )
      const slice = cell.beginParse()
      expect(slice.loadUint(4)).toBe(0b0001)
      // 4 + 267 + 42 + 64 + 13 + 6 state + 257 init_code_hash
      expect(cell.bits.length).toBe(653)
      expect(cell.refs).toHaveLength(2)

      const stuff = stuffOf(decoded(cell))
      expect(stuff.storage.initCodeHash?.equals(initCodeHash)).toBe(true)
      expect(stuff.storage.state.type).toBe('active')
    })

    it('reads an extended account without init_code_hash', () => {
      const original = encoded(accountWith({ type: 'uninit' }))
      const body = original.beginParse()
      body.skip(1)
      const cell = beginCell()
        .storeUint(0b0001, 4)
        .storeSlice(body)
        .storeBit(false)
        .endCell()
      const stuff = stuffOf(decoded(cell))
      expect(stuff.storage.initCodeHash).toBeNull()
      expect(stuff.storage.balance.coins).toBe(100n)
    })
  })

  it('keeps addresses with an anycast prefix', () => {
    const rewritePrefix = beginCell().storeUint(0b101, 3).endCell().beginParse().loadBits(3)
    const account = accountWith({ type: 'uninit' })
    stuffOf(account).address = { address, anycast: { depth: 3, rewritePrefix } }
    const stuff = stuffOf(decoded(encoded(account)))
    expect(stuff.address.anycast?.depth).toBe(3)
    expect(stuff.address.anycast?.rewritePrefix.equals(rewritePrefix)).toBe(true)
  })
})

describe('AccountState codec', () => {
  it('uses a prefix-free code', () => {
    const [, uninit] = encodeAccountState({ type: 'uninit' })
    expect(uninit?.bits.length).toBe(2)
    expect(uninit?.beginParse().loadUint(2)).toBe(0b00)

    const [, frozen] = encodeAccountState({
      type: 'frozen',
      stateInitHash: Buffer.alloc(32, 1),
    })
    expect(frozen?.bits.length).toBe(258)
    expect(frozen?.beginParse().loadUint(2)).toBe(0b01)

    const [, active] = encodeAccountState({ type: 'active', stateInit: {} })
    // 1 + five absent StateInit fields
    expect(active?.bits.length).toBe(6)
    expect(active?.beginParse().loadBit()).toBe(true)
  })

  it('decodes the frozen hash', () => {
    const stateInitHash = Buffer.alloc(32, 9)
    const [, cell] = encodeAccountState({ type: 'frozen', stateInitHash })
    if (!cell) throw new Error('encoding failed')
    const [error, state] = decodeAccountState(cell.beginParse())
    expect(error).toBeUndefined()
    expect(state).toEqual({ type: 'frozen', stateInitHash })
  })
})

describe('AccountStatus codec', () => {
  const cases: Array<[AccountStatus, number]> = [
    [AccountStatus.Uninit, 0b00],
    [AccountStatus.Frozen, 0b01],
    [AccountStatus.Active, 0b10],
    [AccountStatus.NonExist, 0b11],
  ]

  it.each(cases)('encodes %s as a fixed two bit value', (status, bits) => {
    const [error, cell] = encodeAccountStatus(status)
    expect(error).toBeUndefined()
    if (!cell) return
    expect(cell.bits.length).toBe(2)
    expect(cell.beginParse().loadUint(2)).toBe(bits)
    expect(decodeAccountStatus(cell.beginParse())).toEqual([undefined, status])
  })
})
