/**
 * Account proof tests
 *
 * Two accounts A and B share a shard state; a proof for A must hash to the
 * state root and reveal nothing of B.
 */

import { Account, currencies } from '@shard-ledger/accounts'
import {
  emptyLibraries,
  encodeAccount,
  FULL_SHARD,
  hashStateInit,
} from '@shard-ledger/codec'
import {
  ACCOUNT_ERRORS,
  CODEC_ERRORS,
  DecodeError,
  NotFoundError,
  PROOF_ERRORS,
  PreconditionError,
  type Safe,
  type ShardIdent,
} from '@shard-ledger/types'
import { Address, beginCell, type Cell, type StateInit } from '@ton/core'
import { describe, expect, it } from 'vitest'
import {
  buildShardAccounts,
  checkMerkleProof,
  createMerkleProof,
  decodeShardState,
  encodeShardState,
  getShardAccount,
  prepareAccountProof,
  readAccountFromProof,
  readTotalBalance,
  type ShardAccountEntry,
  shardAccountEntry,
  UsageTree,
} from '../index'

const options = { storageStatMode: 'exact' as const }

function unwrap<T>(result: Safe<T>): T {
  const [error, value] = result
  if (error) throw error
  return value
}

function program(codeValue: number, dataValue: number): StateInit {
  return {
    code: beginCell().storeUint(codeValue, 16).endCell(),
    data: beginCell().storeUint(dataValue, 8).endCell(),
  }
}

function activeAccount(init: StateInit, coins: bigint): Account {
  const address = new Address(0, unwrap(hashStateInit(init)))
  return unwrap(
    Account.activeByInitCodeHash(address, { coins }, 0, init, false, options),
  )
}

const initA = program(0xaaaa, 1)
const initB = program(0xbbbb, 2)
const initC = program(0xcccc, 3)
const accountA = activeAccount(initA, 100n)
const accountB = activeAccount(initB, 250n)
const accountC = activeAccount(initC, 5n)

function idOf(account: Account): Buffer {
  const id = account.id
  if (!id) throw new Error('account has no id')
  return id
}

function stateWith(
  entries: ShardAccountEntry[],
  shardId: ShardIdent = { workchainId: 0, shard: FULL_SHARD },
): Cell {
  const index = unwrap(buildShardAccounts(entries))
  return unwrap(
    encodeShardState({
      globalId: 42,
      shardId,
      seqNo: 7,
      genUtime: 1_700_000_000,
      genLt: 1000n,
      accounts: index.cell,
      totalBalance: index.extra.balance,
    }),
  )
}

const entryA = unwrap(shardAccountEntry(accountA, Buffer.alloc(32, 0xa1), 11n))
const entryB = unwrap(shardAccountEntry(accountB, Buffer.alloc(32, 0xb1), 12n))
const stateRoot = stateWith([entryA, entryB])

/** level-0 hashes of every ordinary cell reachable in a proof */
function revealedHashes(proof: Cell): Set<string> {
  const out = new Set<string>()
  const stack = [...proof.refs]
  while (stack.length > 0) {
    const cell = stack.pop()
    if (!cell || cell.isExotic) continue
    out.add(cell.hash(0).toString('hex'))
    stack.push(...cell.refs)
  }
  return out
}

describe('shard state', () => {
  it('round-trips its header and total balance', () => {
    const state = unwrap(decodeShardState(stateRoot))
    expect(state.globalId).toBe(42)
    expect(state.shardId).toEqual({ workchainId: 0, shard: FULL_SHARD })
    expect(state.seqNo).toBe(7)
    expect(state.genLt).toBe(1000n)
    expect(unwrap(readTotalBalance(state)).coins).toBe(350n)
  })

  it('rejects a root with the wrong tag', () => {
    const root = beginCell().storeUint(0xdeadbeef, 32).endCell()
    const [error] = decodeShardState(root)
    expect(error).toBeInstanceOf(DecodeError)
    expect(error).toMatchObject({ code: CODEC_ERRORS.WRONG_SHARD_STATE_TAG })
  })
})

describe('getShardAccount', () => {
  it('finds entries through the state root', () => {
    const record = unwrap(getShardAccount(stateRoot, idOf(accountA)))
    expect(record?.lastTransLt).toBe(11n)
    expect(record?.accountCell.hash().equals(entryA.record.accountCell.hash())).toBe(true)
    expect(unwrap(getShardAccount(stateRoot, idOf(accountC)))).toBeNull()
  })
})

describe('createMerkleProof', () => {
  it('needs the root to have been visited', () => {
    const [error] = createMerkleProof(new UsageTree(stateRoot))
    expect(error).toBeInstanceOf(PreconditionError)
    expect(error).toMatchObject({ code: PROOF_ERRORS.ROOT_NOT_VISITED })
  })

  it('prunes every child of a root visited alone', () => {
    const usage = new UsageTree(stateRoot)
    usage.load(stateRoot)
    const proof = unwrap(createMerkleProof(usage))
    const virtualRoot = unwrap(checkMerkleProof(proof, stateRoot.hash()))
    expect(virtualRoot.refs).toHaveLength(2)
    expect(virtualRoot.refs.every((ref) => ref.isExotic)).toBe(true)
  })
})

describe('prepareAccountProof', () => {
  const proof = unwrap(prepareAccountProof(accountA, stateRoot))

  it('hashes to the original state root', () => {
    const virtualRoot = unwrap(checkMerkleProof(proof, stateRoot.hash()))
    expect(virtualRoot.hash(0).equals(stateRoot.hash())).toBe(true)
    expect(virtualRoot.depth(0)).toBe(stateRoot.depth())
  })

  it('lets a verifier read the proven account', () => {
    const { account, record } = unwrap(
      readAccountFromProof(proof, stateRoot.hash(), 0, idOf(accountA), options),
    )
    expect(account.equals(accountA)).toBe(true)
    expect(account.balance?.coins).toBe(100n)
    expect(record.lastTransLt).toBe(11n)
  })

  it('hides the other account', () => {
    const [error] = readAccountFromProof(
      proof,
      stateRoot.hash(),
      0,
      idOf(accountB),
      options,
    )
    expect(error).toBeInstanceOf(DecodeError)

    const revealed = revealedHashes(proof)
    expect(revealed.has(entryA.record.accountCell.hash().toString('hex'))).toBe(true)
    expect(revealed.has(entryB.record.accountCell.hash().toString('hex'))).toBe(false)
    expect(revealed.has(initB.code?.hash().toString('hex') ?? '')).toBe(false)
    expect(revealed.has(initB.data?.hash().toString('hex') ?? '')).toBe(false)
  })

  it('does not reveal the total balance', () => {
    const virtualRoot = unwrap(checkMerkleProof(proof, stateRoot.hash()))
    const state = unwrap(decodeShardState(virtualRoot))
    const [error] = readTotalBalance(state)
    expect(error).toBeInstanceOf(DecodeError)
  })

  it('fails verification against another root', () => {
    const [error] = checkMerkleProof(proof, Buffer.alloc(32))
    expect(error).toBeInstanceOf(DecodeError)
    expect(error).toMatchObject({ code: PROOF_ERRORS.PROOF_HASH_MISMATCH })
  })

  it('rejects an ordinary cell as a proof', () => {
    const [error] = checkMerkleProof(stateRoot, stateRoot.hash())
    expect(error).toMatchObject({ code: PROOF_ERRORS.NOT_A_MERKLE_PROOF })
  })
})

describe('proofs of accounts holding dictionaries', () => {
  const library = beginCell().storeUint(0x1111, 16).endCell()
  const libraries = emptyLibraries()
  libraries.set(BigInt(`0x${library.hash().toString('hex')}`), {
    public: true,
    root: library,
  })
  const initD: StateInit = { ...program(0xdddd, 4), libraries }
  const accountD = unwrap(
    Account.activeByInitCodeHash(
      new Address(0, unwrap(hashStateInit(initD))),
      currencies(100n, { 7: 500n }),
      0,
      initD,
      false,
      options,
    ),
  )
  const entryD = unwrap(shardAccountEntry(accountD, Buffer.alloc(32, 0xd1), 13n))
  const root = stateWith([entryA, entryD])

  it('keeps extra currencies and libraries in the proven account', () => {
    const proof = unwrap(prepareAccountProof(accountD, root))
    const { account } = unwrap(
      readAccountFromProof(proof, root.hash(), 0, idOf(accountD), options),
    )
    expect(account.balance?.other?.get(7)).toBe(500n)
    expect(account.libraries.size).toBe(1)
    expect(account.equals(accountD)).toBe(true)
  })

  it('rejects a proof whose balance dictionary was pruned', () => {
    // record the path to the account root without opening its dictionaries
    const usage = new UsageTree(root)
    const state = unwrap(decodeShardState(root, usage))
    usage.load(state.accounts)
    const accountsRoot = state.accounts.refs[0]
    if (!accountsRoot) throw new Error('index has no root edge')
    usage.load(accountsRoot)
    const leaf = accountsRoot.refs.find((edge) =>
      edge.refs.some((ref) => ref.hash().equals(entryD.record.accountCell.hash())),
    )
    if (!leaf) throw new Error('leaf of D not found')
    usage.load(leaf)
    usage.load(entryD.record.accountCell)

    const proof = unwrap(createMerkleProof(usage))
    const [error] = readAccountFromProof(
      proof,
      root.hash(),
      0,
      idOf(accountD),
      options,
    )
    expect(error).toBeInstanceOf(DecodeError)
  })
})

describe('prepareAccountProof failures', () => {
  it('needs an account with an address', () => {
    const [error] = prepareAccountProof(Account.none(options), stateRoot)
    expect(error).toBeInstanceOf(PreconditionError)
    expect(error).toMatchObject({ code: ACCOUNT_ERRORS.ACCOUNT_NONE })
  })

  it('reports an account missing from the index as not found', () => {
    const [error] = prepareAccountProof(accountC, stateRoot)
    expect(error).toBeInstanceOf(NotFoundError)
    expect(error).toMatchObject({ code: PROOF_ERRORS.ACCOUNT_NOT_FOUND })
  })

  it('reports an account outside the shard as not found', () => {
    const masterchainState = stateWith([entryA], {
      workchainId: -1,
      shard: FULL_SHARD,
    })
    const [error] = prepareAccountProof(accountA, masterchainState)
    expect(error).toBeInstanceOf(NotFoundError)
    expect(error).toMatchObject({ code: PROOF_ERRORS.ACCOUNT_NOT_IN_SHARD })
  })

  it('reports an index entry holding no account as not found', () => {
    const noneEntry: ShardAccountEntry = {
      accountId: idOf(accountC),
      record: {
        accountCell: unwrap(encodeAccount({ type: 'none' })),
        lastTransHash: Buffer.alloc(32),
        lastTransLt: 0n,
      },
      extra: { splitDepth: 0, balance: { coins: 0n } },
    }
    const [error] = prepareAccountProof(accountC, stateWith([entryA, noneEntry]))
    expect(error).toBeInstanceOf(NotFoundError)
    expect(error).toMatchObject({ code: PROOF_ERRORS.ACCOUNT_NOT_FOUND })
  })

  it('reports a malformed root as malformed input', () => {
    const [error] = prepareAccountProof(
      accountA,
      beginCell().storeUint(1, 32).endCell(),
    )
    expect(error).toBeInstanceOf(DecodeError)
  })
})
