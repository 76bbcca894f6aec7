/**
 * Account existence proofs against a shard state root.
 *
 * The prover re-reads the state through a UsageTree down to the account
 * leaf and the account root, then prunes everything else. A verifier checks
 * the proof against the root hash it trusts and reads the account from the
 * virtual root; anything outside the proven path is a pruned branch and
 * cannot be opened.
 */

import {
  ACCOUNT_ERRORS,
  type CellLoader,
  NotFoundError,
  PROOF_ERRORS,
  PreconditionError,
  type Safe,
  type ShardAccountRecord,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import {
  type Account,
  type AccountOptions,
  ShardAccount,
} from '@shard-ledger/accounts'
import { shardContainsAccountId } from '@shard-ledger/codec'
import { directLoader, logger } from '@shard-ledger/core'
import type { Cell } from '@ton/core'
import { checkMerkleProof, createMerkleProof } from './merkle-proof'
import { decodeShardState } from './shard-state'
import { lookupShardAccount } from './shard-accounts'
import { UsageTree } from './usage-tree'

function accountNotFound(accountId: Buffer): NotFoundError {
  return new NotFoundError(
    "account doesn't belong to given shard state",
    PROOF_ERRORS.ACCOUNT_NOT_FOUND,
    { accountId: accountId.toString('hex') },
  )
}

/**
 * Walk from a shard state root to the account stored under `accountId`.
 * Fails with NotFoundError when the state's shard does not cover the
 * address, the index has no entry, or the entry holds an absent account.
 */
function resolveAccount(
  root: Cell,
  workchainId: number,
  accountId: Buffer,
  loader: CellLoader,
  options?: AccountOptions,
): Safe<{ record: ShardAccountRecord; account: Account }> {
  const [stateError, state] = decodeShardState(root, loader)
  if (stateError) {
    return safeError(stateError)
  }
  if (
    state.shardId.workchainId !== workchainId ||
    !shardContainsAccountId(state.shardId.shard, accountId)
  ) {
    return safeError(
      new NotFoundError(
        'account is outside the shard of the given state',
        PROOF_ERRORS.ACCOUNT_NOT_IN_SHARD,
        {
          accountId: accountId.toString('hex'),
          workchainId: state.shardId.workchainId,
          shard: state.shardId.shard.toString(16),
        },
      ),
    )
  }

  const [lookupError, record] = lookupShardAccount(
    state.accounts,
    accountId,
    loader,
  )
  if (lookupError) {
    return safeError(lookupError)
  }
  if (!record) {
    return safeError(accountNotFound(accountId))
  }

  const [readError, account] = ShardAccount.fromRecord(record).readAccount(
    options,
    loader,
  )
  if (readError) {
    return safeError(readError)
  }
  if (account.isNone()) {
    return safeError(accountNotFound(accountId))
  }
  return safeResult({ record, account })
}

/**
 * Build a Merkle proof that `account` exists under `stateRoot`
 */
export function prepareAccountProof(
  account: Account,
  stateRoot: Cell,
): Safe<Cell> {
  const address = account.address
  if (!address) {
    return safeError(
      new PreconditionError('account cannot be None', ACCOUNT_ERRORS.ACCOUNT_NONE),
    )
  }

  const usage = new UsageTree(stateRoot)
  const [error] = resolveAccount(
    stateRoot,
    address.address.workChain,
    address.address.hash,
    usage,
  )
  if (error) {
    return safeError(error)
  }

  const [proofError, proof] = createMerkleProof(usage)
  if (proofError) {
    return safeError(proofError)
  }
  logger.debug('Account proof prepared', {
    address: address.address.toRawString(),
    visitedCells: usage.size,
  })
  return safeResult(proof)
}

/**
 * Verify `proof` against a trusted state root hash and read the account
 * it proves
 */
export function readAccountFromProof(
  proof: Cell,
  expectedRootHash: Buffer,
  workchainId: number,
  accountId: Buffer,
  options?: AccountOptions,
): Safe<{ record: ShardAccountRecord; account: Account }> {
  const [error, virtualRoot] = checkMerkleProof(proof, expectedRootHash)
  if (error) {
    return safeError(error)
  }
  return resolveAccount(virtualRoot, workchainId, accountId, directLoader, options)
}
