/**
 * Merkle proofs over cell trees
 *
 * A proof is the original tree with every unvisited cell replaced by a
 * pruned branch carrying only its hash and depth, wrapped in a Merkle proof
 * cell that commits to the level-0 hash of the original root:
 *
 *   pruned branch   type:uint8 (1) level_mask:uint8 (1) hash:bits256 depth:uint16
 *   merkle proof    type:uint8 (3) virtual_hash:bits256 depth:uint16 ^[root]
 *
 * Pruned cells keep the hashes of what they replace, so the virtual root
 * hashes to the original root while revealing nothing below the cut.
 */

import {
  DecodeError,
  EncodeError,
  LedgerError,
  PROOF_ERRORS,
  PreconditionError,
  type Safe,
  safeError,
  safeResult,
} from '@shard-ledger/types'
import { cellHashKey } from '@shard-ledger/core'
import { beginCell, type Cell, CellType } from '@ton/core'
import * as _ from 'radash'
import type { UsageTree } from './usage-tree'

const PRUNED_BRANCH_TYPE = 1
const MERKLE_PROOF_TYPE = 3
const PRUNED_LEVEL_MASK = 1

export function createPrunedBranch(cell: Cell): Cell {
  return beginCell()
    .storeUint(PRUNED_BRANCH_TYPE, 8)
    .storeUint(PRUNED_LEVEL_MASK, 8)
    .storeBuffer(cell.hash(0), 32)
    .storeUint(cell.depth(0), 16)
    .endCell({ exotic: true })
}

function rebuild(cell: Cell, usage: UsageTree, memo: Map<string, Cell>): Cell {
  const key = cellHashKey(cell)
  const cached = memo.get(key)
  if (cached) {
    return cached
  }
  let out: Cell
  if (!usage.isVisited(cell)) {
    out = createPrunedBranch(cell)
  } else {
    const builder = beginCell().storeBits(cell.bits)
    for (const ref of cell.refs) {
      builder.storeRef(rebuild(ref, usage, memo))
    }
    out = builder.endCell({ exotic: cell.isExotic })
  }
  memo.set(key, out)
  return out
}

/**
 * Wrap the visited part of the tree `usage` tracked into a Merkle proof cell
 */
export function createMerkleProof(usage: UsageTree): Safe<Cell> {
  const { root } = usage
  if (!usage.isVisited(root)) {
    return safeError(
      new PreconditionError(
        'root cell was never visited',
        PROOF_ERRORS.ROOT_NOT_VISITED,
      ),
    )
  }
  const [error, proof] = _.try(() => {
    const virtualRoot = rebuild(root, usage, new Map())
    return beginCell()
      .storeUint(MERKLE_PROOF_TYPE, 8)
      .storeBuffer(root.hash(0), 32)
      .storeUint(root.depth(0), 16)
      .storeRef(virtualRoot)
      .endCell({ exotic: true })
  })()
  if (error) {
    return safeError(
      error instanceof LedgerError
        ? error
        : new EncodeError(`cannot build Merkle proof: ${error.message}`),
    )
  }
  return safeResult(proof)
}

/**
 * Verify that `proof` is a Merkle proof for a tree hashing to
 * `expectedRootHash` and return its virtual root
 */
export function checkMerkleProof(
  proof: Cell,
  expectedRootHash: Buffer,
): Safe<Cell> {
  if (proof.type !== CellType.MerkleProof || proof.refs.length !== 1) {
    return safeError(
      new DecodeError(
        'cell is not a Merkle proof',
        PROOF_ERRORS.NOT_A_MERKLE_PROOF,
        { type: proof.type },
      ),
    )
  }
  const slice = proof.beginParse(true)
  slice.skip(8)
  const virtualHash = slice.loadBuffer(32)
  const [virtualRoot] = proof.refs
  if (
    !virtualHash.equals(expectedRootHash) ||
    !virtualRoot.hash(0).equals(expectedRootHash)
  ) {
    return safeError(
      new DecodeError(
        'Merkle proof does not match the expected root hash',
        PROOF_ERRORS.PROOF_HASH_MISMATCH,
        {
          expected: expectedRootHash.toString('hex'),
          actual: virtualHash.toString('hex'),
        },
      ),
    )
  }
  return safeResult(virtualRoot)
}
