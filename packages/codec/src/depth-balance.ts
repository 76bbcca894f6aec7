/**
 * depth_balance$_ split_depth:(#<= 30) balance:CurrencyCollection = DepthBalanceInfo;
 *
 * Augmentation carried by every node of the shard account index.
 */

import {
  type CellLoader,
  CODEC_ERRORS,
  DecodeError,
  type DepthBalanceInfo,
  EncodeError,
} from '@shard-ledger/types'
import { directLoader } from '@shard-ledger/core'
import { type Builder, type Slice, storeCurrencyCollection } from '@ton/core'
import { loadCurrencyCollectionWith } from './currency'

const SPLIT_DEPTH_BITS = 5
const MAX_SPLIT_DEPTH = 30

export function storeDepthBalanceInfo(info: DepthBalanceInfo) {
  return (builder: Builder) => {
    if (info.splitDepth < 0 || info.splitDepth > MAX_SPLIT_DEPTH) {
      throw new EncodeError(
        `split depth ${info.splitDepth} is out of range`,
        CODEC_ERRORS.VALUE_OUT_OF_RANGE,
      )
    }
    builder.storeUint(info.splitDepth, SPLIT_DEPTH_BITS)
    builder.store(storeCurrencyCollection(info.balance))
  }
}

export function loadDepthBalanceInfo(
  slice: Slice,
  loader: CellLoader = directLoader,
): DepthBalanceInfo {
  const splitDepth = slice.loadUint(SPLIT_DEPTH_BITS)
  if (splitDepth > MAX_SPLIT_DEPTH) {
    throw new DecodeError(
      `split depth ${splitDepth} is out of range`,
      CODEC_ERRORS.VALUE_OUT_OF_RANGE,
    )
  }
  return { splitDepth, balance: loadCurrencyCollectionWith(slice, loader) }
}
