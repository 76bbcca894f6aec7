/**
 * Multi-currency balance arithmetic
 *
 * A balance is a @ton/core CurrencyCollection: native coins plus a sparse
 * `HashmapE 32 (VarUInteger 32)` of extra currencies. Zero extra entries are
 * never kept so that equal balances serialize identically.
 */

import { type CurrencyCollection, Dictionary } from '@ton/core'
import { maxVarUint } from '@shard-ledger/codec'

/** Grams are VarUInteger 16 */
export const MAX_COINS = maxVarUint(16)
/** Extra currency amounts are VarUInteger 32 */
export const MAX_EXTRA_CURRENCY = maxVarUint(32)

export type ExtraCurrencies = Dictionary<number, bigint>

export function emptyExtraCurrencies(): ExtraCurrencies {
  return Dictionary.empty(
    Dictionary.Keys.Uint(32),
    Dictionary.Values.BigVarUint(5),
  )
}

/**
 * Build a balance from native coins and an optional id => amount map
 */
export function currencies(
  coins: bigint,
  extra: Record<number, bigint> = {},
): CurrencyCollection {
  const other = emptyExtraCurrencies()
  for (const [id, amount] of Object.entries(extra)) {
    if (amount > 0n) {
      other.set(Number(id), amount)
    }
  }
  return withExtra(coins, other)
}

export function zeroCurrencies(): CurrencyCollection {
  return { coins: 0n }
}

function withExtra(coins: bigint, other: ExtraCurrencies): CurrencyCollection {
  return other.size > 0 ? { coins, other } : { coins }
}

function extraOf(value: CurrencyCollection): Map<number, bigint> {
  const out = new Map<number, bigint>()
  if (value.other) {
    for (const id of value.other.keys()) {
      const amount = value.other.get(id) ?? 0n
      if (amount > 0n) {
        out.set(id, amount)
      }
    }
  }
  return out
}

function saturate(value: bigint, max: bigint): bigint {
  return value > max ? max : value
}

/**
 * Sum of two balances. Each currency saturates at its wire maximum.
 */
export function addCurrencies(
  a: CurrencyCollection,
  b: CurrencyCollection,
): CurrencyCollection {
  const merged = extraOf(a)
  for (const [id, amount] of extraOf(b)) {
    merged.set(id, saturate((merged.get(id) ?? 0n) + amount, MAX_EXTRA_CURRENCY))
  }
  const other = emptyExtraCurrencies()
  for (const [id, amount] of merged) {
    other.set(id, amount)
  }
  return withExtra(saturate(a.coins + b.coins, MAX_COINS), other)
}

/**
 * Difference of two balances, or null when any currency of `a` is short
 */
export function subCurrencies(
  a: CurrencyCollection,
  b: CurrencyCollection,
): CurrencyCollection | null {
  if (a.coins < b.coins) {
    return null
  }
  const rest = extraOf(a)
  for (const [id, amount] of extraOf(b)) {
    const held = rest.get(id) ?? 0n
    if (held < amount) {
      return null
    }
    rest.set(id, held - amount)
  }
  const other = emptyExtraCurrencies()
  for (const [id, amount] of rest) {
    if (amount > 0n) {
      other.set(id, amount)
    }
  }
  return withExtra(a.coins - b.coins, other)
}

/**
 * Independent copy of a balance, with zero extra entries dropped
 */
export function copyCurrencies(value: CurrencyCollection): CurrencyCollection {
  const other = emptyExtraCurrencies()
  for (const [id, amount] of extraOf(value)) {
    other.set(id, amount)
  }
  return withExtra(value.coins, other)
}

export function isZeroCurrencies(value: CurrencyCollection): boolean {
  return value.coins === 0n && extraOf(value).size === 0
}

export function currenciesEqual(
  a: CurrencyCollection,
  b: CurrencyCollection,
): boolean {
  if (a.coins !== b.coins) {
    return false
  }
  const left = extraOf(a)
  const right = extraOf(b)
  if (left.size !== right.size) {
    return false
  }
  for (const [id, amount] of left) {
    if (right.get(id) !== amount) {
      return false
    }
  }
  return true
}

export function formatCurrencies(value: CurrencyCollection): string {
  const extra = [...extraOf(value)]
    .sort(([x], [y]) => x - y)
    .map(([id, amount]) => `${id}:${amount}`)
  return extra.length > 0
    ? `${value.coins} (+${extra.join(', ')})`
    : value.coins.toString()
}
