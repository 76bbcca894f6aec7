/**
 * Wire codecs for accounts and their shard-level containers.
 *
 * Writers follow the `storeX(value) => (builder) => void` convention of
 * @ton/core and readers throw on malformed input; the `encodeX`/`decodeX`
 * functions return Safe tuples.
 */

export * from './account'
export * from './account-state'
export * from './account-status'
export * from './address'
export * from './core/boundary'
export * from './core/maybe'
export * from './core/var-uinteger'
export * from './currency'
export * from './depth-balance'
export * from './dictionary'
export * from './hashmap-label'
export * from './shard-account'
export * from './shard-ident'
export * from './state-init'
export * from './storage'
