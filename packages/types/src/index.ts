/**
 * Shared type definitions for the shard ledger packages.
 */

export * from './account'
export * from './cell'
export * from './errors'
export * from './safe'
