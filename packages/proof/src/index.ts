export * from './account-proof'
export * from './merkle-proof'
export * from './shard-accounts'
export * from './shard-state'
export * from './usage-tree'
