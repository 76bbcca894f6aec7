export * from './account'
export * from './balance'
export * from './copy'
export * from './display'
export * from './equality'
export * from './shard-account'
export * from './storage-used'
