// Database package exports for the layoffs cleaning job

export { createLayoffsClient } from './client'
export type { SupabaseClient, LayoffsClientConfig } from './client'

export { InMemoryLayoffStore } from './LayoffStore'
export type { LayoffStore } from './LayoffStore'
export { SupabaseLayoffStore } from './SupabaseLayoffStore'
export type { SupabaseLayoffStoreOptions } from './SupabaseLayoffStore'

export { LayoffRowSchema, LayoffRowsSchema } from './schema'
export { StorageError } from './errors'
