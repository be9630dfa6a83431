export { createPool, getPoolConfig, withTransaction, type Queryable } from './client'
export { createPgStore } from './pg-store'
export { listMigrations, runMigrations, MIGRATIONS_DIR } from './migrate'
export { MAX_DEALS_LIMIT } from './repositories/evaluations'
export * from './errors'
export * from './store'
export * from './types'
