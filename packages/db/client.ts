import { Pool, type PoolClient, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg'

/**
 * Anything that can run a parameterized query: the pool itself or a
 * checked-out client inside a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: dealcheck)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: parseInt(env.DB_POOL_MAX || '10', 10),
    min: parseInt(env.DB_POOL_MIN || '0', 10),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'dealcheck',
  }
}

/**
 * Create a pool from DATABASE_URL. Callers own the pool and must `end()` it.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
  const connectionString = env.DATABASE_URL

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  return new Pool(getPoolConfig(connectionString, env))
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on error.
 */
export async function withTransaction<T>(
  pool: Pick<Pool, 'connect'>,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query('BEGIN')
    const result = await fn(client)
    await client.query('COMMIT')
    return result
  } catch (error) {
    await client.query('ROLLBACK')
    throw error
  } finally {
    client.release()
  }
}
