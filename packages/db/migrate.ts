/**
 * SQL migration runner.
 *
 * Applies `migrations/*.sql` in file-name order, each in its own
 * transaction, and records applied files in `schema_migrations`.
 */

import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { Pool } from 'pg'
import { withTransaction } from './client'

export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url))

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const entries = await readdir(dir)
  return entries.filter((name) => name.endsWith('.sql')).sort()
}

/**
 * @returns names of the migrations applied by this call
 */
export async function runMigrations(
  pool: Pick<Pool, 'connect' | 'query'>,
  dir: string = MIGRATIONS_DIR
): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name        TEXT PRIMARY KEY,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `)

  const appliedRows = await pool.query<{ name: string }>('SELECT name FROM schema_migrations')
  const alreadyApplied = new Set(appliedRows.rows.map((r) => r.name))

  const applied: string[] = []
  for (const name of await listMigrations(dir)) {
    if (alreadyApplied.has(name)) continue

    const sql = await readFile(join(dir, name), 'utf8')
    await withTransaction(pool, async (client) => {
      await client.query(sql)
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [name])
    })
    applied.push(name)
  }

  return applied
}
