import type { QueryResultRow } from 'pg'
import type { Queryable } from '../client'
import { mapPgError } from '../errors'

/**
 * Run a query and return its rows, translating constraint violations.
 */
export async function queryRows<R extends QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = []
): Promise<R[]> {
  try {
    const result = await db.query<R>(text, values)
    return result.rows
  } catch (error) {
    throw mapPgError(error)
  }
}

export async function queryOne<R extends QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = []
): Promise<R | null> {
  const rows = await queryRows<R>(db, text, values)
  return rows[0] ?? null
}
