import type { Queryable } from '../client'
import type { RetailerRepository } from '../store'
import { queryOne } from './query'
import { toRetailer, type RetailerRow } from './rows'

const COLUMNS = 'id, name, domain, active'

export function createRetailerRepository(db: Queryable): RetailerRepository {
  return {
    async upsertByDomain({ name, domain }) {
      const row = await queryOne<RetailerRow>(
        db,
        `INSERT INTO retailers (name, domain)
         VALUES ($1, $2)
         ON CONFLICT (domain) DO UPDATE SET name = EXCLUDED.name
         RETURNING ${COLUMNS}`,
        [name, domain]
      )
      if (!row) throw new Error(`Retailer upsert returned no row for ${domain}`)
      return toRetailer(row)
    },

    async findById(id) {
      const row = await queryOne<RetailerRow>(db, `SELECT ${COLUMNS} FROM retailers WHERE id = $1`, [id])
      return row ? toRetailer(row) : null
    },

    async findByDomain(domain) {
      const row = await queryOne<RetailerRow>(db, `SELECT ${COLUMNS} FROM retailers WHERE domain = $1`, [domain])
      return row ? toRetailer(row) : null
    },
  }
}
